/**
 * Coordinate transforms between the tiling scheme's geographic frame and the
 * native spatial reference of a map.
 *
 * Only the two systems a Web Mercator tile pipeline meets are understood:
 * WGS84 lon/lat and spherical Web Mercator. Anything else is rejected when the
 * transform is built.
 *
 * @module
 */

import { SphericalMercator } from "@mapbox/sphericalmercator"
import type { LonLat, ProjectedBbox, XY } from "./types"

/** Spatial reference of tile extents computed from tile indexes. */
export const LONLAT_SRS = "+proj=longlat +ellps=WGS84 +datum=WGS84 +no_defs"

/** Default spatial reference of a map style. */
export const MERCATOR_SRS = "EPSG:3857"

/** Metres per degree of longitude at the equator of the WGS84 sphere. */
export const METRES_PER_DEGREE = (6378137 * 2 * Math.PI) / 360

export type SrsKind = "lonlat" | "mercator"

const LONLAT_CODES = new Set(["EPSG:4326", "WGS84", "CRS:84"])
const MERCATOR_CODES = new Set([
	"EPSG:3857",
	"EPSG:900913",
	"EPSG:3785",
	"EPSG:102100",
])

/**
 * Classify a spatial reference given as an EPSG code or a proj string.
 */
export function parseSrs(srs: string): SrsKind {
	const normalized = srs.trim()
	const code = normalized.toUpperCase()
	if (LONLAT_CODES.has(code) || /\+proj=longlat\b/.test(normalized))
		return "lonlat"
	if (MERCATOR_CODES.has(code) || /\+proj=merc\b/.test(normalized))
		return "mercator"
	throw Error(`Unsupported spatial reference: "${srs}"`)
}

export interface CoordinateTransform {
	readonly source: SrsKind
	readonly target: SrsKind
	forwardPoint(ll: LonLat): XY
	/** Reproject a box given as [minX, minY, maxX, maxY] in the source frame. */
	forward(bbox: ProjectedBbox): ProjectedBbox
}

function toXY(values: ArrayLike<number>): XY {
	const x = values[0]
	const y = values[1]
	if (x === undefined || y === undefined)
		throw Error("Projection returned fewer than two coordinates")
	return [x, y]
}

/**
 * Build a transform from `sourceSrs` to `targetSrs`. Transforms hold a projection
 * instance; build one per owner rather than sharing it.
 */
export function createTransform(
	sourceSrs: string,
	targetSrs: string,
): CoordinateTransform {
	const source = parseSrs(sourceSrs)
	const target = parseSrs(targetSrs)
	const merc = new SphericalMercator({ size: 256 })

	const forwardPoint = (xy: XY): XY => {
		if (source === target) return [xy[0], xy[1]]
		if (source === "lonlat") return toXY(merc.forward(xy))
		return toXY(merc.inverse(xy))
	}

	return {
		source,
		target,
		forwardPoint,
		forward(bbox) {
			const [minX, minY] = forwardPoint([bbox[0], bbox[1]])
			const [maxX, maxY] = forwardPoint([bbox[2], bbox[3]])
			return [minX, minY, maxX, maxY]
		},
	}
}
