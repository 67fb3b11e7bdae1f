import { assertIntegerInRange, assertValue } from "./assert"
import type { GeoBbox2D, LonLat, Tile, XY } from "./types"

const DEG_TO_RAD = Math.PI / 180
const RAD_TO_DEG = 180 / Math.PI

/**
 * `sin(latitude)` is clamped to this magnitude before projecting so the poles
 * stay finite.
 */
export const MAX_SIN_LATITUDE = 0.9999

function roundPixel(value: number) {
	const px = Math.round(value)
	// No -0: pixels feed tile indexes and file names.
	return px === 0 ? 0 : px
}

/**
 * Spherical Web Mercator ("Google") projection between lon/lat degrees and
 * global pixel coordinates, for a fixed set of integer zoom levels.
 *
 * Per-zoom constants are computed once in the constructor and never change.
 * Asking for a zoom outside `[0, levels)` throws.
 *
 * @example
 * ```ts
 * const projection = new GoogleProjection(6, 256)
 * projection.toPixel([10, 11], 5) // [4324, 3844]
 * ```
 */
export class GoogleProjection {
	readonly levels: number
	readonly tileSize: number
	/** Pixels per degree of longitude. */
	private readonly Bc: number[] = []
	/** Pixels per radian. */
	private readonly Cc: number[] = []
	/** Pixel offset of the world center. */
	private readonly zc: number[] = []
	/** World size in pixels. */
	private readonly Ac: number[] = []

	constructor(levels: number, tileSize = 256) {
		assertIntegerInRange(levels, 1, 31, "levels")
		if (!Number.isInteger(tileSize) || tileSize <= 0)
			throw Error(`Tile size must be a positive integer, got ${tileSize}`)
		this.levels = levels
		this.tileSize = tileSize

		let c = tileSize
		for (let z = 0; z < levels; z++) {
			this.Bc.push(c / 360)
			this.Cc.push(c / (2 * Math.PI))
			this.zc.push(c / 2)
			this.Ac.push(c)
			c *= 2
		}
	}

	/**
	 * Project lon/lat to the nearest integer pixel at `zoom`.
	 */
	toPixel(ll: LonLat, zoom: number): XY {
		const { bc, cc, center } = this.constants(zoom)
		const f = Math.min(
			Math.max(Math.sin(DEG_TO_RAD * ll[1]), -MAX_SIN_LATITUDE),
			MAX_SIN_LATITUDE,
		)
		const x = roundPixel(center + ll[0] * bc)
		const y = roundPixel(center + 0.5 * Math.log((1 + f) / (1 - f)) * -cc)
		return [x, y]
	}

	/**
	 * Unproject a pixel at `zoom` to lon/lat. Not rounded, so `toPixel` followed
	 * by `toGeo` only recovers the input to within one pixel.
	 */
	toGeo(px: XY, zoom: number): LonLat {
		const { bc, cc, center } = this.constants(zoom)
		const lon = (px[0] - center) / bc
		const g = (px[1] - center) / -cc
		const lat = RAD_TO_DEG * (2 * Math.atan(Math.exp(g)) - 0.5 * Math.PI)
		return [lon, lat]
	}

	/**
	 * Geographic extent of a tile as [west, south, east, north].
	 */
	tileBbox(tile: Tile): GeoBbox2D {
		const [x, y, z] = tile
		const size = this.tileSize
		const [west, south] = this.toGeo([x * size, (y + 1) * size], z)
		const [east, north] = this.toGeo([(x + 1) * size, y * size], z)
		return [west, south, east, north]
	}

	/**
	 * Number of tiles along one axis at `zoom`.
	 */
	tileCount(zoom: number): number {
		return this.constants(zoom).size / this.tileSize
	}

	private constants(zoom: number) {
		assertIntegerInRange(zoom, 0, this.levels - 1, "zoom")
		const bc = this.Bc[zoom]
		const cc = this.Cc[zoom]
		const center = this.zc[zoom]
		const size = this.Ac[zoom]
		assertValue(bc, `No projection constants for zoom ${zoom}`)
		assertValue(cc, `No projection constants for zoom ${zoom}`)
		assertValue(center, `No projection constants for zoom ${zoom}`)
		assertValue(size, `No projection constants for zoom ${zoom}`)
		return { bc, cc, center, size }
	}
}
