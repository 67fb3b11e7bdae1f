import type { GeoBbox2D } from "./types"

/**
 * Latitude at which the Web Mercator world becomes square.
 */
export const MERC_MAX_LATITUDE = 85.0511287798065923778

/**
 * The whole projectable world.
 */
export const WORLD_BBOX: GeoBbox2D = [
	-180,
	-MERC_MAX_LATITUDE,
	180,
	MERC_MAX_LATITUDE,
]

function clamp(value: number, min: number, max: number) {
	return Math.min(Math.max(min, value), max)
}

/**
 * Clamp a bounding box to the Web Mercator domain: longitudes to [-180, 180] and
 * latitudes to ±MERC_MAX_LATITUDE. Non-finite values are rejected.
 */
export function normalizeBbox(bbox: GeoBbox2D): GeoBbox2D {
	if (!bbox.every(Number.isFinite))
		throw Error(`Bounding box values must be finite numbers: ${bbox.join(", ")}`)
	const [west, south, east, north] = bbox
	return [
		clamp(west, -180, 180),
		clamp(south, -MERC_MAX_LATITUDE, MERC_MAX_LATITUDE),
		clamp(east, -180, 180),
		clamp(north, -MERC_MAX_LATITUDE, MERC_MAX_LATITUDE),
	]
}

/**
 * Format a bounding box as the MBTiles `bounds` string, "w, s, e, n".
 */
export function formatBounds(bbox: GeoBbox2D): string {
	return bbox.map(String).join(", ")
}
