import { mkdir } from "node:fs/promises"
import { join } from "node:path"
import { GoogleProjection } from "@tilepress/shared/projection"
import type { GeoBbox2D, RenderRequest, Tile } from "@tilepress/shared/types"
import { DEFAULT_TILE_SIZE } from "./settings"

function tileIndex(px: number, tileSize: number) {
	// Truncate toward zero, without producing -0.
	return Math.trunc(px / tileSize) || 0
}

/**
 * Tiles covering `bbox` for every zoom in `[minZoom, maxZoom]`, ascending by
 * zoom, then by column, then by row.
 *
 * Covers the rectangle of tile indexes spanned by the box's corners, so small
 * boxes may pull in neighbouring tiles. Indexes outside the world at a zoom are
 * skipped.
 */
export function* enumerateTiles(
	bbox: GeoBbox2D,
	minZoom: number,
	maxZoom: number,
	tileSize = DEFAULT_TILE_SIZE,
): Generator<Tile> {
	const [west, south, east, north] = bbox
	const projection = new GoogleProjection(maxZoom + 1, tileSize)

	for (let z = minZoom; z <= maxZoom; z++) {
		const [x0, y0] = projection.toPixel([west, north], z)
		const [x1, y1] = projection.toPixel([east, south], z)
		const count = projection.tileCount(z)

		for (let x = tileIndex(x0, tileSize); x <= tileIndex(x1, tileSize); x++) {
			if (x < 0 || x >= count) continue
			for (
				let y = tileIndex(y0, tileSize);
				y <= tileIndex(y1, tileSize);
				y++
			) {
				if (y < 0 || y >= count) continue
				yield [x, y, z]
			}
		}
	}
}

/**
 * Destination of a tile: `{tileDir}/{z}/{x}/{y}.{ext}`.
 */
export function tilePath(tileDir: string, tile: Tile, ext: string) {
	const [x, y, z] = tile
	return join(tileDir, String(z), String(x), `${y}.${ext}`)
}

export interface TileRequestOptions {
	bbox: GeoBbox2D
	minZoom: number
	maxZoom: number
	tileSize: number
	tileDir: string
	tileExt: string
	name: string
}

/**
 * Render requests for every tile of a pyramid. Creates `{tileDir}/{z}` for
 * every zoom in range, even one the bbox leaves empty, and the `{z}/{x}`
 * directory of each tile by the time its request is yielded.
 */
export async function* tileRequests({
	bbox,
	minZoom,
	maxZoom,
	tileSize,
	tileDir,
	tileExt,
	name,
}: TileRequestOptions): AsyncGenerator<RenderRequest> {
	for (let z = minZoom; z <= maxZoom; z++) {
		await mkdir(join(tileDir, String(z)), { recursive: true })
		let column: number | undefined
		for (const tile of enumerateTiles(bbox, z, z, tileSize)) {
			const [x] = tile
			if (x !== column) {
				await mkdir(join(tileDir, String(z), String(x)), { recursive: true })
				column = x
			}
			yield { name, path: tilePath(tileDir, tile, tileExt), tile }
		}
	}
}
