export type LonLat = [lon: number, lat: number]
export type XY = [x: number, y: number]

/**
 * A tile index in the XYZ ("Google") scheme. Row 0 is the northernmost row.
 */
export type Tile = [x: number, y: number, z: number]

export type Rgba =
	| [r: number, g: number, b: number, a: number]
	| Uint8ClampedArray

/**
 * A bounding box in the format [minLon, minLat, maxLon, maxLat].
 * GeoJSON.BBox allows for 3D bounding boxes, but we use tools that expect 2D bounding boxes.
 */
export type GeoBbox2D = [
	minLon: number,
	minLat: number,
	maxLon: number,
	maxLat: number,
]

/**
 * A bounding box in the native units of some spatial reference system, as
 * [minX, minY, maxX, maxY]. Degrees for geographic systems, metres for Web Mercator.
 */
export type ProjectedBbox = [
	minX: number,
	minY: number,
	maxX: number,
	maxY: number,
]

/**
 * A unit of render work: where the tile goes and which tile it is.
 */
export interface RenderRequest {
	/** Tag identifying the run, carried into log lines. */
	name: string
	/** Destination file, `{tileDir}/{z}/{x}/{y}.{ext}`. */
	path: string
	tile: Tile
}

/**
 * A map rendering engine bound to one style. Engines are stateful and not safe
 * to share: each worker owns its own.
 */
export interface RenderEngine {
	/** The map's declared spatial reference. */
	readonly srs: string
	/** Extra pixels rendered around every extent so edges are not clipped. */
	bufferSize: number
	/** Render `bbox` (in `srs` units) and save the image to `path`. */
	renderToFile(bbox: ProjectedBbox, path: string): Promise<void>
	/** Map scale denominator for `bbox` at this engine's pixel size. */
	scaleDenominator(bbox: ProjectedBbox): number
}

/**
 * Create a fresh engine. Called once per worker.
 */
export type EngineFactory = () => RenderEngine | Promise<RenderEngine>
