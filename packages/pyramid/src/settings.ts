/** Number of render workers when none is given. */
export const DEFAULT_WORKER_COUNT = 8

/** Tag carried into every log line of a run when none is given. */
export const DEFAULT_RUN_NAME = "unknown"

export const DEFAULT_TILE_SIZE = 256

/** Highest zoom level a pyramid may reach. */
export const MAX_ZOOM = 30

/**
 * Workers raise an engine's buffer to at least this many pixels so labels and
 * strokes are not cut at tile edges.
 */
export const MIN_RENDER_BUFFER = 128

/**
 * File sizes, in bytes, of blank tiles as written by common encoders. Only used
 * to annotate debug output.
 */
export const EMPTY_TILE_SIZES: ReadonlySet<number> = new Set([103, 126, 222])
