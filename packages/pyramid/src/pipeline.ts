import { mkdir } from "node:fs/promises"
import { assertIntegerInRange } from "@tilepress/shared/assert"
import { normalizeBbox } from "@tilepress/shared/bbox"
import {
	logProgress,
	type ProgressListener,
	progressEvent,
} from "@tilepress/shared/progress"
import type { EngineFactory, GeoBbox2D } from "@tilepress/shared/types"
import {
	createRenderWorker,
	type RenderCounts,
	type RenderErrorPolicy,
	type RenderWorker,
} from "./render-worker"
import {
	DEFAULT_RUN_NAME,
	DEFAULT_TILE_SIZE,
	DEFAULT_WORKER_COUNT,
	MAX_ZOOM,
} from "./settings"
import { tileRequests } from "./tiles"
import { WorkQueue } from "./work-queue"

export interface PyramidConfig {
	bbox: GeoBbox2D
	minZoom: number
	maxZoom: number
	/** Root of the `{z}/{x}/{y}.{ext}` tree. */
	tileDir: string
	/** Extension of tile files, without the dot. */
	tileExt: string
	/** Creates one engine per worker. */
	engineFactory: EngineFactory
	tileSize?: number
	workerCount?: number
	name?: string
	onRenderError?: RenderErrorPolicy
	verbose?: boolean
	onProgress?: ProgressListener
	signal?: AbortSignal
}

export interface PyramidStats extends RenderCounts {
	/** Tile requests pushed to the queue. */
	enqueued: number
}

/**
 * Reject configurations that cannot produce a valid pyramid. Runs before any
 * worker starts.
 */
export function validatePyramidConfig(config: PyramidConfig) {
	const {
		minZoom,
		maxZoom,
		tileSize = DEFAULT_TILE_SIZE,
		workerCount = DEFAULT_WORKER_COUNT,
	} = config
	assertIntegerInRange(minZoom, 0, MAX_ZOOM, "minZoom")
	assertIntegerInRange(maxZoom, 0, MAX_ZOOM, "maxZoom")
	if (minZoom > maxZoom)
		throw Error(`minZoom (${minZoom}) must not exceed maxZoom (${maxZoom})`)
	if (!Number.isInteger(tileSize) || tileSize <= 0)
		throw Error(`Tile size must be a positive integer, got ${tileSize}`)
	if (!Number.isInteger(workerCount) || workerCount < 1)
		throw Error(
			`Worker count must be an integer of at least 1, got ${workerCount}`,
		)
}

/**
 * Render every tile of a pyramid into `tileDir`.
 *
 * Starts `workerCount` workers on one queue, pushes a request for each tile,
 * then one shutdown item per worker, and resolves once the queue has drained and
 * every worker has stopped. Existing tile files are left untouched, so a run
 * can be repeated to fill in what an earlier one missed.
 *
 * Workers are concurrent, not parallel: they are async tasks sharing one event
 * loop, so style evaluation and rasterizing run one tile at a time and only
 * encoding overlaps, on sharp's thread pool.
 *
 * Aborting `signal`, or a render failure under the `"abort"` policy, aborts the
 * queue and rejects at once; renders already in progress are not interrupted.
 */
export async function renderPyramid(
	config: PyramidConfig,
): Promise<PyramidStats> {
	validatePyramidConfig(config)
	const {
		minZoom,
		maxZoom,
		tileDir,
		tileExt,
		engineFactory,
		tileSize = DEFAULT_TILE_SIZE,
		workerCount = DEFAULT_WORKER_COUNT,
		name = DEFAULT_RUN_NAME,
		onRenderError = "continue",
		verbose = false,
		onProgress = logProgress,
		signal,
	} = config
	const bbox = normalizeBbox(config.bbox)
	signal?.throwIfAborted()

	await mkdir(tileDir, { recursive: true })

	const workers: RenderWorker[] = []
	for (let id = 0; id < workerCount; id++) {
		workers.push(
			await createRenderWorker(engineFactory, {
				id,
				tileSize,
				maxZoom,
				onRenderError,
				verbose,
				onProgress,
			}),
		)
	}

	const queue = new WorkQueue()
	const onAbort = () => queue.abort(signal?.reason)
	signal?.addEventListener("abort", onAbort, { once: true })
	signal?.throwIfAborted()

	const running = Promise.all(
		workers.map((worker) =>
			worker.run(queue).catch((error: unknown) => {
				queue.abort(error)
				throw error
			}),
		),
	)

	let enqueued = 0
	const produce = async () => {
		for await (const request of tileRequests({
			bbox,
			minZoom,
			maxZoom,
			tileSize,
			tileDir,
			tileExt,
			name,
		})) {
			signal?.throwIfAborted()
			queue.push({ type: "work", request })
			enqueued++
		}
		onProgress(
			progressEvent(
				`Queued ${enqueued} tiles for zoom ${minZoom}-${maxZoom} on ${workerCount} workers`,
			),
		)
		for (let i = 0; i < workerCount; i++) queue.push({ type: "shutdown" })
		await queue.awaitDrain()
	}

	try {
		await Promise.all([produce(), running])
	} catch (error) {
		queue.abort(error)
		throw error
	} finally {
		signal?.removeEventListener("abort", onAbort)
	}

	const stats: PyramidStats = { enqueued, rendered: 0, skipped: 0, failed: 0 }
	for (const { counts } of workers) {
		stats.rendered += counts.rendered
		stats.skipped += counts.skipped
		stats.failed += counts.failed
	}
	onProgress(
		progressEvent(
			`Rendered ${stats.rendered} tiles, skipped ${stats.skipped} existing, ${stats.failed} failed`,
			stats.failed > 0 ? "warn" : "info",
		),
	)
	return stats
}
