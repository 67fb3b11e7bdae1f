import { stat } from "node:fs/promises"
import {
	logProgress,
	type ProgressListener,
	progressEvent,
} from "@tilepress/shared/progress"
import { GoogleProjection } from "@tilepress/shared/projection"
import {
	type CoordinateTransform,
	createTransform,
	LONLAT_SRS,
} from "@tilepress/shared/transform"
import type {
	EngineFactory,
	RenderEngine,
	RenderRequest,
} from "@tilepress/shared/types"
import { EMPTY_TILE_SIZES, MIN_RENDER_BUFFER } from "./settings"
import type { WorkQueue } from "./work-queue"

/**
 * What a worker does when its engine fails on a tile: log it and move on, or
 * stop and hand the error to the orchestrator.
 */
export type RenderErrorPolicy = "continue" | "abort"

export type RenderWorkerState = "idle" | "running" | "stopped"

export interface RenderCounts {
	rendered: number
	skipped: number
	failed: number
}

export interface RenderWorkerOptions {
	id: number
	engine: RenderEngine
	tileSize: number
	maxZoom: number
	onRenderError?: RenderErrorPolicy
	verbose?: boolean
	onProgress?: ProgressListener
}

async function fileSize(path: string): Promise<number | null> {
	try {
		const stats = await stat(path)
		return stats.isFile() ? stats.size : null
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT")
			return null
		throw error
	}
}

/**
 * Renders tiles taken from a work queue until it receives a shutdown item.
 *
 * A worker owns its engine, projection and coordinate transform; none of them
 * are shared with other workers. Tiles whose file already exists are skipped.
 */
export class RenderWorker {
	readonly id: number
	readonly counts: RenderCounts = { rendered: 0, skipped: 0, failed: 0 }
	private _state: RenderWorkerState = "idle"
	private readonly engine: RenderEngine
	private readonly projection: GoogleProjection
	private readonly transform: CoordinateTransform
	private readonly onRenderError: RenderErrorPolicy
	private readonly verbose: boolean
	private readonly onProgress: ProgressListener

	constructor({
		id,
		engine,
		tileSize,
		maxZoom,
		onRenderError = "continue",
		verbose = false,
		onProgress = logProgress,
	}: RenderWorkerOptions) {
		this.id = id
		this.engine = engine
		this.engine.bufferSize = Math.max(engine.bufferSize, MIN_RENDER_BUFFER)
		this.projection = new GoogleProjection(maxZoom + 1, tileSize)
		this.transform = createTransform(LONLAT_SRS, engine.srs)
		this.onRenderError = onRenderError
		this.verbose = verbose
		this.onProgress = onProgress
	}

	get state() {
		return this._state
	}

	/**
	 * Process queue items until a shutdown item arrives. Every popped item is
	 * marked done, whether it was rendered, skipped or failed.
	 */
	async run(queue: WorkQueue): Promise<void> {
		this._state = "running"
		try {
			while (true) {
				const item = await queue.pop()
				if (item.type === "shutdown") {
					queue.markDone()
					return
				}
				try {
					await this.process(item.request)
				} finally {
					queue.markDone()
				}
			}
		} finally {
			this._state = "stopped"
		}
	}

	/**
	 * Render one tile unless its file already exists.
	 */
	async process({ name, path, tile }: RenderRequest): Promise<void> {
		const [x, y, z] = tile
		const bbox = this.transform.forward(this.projection.tileBbox(tile))

		const exists = (await fileSize(path)) !== null
		if (exists) {
			this.counts.skipped++
		} else {
			try {
				await this.engine.renderToFile(bbox, path)
			} catch (error) {
				if (this.onRenderError === "abort") throw error
				this.counts.failed++
				const reason = error instanceof Error ? error.message : String(error)
				this.onProgress(
					progressEvent(
						`Failed to render tile ${z}/${x}/${y} (${name}): ${reason}`,
						"error",
					),
				)
				return
			}
			this.counts.rendered++
		}

		if (!this.verbose) return
		const size = await fileSize(path)
		const empty = size !== null && EMPTY_TILE_SIZES.has(size)
		this.onProgress(
			progressEvent(
				`Scale denominator: ${this.engine.scaleDenominator(bbox)}`,
				"debug",
			),
		)
		this.onProgress(
			progressEvent(
				`(${name} : ${z}, ${x}, ${y}, ${exists ? "exists" : ""}, ${empty ? "empty" : ""})`,
				"debug",
			),
		)
	}
}

/**
 * Build a worker around a fresh engine from `engineFactory`.
 */
export async function createRenderWorker(
	engineFactory: EngineFactory,
	options: Omit<RenderWorkerOptions, "engine">,
): Promise<RenderWorker> {
	const engine = await engineFactory()
	return new RenderWorker({ ...options, engine })
}
