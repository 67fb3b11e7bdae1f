import { existsSync } from "node:fs"
import { rm } from "node:fs/promises"
import { basename, extname } from "node:path"
import { diskToMbtiles } from "@tilepress/mbtiles"
import { renderPyramid, writeMetadata } from "@tilepress/pyramid"
import { createRasterEngineFactory, tileExtension } from "@tilepress/raster"
import {
	createProgressLogger,
	type ProgressListener,
	progressEvent,
} from "@tilepress/shared/progress"
import { type CliOptions, parseCliArgs, USAGE } from "./options"

export const EXISTING_ARCHIVE_MESSAGE =
	"Importing tiles into already-existing MBTiles is not yet supported"

export interface RunContext {
	signal?: AbortSignal
	onProgress?: ProgressListener
	/** Where usage text and fatal messages go. */
	stdout?: (text: string) => void
	stderr?: (text: string) => void
}

/**
 * Render the pyramid described by `options`, then package it. Resolves with
 * the process exit code.
 */
export async function renderAndPackage(
	options: CliOptions,
	{
		signal,
		onProgress = createProgressLogger({ verbose: options.verbose }),
		stderr = console.error,
	}: RunContext = {},
): Promise<number> {
	if (existsSync(options.output)) {
		stderr(EXISTING_ARCHIVE_MESSAGE)
		return 1
	}

	// diskToMbtiles packages every tile found in the directory.
	if (!options.keepTiles) {
		onProgress(progressEvent(`Removing ${options.tilesDir}`))
		await rm(options.tilesDir, { recursive: true, force: true })
	}

	const tileExt = tileExtension(options.format)
	onProgress(
		progressEvent(
			`Rendering ${options.input} at zoom ${options.minZoom}-${options.maxZoom} into ${options.tilesDir}`,
		),
	)
	const stats = await renderPyramid({
		bbox: options.bbox,
		minZoom: options.minZoom,
		maxZoom: options.maxZoom,
		tileDir: options.tilesDir,
		tileExt,
		tileSize: options.size,
		workerCount: options.threads,
		name: options.name,
		onRenderError: options.onRenderError,
		verbose: options.verbose,
		onProgress,
		signal,
		engineFactory: createRasterEngineFactory({
			stylePath: options.input,
			tileSize: options.size,
			format: options.format,
		}),
	})
	if (stats.failed > 0) {
		stderr(
			`${stats.failed} tiles failed to render, not writing ${options.output}`,
		)
		return 1
	}

	await writeMetadata(options.tilesDir, {
		name: basename(options.output, extname(options.output)),
		format: tileExt,
		bbox: options.bbox,
		minZoom: options.minZoom,
		maxZoom: options.maxZoom,
		attribution: options.attribution,
		description: options.description,
		type: options.type,
		version: options.version,
	})
	await diskToMbtiles(options.tilesDir, options.output, {
		format: tileExt,
		scheme: options.scheme,
		compression: options.compression,
		onProgress,
	})
	return 0
}

/**
 * Run the command line. Fatal errors are reported on `stderr` as
 * `Error: <message>` and end with exit code 1; cancellation rejects.
 */
export async function runCli(
	argv: string[],
	context: RunContext = {},
): Promise<number> {
	const { stdout = console.log, stderr = console.error, signal } = context
	try {
		const parsed = parseCliArgs(argv)
		if (parsed.help) {
			stdout(USAGE)
			return 0
		}
		return await renderAndPackage(parsed.options, context)
	} catch (error) {
		if (signal?.aborted) throw error
		stderr(`Error: ${error instanceof Error ? error.message : String(error)}`)
		return 1
	}
}
