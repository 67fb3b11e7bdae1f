import { dirname, join } from "node:path"
import { parseArgs } from "node:util"
import type { TileScheme } from "@tilepress/mbtiles"
import {
	DEFAULT_RUN_NAME,
	DEFAULT_WORKER_COUNT,
	type RenderErrorPolicy,
} from "@tilepress/pyramid"
import {
	DEFAULT_TILE_FORMAT,
	TILE_FORMATS,
	type TileFormat,
} from "@tilepress/raster"
import { normalizeBbox, WORLD_BBOX } from "@tilepress/shared/bbox"
import type { GeoBbox2D } from "@tilepress/shared/types"
import { z } from "zod"

export const MIN_CLI_ZOOM = 1
export const MAX_CLI_ZOOM = 17

export const USAGE = `Usage: tilepress [options] <input> <output> <min> <max>

Render a map style into a tile pyramid and package it as an MBTiles archive.

Arguments:
  input                   map style file (JSON)
  output                  MBTiles archive to create
  min, max                zoom range to render, ${MIN_CLI_ZOOM}..${MAX_CLI_ZOOM}

Options:
  --bbox=w,s,e,n          bounding box to render (default: the whole world)
  --threads <n>           number of render workers (default: ${DEFAULT_WORKER_COUNT})
  --name <tag>            name carried into log lines (default: ${DEFAULT_RUN_NAME})
  --size <px>             tile size: 256, 512 or 1024 (default: 512)
  --format <fmt>          ${TILE_FORMATS.join(", ")} (default: ${DEFAULT_TILE_FORMAT})
  --scheme <scheme>       row order of the tile directory: xyz or tms (default: xyz)
  --no-compression        store every tile, even duplicates
  --tiles-dir <dir>       tile directory (default: <input dir>/tiles)
  --keep-tiles            keep tiles from an earlier run and render only
                          the missing ones (default: start from an empty
                          tile directory)
  --continue-on-error     log failed tiles and keep rendering (default)
  --fail-fast             stop at the first tile that fails to render
  --attribution <text>    archive metadata
  --description <text>    archive metadata
  --type <type>           archive metadata (overlay or baselayer)
  --version <version>     archive metadata
  --verbose               log every tile
  -h, --help              show this help
`

export interface CliOptions {
	input: string
	output: string
	minZoom: number
	maxZoom: number
	bbox: GeoBbox2D
	threads: number
	name: string
	size: number
	format: TileFormat
	scheme: TileScheme
	compression: boolean
	tilesDir: string
	keepTiles: boolean
	onRenderError: RenderErrorPolicy
	verbose: boolean
	attribution?: string
	description?: string
	type?: string
	version?: string
}

export type ParsedCli = { help: true } | { help: false; options: CliOptions }

const ZOOM_MESSAGE = `Zoom must be an integer in [${MIN_CLI_ZOOM}, ${MAX_CLI_ZOOM}]`

const ZoomSchema = z.coerce
	.number()
	.int(ZOOM_MESSAGE)
	.min(MIN_CLI_ZOOM, ZOOM_MESSAGE)
	.max(MAX_CLI_ZOOM, ZOOM_MESSAGE)

const BBOX_MESSAGE = "Expected four numbers: west, south, east, north"

const BboxSchema = z.string().transform((value, ctx): GeoBbox2D => {
	const numbers = value.trim().split(/[\s,]+/).map(Number)
	const [west, south, east, north] = numbers
	if (
		numbers.length !== 4 ||
		west === undefined ||
		south === undefined ||
		east === undefined ||
		north === undefined ||
		!numbers.every(Number.isFinite)
	) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: BBOX_MESSAGE })
		return z.NEVER
	}
	return normalizeBbox([west, south, east, north])
})

const ArgsSchema = z
	.object({
		input: z.string().min(1),
		output: z.string().min(1),
		min: ZoomSchema,
		max: ZoomSchema,
		bbox: BboxSchema.optional(),
		threads: z.coerce
			.number()
			.int()
			.min(1, "At least one thread is needed")
			.default(DEFAULT_WORKER_COUNT),
		name: z.string().default(DEFAULT_RUN_NAME),
		size: z
			.enum(["256", "512", "1024"])
			.default("512")
			.transform((size) => Number(size)),
		format: z.enum(TILE_FORMATS).default(DEFAULT_TILE_FORMAT),
		scheme: z.enum(["xyz", "tms"]).default("xyz"),
		"no-compression": z.boolean().default(false),
		"tiles-dir": z.string().min(1).optional(),
		"keep-tiles": z.boolean().default(false),
		"continue-on-error": z.boolean().default(false),
		"fail-fast": z.boolean().default(false),
		verbose: z.boolean().default(false),
		attribution: z.string().optional(),
		description: z.string().optional(),
		type: z.string().optional(),
		version: z.string().optional(),
	})
	.refine((args) => args.min <= args.max, {
		message: "min must not exceed max",
		path: ["min"],
	})
	.refine((args) => !(args["continue-on-error"] && args["fail-fast"]), {
		message: "Use only one of --continue-on-error and --fail-fast",
		path: ["fail-fast"],
	})

function formatIssues(error: z.ZodError) {
	return error.issues
		.map((issue) =>
			issue.path.length > 0
				? `${issue.path.join(".")}: ${issue.message}`
				: issue.message,
		)
		.join("; ")
}

/**
 * Parse and validate command-line arguments (without the node and script
 * paths).
 */
export function parseCliArgs(argv: string[]): ParsedCli {
	const { values, positionals } = parseArgs({
		args: argv,
		allowPositionals: true,
		strict: true,
		options: {
			bbox: { type: "string" },
			threads: { type: "string" },
			name: { type: "string" },
			size: { type: "string" },
			format: { type: "string" },
			scheme: { type: "string" },
			"no-compression": { type: "boolean" },
			"tiles-dir": { type: "string" },
			"keep-tiles": { type: "boolean" },
			"continue-on-error": { type: "boolean" },
			"fail-fast": { type: "boolean" },
			verbose: { type: "boolean" },
			attribution: { type: "string" },
			description: { type: "string" },
			type: { type: "string" },
			version: { type: "string" },
			help: { type: "boolean", short: "h" },
		},
	})
	if (values.help) return { help: true }

	if (positionals.length !== 4)
		throw Error(
			`Expected 4 arguments (input output min max), got ${positionals.length}`,
		)
	const [input, output, min, max] = positionals

	const parsed = ArgsSchema.safeParse({ ...values, input, output, min, max })
	if (!parsed.success)
		throw Error(`Invalid arguments: ${formatIssues(parsed.error)}`)
	const args = parsed.data

	return {
		help: false,
		options: {
			input: args.input,
			output: args.output,
			minZoom: args.min,
			maxZoom: args.max,
			bbox: args.bbox ?? [...WORLD_BBOX],
			threads: args.threads,
			name: args.name,
			size: args.size,
			format: args.format,
			scheme: args.scheme,
			compression: !args["no-compression"],
			tilesDir: args["tiles-dir"] ?? join(dirname(args.input), "tiles"),
			keepTiles: args["keep-tiles"],
			onRenderError: args["fail-fast"] ? "abort" : "continue",
			verbose: args.verbose,
			attribution: args.attribution,
			description: args.description,
			type: args.type,
			version: args.version,
		},
	}
}
