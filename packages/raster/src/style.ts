/**
 * Map style documents.
 *
 * A style is a JSON file naming the map's spatial reference, an optional
 * background and an ordered list of layers. Each layer draws GeoJSON features,
 * either inline or from a file next to the style, as fills, lines or circles.
 *
 * @example
 * ```json
 * {
 *   "srs": "EPSG:3857",
 *   "background": "#a0c8f0",
 *   "layers": [
 *     { "id": "land", "type": "fill", "color": "#f2efe9", "source": "land.geojson" },
 *     { "id": "roads", "type": "line", "color": [90, 90, 90, 255], "source": "roads.geojson" }
 *   ]
 * }
 * ```
 *
 * @module
 */

import { readFile } from "node:fs/promises"
import { dirname, resolve } from "node:path"
import { MERCATOR_SRS, parseSrs } from "@tilepress/shared/transform"
import type { Rgba } from "@tilepress/shared/types"
import { z } from "zod"
import { parseHexColor, TRANSPARENT } from "./color"
import {
	DEFAULT_AREA_COLOR,
	DEFAULT_LINE_COLOR,
	DEFAULT_POINT_COLOR,
	DEFAULT_POINT_RADIUS,
} from "./raster-canvas"

const ByteSchema = z.number().int().min(0).max(255)

const ColorSchema = z
	.union([
		z
			.string()
			.regex(/^#([0-9a-f]{6}|[0-9a-f]{8})$/i, "Expected #rrggbb or #rrggbbaa"),
		z.tuple([ByteSchema, ByteSchema, ByteSchema, ByteSchema]),
	])
	.transform((color): Rgba =>
		typeof color === "string" ? parseHexColor(color) : color,
	)

const PositionSchema = z.tuple([z.number(), z.number()]).rest(z.number())
const LineSchema = z.array(PositionSchema)
const PolygonSchema = z.array(LineSchema)

const GeometrySchema = z.discriminatedUnion("type", [
	z.object({ type: z.literal("Point"), coordinates: PositionSchema }),
	z.object({ type: z.literal("MultiPoint"), coordinates: LineSchema }),
	z.object({ type: z.literal("LineString"), coordinates: LineSchema }),
	z.object({
		type: z.literal("MultiLineString"),
		coordinates: z.array(LineSchema),
	}),
	z.object({ type: z.literal("Polygon"), coordinates: PolygonSchema }),
	z.object({
		type: z.literal("MultiPolygon"),
		coordinates: z.array(PolygonSchema),
	}),
])

const FeatureSchema = z.object({
	type: z.literal("Feature"),
	geometry: GeometrySchema.nullable(),
})

const GeoJsonSchema = z.union([
	z.object({
		type: z.literal("FeatureCollection"),
		features: z.array(FeatureSchema),
	}),
	FeatureSchema,
	GeometrySchema,
])

export type Position = z.infer<typeof PositionSchema>
export type Geometry = z.infer<typeof GeometrySchema>

export type LayerType = "fill" | "line" | "circle"

const LayerSchema = z
	.object({
		id: z.string().min(1),
		type: z.enum(["fill", "line", "circle"]),
		color: ColorSchema.optional(),
		radius: z.number().positive().optional(),
		source: z.string().min(1).optional(),
		data: z.unknown().optional(),
	})
	.refine((layer) => (layer.source === undefined) !== (layer.data === undefined), {
		message: "Layer needs exactly one of source or data",
	})

const StyleSchema = z.object({
	srs: z
		.string()
		.default(MERCATOR_SRS)
		.superRefine((srs, ctx) => {
			try {
				parseSrs(srs)
			} catch (error) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					message: error instanceof Error ? error.message : String(error),
				})
			}
		}),
	background: ColorSchema.optional(),
	bufferSize: z.number().int().min(0).default(0),
	layers: z.array(LayerSchema).default([]),
})

export type StyleDocument = z.input<typeof StyleSchema>

export interface StyleLayer {
	id: string
	type: LayerType
	color: Rgba
	radius: number
	geometries: Geometry[]
}

/**
 * A loaded style: validated, with every layer's features read into memory.
 * Read-only once loaded, so one style may back many engines.
 */
export interface MapStyle {
	srs: string
	background: Rgba
	bufferSize: number
	layers: StyleLayer[]
}

const DEFAULT_LAYER_COLORS: Record<LayerType, Rgba> = {
	fill: DEFAULT_AREA_COLOR,
	line: DEFAULT_LINE_COLOR,
	circle: DEFAULT_POINT_COLOR,
}

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
 * Collect the geometries of any GeoJSON object. Features without geometry are
 * dropped.
 */
export function parseGeometries(data: unknown, label = "GeoJSON"): Geometry[] {
	const parsed = GeoJsonSchema.safeParse(data)
	if (!parsed.success)
		throw Error(`Invalid ${label}: ${formatIssues(parsed.error)}`)
	const value = parsed.data
	if (value.type === "FeatureCollection") {
		return value.features.flatMap((feature) =>
			feature.geometry ? [feature.geometry] : [],
		)
	}
	if (value.type === "Feature") return value.geometry ? [value.geometry] : []
	return [value]
}

async function readJson(path: string): Promise<unknown> {
	const text = await readFile(path, "utf8")
	try {
		return JSON.parse(text)
	} catch (error) {
		throw Error(`${path} is not valid JSON`, { cause: error })
	}
}

/**
 * Validate a style document. Layer `source` paths resolve against `baseDir`.
 */
export async function parseStyle(
	document: unknown,
	baseDir: string,
): Promise<MapStyle> {
	const parsed = StyleSchema.safeParse(document)
	if (!parsed.success)
		throw Error(`Invalid style: ${formatIssues(parsed.error)}`)
	const style = parsed.data

	const layers: StyleLayer[] = []
	for (const layer of style.layers) {
		const data =
			layer.source === undefined
				? layer.data
				: await readJson(resolve(baseDir, layer.source))
		layers.push({
			id: layer.id,
			type: layer.type,
			color: layer.color ?? DEFAULT_LAYER_COLORS[layer.type],
			radius: layer.radius ?? DEFAULT_POINT_RADIUS,
			geometries: parseGeometries(data, `GeoJSON in layer "${layer.id}"`),
		})
	}

	return {
		srs: style.srs,
		background: style.background ?? TRANSPARENT,
		bufferSize: style.bufferSize,
		layers,
	}
}

/**
 * Read and validate a style file.
 */
export async function loadStyle(path: string): Promise<MapStyle> {
	return parseStyle(await readJson(path), dirname(resolve(path)))
}
