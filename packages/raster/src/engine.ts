import {
	bboxIntersects,
	emptyBbox,
	extendBbox,
} from "@tilepress/shared/bbox-intersects"
import {
	createTransform,
	LONLAT_SRS,
	METRES_PER_DEGREE,
	parseSrs,
} from "@tilepress/shared/transform"
import type {
	EngineFactory,
	ProjectedBbox,
	RenderEngine,
	Rgba,
	XY,
} from "@tilepress/shared/types"
import { saveImage, type TileFormat } from "./encode"
import { RasterCanvas } from "./raster-canvas"
import {
	type Geometry,
	type LayerType,
	loadStyle,
	type MapStyle,
	type Position,
} from "./style"

/** Size of a standardized rendering pixel in metres (0.28 mm). */
const STANDARD_PIXEL_SIZE = 0.00028

type ProjectedGeometry =
	| { kind: "points"; points: XY[]; bbox: ProjectedBbox }
	| { kind: "lines"; lines: XY[][]; bbox: ProjectedBbox }
	| { kind: "polygons"; polygons: XY[][][]; bbox: ProjectedBbox }

interface ProjectedLayer {
	id: string
	type: LayerType
	color: Rgba
	radius: number
	geometries: ProjectedGeometry[]
}

export interface RasterMapEngineOptions {
	width: number
	height?: number
	format: TileFormat
}

/**
 * Renders a map style into images of a fixed pixel size.
 *
 * Features are projected from lon/lat into the style's spatial reference once,
 * when the engine is built. Each render maps the requested extent onto the pixel
 * grid as given; the aspect ratio is not corrected.
 */
export class RasterMapEngine implements RenderEngine {
	readonly srs: string
	readonly width: number
	readonly height: number
	readonly format: TileFormat
	bufferSize: number
	private readonly style: MapStyle
	private readonly layers: ProjectedLayer[]

	constructor(style: MapStyle, options: RasterMapEngineOptions) {
		this.style = style
		this.srs = style.srs
		this.width = options.width
		this.height = options.height ?? options.width
		this.format = options.format
		this.bufferSize = style.bufferSize

		const transform = createTransform(LONLAT_SRS, style.srs)
		const project = (ll: Position): XY => transform.forwardPoint([ll[0], ll[1]])
		this.layers = style.layers.map((layer) => ({
			id: layer.id,
			type: layer.type,
			color: layer.color,
			radius: layer.radius,
			geometries: layer.geometries.map((geometry) =>
				projectGeometry(geometry, project),
			),
		}))
	}

	/**
	 * Draw the style for an extent given in the style's spatial reference.
	 */
	render(bbox: ProjectedBbox): RasterCanvas {
		const [minX, minY, maxX, maxY] = bbox
		if (!(maxX > minX && maxY > minY))
			throw Error(`Cannot render an empty extent: ${bbox.join(", ")}`)

		const canvas = new RasterCanvas(this.width, this.height, this.bufferSize)
		if ((this.style.background[3] ?? 0) > 0) canvas.fill(this.style.background)

		const sx = this.width / (maxX - minX)
		const sy = this.height / (maxY - minY)
		const toPx = ([x, y]: XY): XY => [(x - minX) * sx, (maxY - y) * sy]
		const bufferX = this.bufferSize / sx
		const bufferY = this.bufferSize / sy
		const extent: ProjectedBbox = [
			minX - bufferX,
			minY - bufferY,
			maxX + bufferX,
			maxY + bufferY,
		]

		for (const layer of this.layers) {
			for (const geometry of layer.geometries) {
				if (!bboxIntersects(geometry.bbox, extent)) continue
				drawGeometry(canvas, layer, geometry, toPx)
			}
		}
		return canvas
	}

	async renderToFile(bbox: ProjectedBbox, path: string): Promise<void> {
		const canvas = this.render(bbox)
		await saveImage(
			canvas.imageData,
			canvas.width,
			canvas.height,
			this.format,
			path,
		)
	}

	scaleDenominator(bbox: ProjectedBbox): number {
		const metresPerUnit =
			parseSrs(this.srs) === "lonlat" ? METRES_PER_DEGREE : 1
		const unitsPerPixel = (bbox[2] - bbox[0]) / this.width
		return (unitsPerPixel * metresPerUnit) / STANDARD_PIXEL_SIZE
	}
}

function projectGeometry(
	geometry: Geometry,
	project: (ll: Position) => XY,
): ProjectedGeometry {
	const bbox = emptyBbox()
	const projectAll = (coords: Position[]) =>
		coords.map((ll) => {
			const xy = project(ll)
			extendBbox(bbox, xy[0], xy[1])
			return xy
		})

	switch (geometry.type) {
		case "Point":
			return { kind: "points", points: projectAll([geometry.coordinates]), bbox }
		case "MultiPoint":
			return { kind: "points", points: projectAll(geometry.coordinates), bbox }
		case "LineString":
			return { kind: "lines", lines: [projectAll(geometry.coordinates)], bbox }
		case "MultiLineString":
			return {
				kind: "lines",
				lines: geometry.coordinates.map(projectAll),
				bbox,
			}
		case "Polygon":
			return {
				kind: "polygons",
				polygons: [geometry.coordinates.map(projectAll)],
				bbox,
			}
		case "MultiPolygon":
			return {
				kind: "polygons",
				polygons: geometry.coordinates.map((rings) => rings.map(projectAll)),
				bbox,
			}
	}
}

/**
 * Fill layers draw polygons, line layers draw lines and polygon outlines, circle
 * layers draw points. Other pairings draw nothing.
 */
function drawGeometry(
	canvas: RasterCanvas,
	layer: ProjectedLayer,
	geometry: ProjectedGeometry,
	toPx: (xy: XY) => XY,
) {
	switch (layer.type) {
		case "fill":
			if (geometry.kind !== "polygons") return
			for (const rings of geometry.polygons) {
				canvas.drawPolygon(
					rings.map((ring) => ring.map(toPx)),
					layer.color,
				)
			}
			return
		case "line": {
			const lines =
				geometry.kind === "lines"
					? geometry.lines
					: geometry.kind === "polygons"
						? geometry.polygons.flat()
						: []
			for (const line of lines) {
				canvas.drawLineString(line.map(toPx), layer.color)
			}
			return
		}
		case "circle":
			if (geometry.kind !== "points") return
			for (const point of geometry.points) {
				canvas.drawCircle(toPx(point), layer.radius, layer.color)
			}
			return
	}
}

export interface RasterEngineFactoryOptions {
	stylePath: string
	tileSize: number
	format: TileFormat
}

/**
 * Build an engine factory for a style file. The style is read and validated on
 * the first call; every call returns a new engine.
 */
export function createRasterEngineFactory({
	stylePath,
	tileSize,
	format,
}: RasterEngineFactoryOptions): EngineFactory {
	let stylePromise: Promise<MapStyle> | null = null
	return async () => {
		if (!stylePromise) {
			stylePromise = loadStyle(stylePath).catch((error: unknown) => {
				stylePromise = null
				throw error
			})
		}
		const style = await stylePromise
		return new RasterMapEngine(style, { width: tileSize, format })
	}
}
