import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import sharp from "sharp"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { createRasterEngineFactory, RasterMapEngine } from "../src/engine"
import { parseStyle } from "../src/style"

const HALF_WORLD_METRES = 20037508.342789244

const square = {
	type: "Polygon",
	coordinates: [
		[
			[0, 0],
			[10, 0],
			[10, 10],
			[0, 10],
			[0, 0],
		],
	],
}

describe("RasterMapEngine", () => {
	let dir: string

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "tilepress-engine-"))
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it("maps the extent onto the pixel grid with north up", async () => {
		const style = await parseStyle(
			{
				srs: "EPSG:4326",
				layers: [{ id: "box", type: "fill", color: "#ff0000", data: square }],
			},
			dir,
		)
		const engine = new RasterMapEngine(style, { width: 20, format: "png" })
		const canvas = engine.render([0, 0, 20, 20])

		expect(canvas.getPixel([5, 15])).toEqual([255, 0, 0, 255])
		expect(canvas.getPixel([5, 5])).toEqual([0, 0, 0, 0])
		expect(canvas.getPixel([15, 15])).toEqual([0, 0, 0, 0])
	})

	it("paints the background before the layers", async () => {
		const style = await parseStyle(
			{
				srs: "EPSG:4326",
				background: "#0000ff",
				layers: [{ id: "box", type: "fill", color: "#ff0000", data: square }],
			},
			dir,
		)
		const engine = new RasterMapEngine(style, { width: 20, format: "png" })
		const canvas = engine.render([0, 0, 20, 20])

		expect(canvas.getPixel([5, 15])).toEqual([255, 0, 0, 255])
		expect(canvas.getPixel([15, 5])).toEqual([0, 0, 255, 255])
	})

	it("draws outlines of polygons on line layers", async () => {
		const style = await parseStyle(
			{
				srs: "EPSG:4326",
				layers: [{ id: "edge", type: "line", color: "#00ff00", data: square }],
			},
			dir,
		)
		const engine = new RasterMapEngine(style, { width: 20, format: "png" })
		const canvas = engine.render([-5, -5, 15, 15])

		expect(canvas.getPixel([5, 10])).toEqual([0, 255, 0, 255])
		expect(canvas.getPixel([10, 10])).toEqual([0, 0, 0, 0])
	})

	it("rejects empty extents", async () => {
		const style = await parseStyle({}, dir)
		const engine = new RasterMapEngine(style, { width: 8, format: "png" })
		expect(() => engine.render([1, 1, 1, 2])).toThrow(
			"Cannot render an empty extent: 1, 1, 1, 2",
		)
	})

	it("computes scale denominators in metres", async () => {
		const mercator = new RasterMapEngine(await parseStyle({}, dir), {
			width: 256,
			format: "png",
		})
		expect(
			mercator.scaleDenominator([
				-HALF_WORLD_METRES,
				-HALF_WORLD_METRES,
				HALF_WORLD_METRES,
				HALF_WORLD_METRES,
			]),
		).toBeCloseTo(559082264.0287, 3)

		const geographic = new RasterMapEngine(
			await parseStyle({ srs: "EPSG:4326" }, dir),
			{ width: 20, format: "png" },
		)
		expect(geographic.scaleDenominator([0, 0, 20, 20])).toBeCloseTo(
			397569609.976,
			2,
		)
	})

	it("saves rendered tiles in the requested format", async () => {
		const style = await parseStyle(
			{
				layers: [
					{
						id: "world",
						type: "fill",
						color: "#336699",
						data: {
							type: "Polygon",
							coordinates: [
								[
									[-180, -85],
									[180, -85],
									[180, 85],
									[-180, 85],
									[-180, -85],
								],
							],
						},
					},
				],
			},
			dir,
		)
		const world: [number, number, number, number] = [
			-HALF_WORLD_METRES,
			-HALF_WORLD_METRES,
			HALF_WORLD_METRES,
			HALF_WORLD_METRES,
		]

		const png = new RasterMapEngine(style, { width: 64, format: "png" })
		await png.renderToFile(world, join(dir, "tile.png"))
		const pngMeta = await sharp(join(dir, "tile.png")).metadata()
		expect(pngMeta.format).toBe("png")
		expect(pngMeta.width).toBe(64)
		expect(pngMeta.height).toBe(64)

		const jpg = new RasterMapEngine(style, { width: 64, format: "jpg" })
		await jpg.renderToFile(world, join(dir, "tile.jpg"))
		const jpgMeta = await sharp(join(dir, "tile.jpg")).metadata()
		expect(jpgMeta.format).toBe("jpeg")
		expect(jpgMeta.channels).toBe(3)
	})
})

describe("createRasterEngineFactory", () => {
	let dir: string

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "tilepress-factory-"))
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it("creates a separate engine on every call", async () => {
		const stylePath = join(dir, "style.json")
		await writeFile(stylePath, JSON.stringify({ bufferSize: 4 }))
		const factory = createRasterEngineFactory({
			stylePath,
			tileSize: 256,
			format: "webp",
		})

		const first = await factory()
		const second = await factory()
		expect(first).not.toBe(second)
		expect(first.srs).toBe("EPSG:3857")
		expect(first.bufferSize).toBe(4)

		first.bufferSize = 128
		expect(second.bufferSize).toBe(4)
	})

	it("surfaces style errors to every caller", async () => {
		const factory = createRasterEngineFactory({
			stylePath: join(dir, "missing.json"),
			tileSize: 256,
			format: "png",
		})
		await expect(factory()).rejects.toThrow("ENOENT")
		await expect(factory()).rejects.toThrow("ENOENT")
	})
})
