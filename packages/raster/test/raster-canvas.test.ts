import type { XY } from "@tilepress/shared/types"
import { describe, expect, it } from "vitest"
import {
	DEFAULT_AREA_COLOR,
	DEFAULT_LINE_COLOR,
	DEFAULT_POINT_COLOR,
	RasterCanvas,
} from "../src/raster-canvas"

const TRANSPARENT = [0, 0, 0, 0]

function square(x0: number, y0: number, x1: number, y1: number): XY[] {
	return [
		[x0, y0],
		[x1, y0],
		[x1, y1],
		[x0, y1],
		[x0, y0],
	]
}

describe("RasterCanvas", () => {
	it("fills polygons where pixel centers are inside", () => {
		const canvas = new RasterCanvas(64, 64)
		canvas.drawPolygon([square(10, 10, 30, 30)])

		expect(canvas.getPixel([20, 20])).toEqual(DEFAULT_AREA_COLOR)
		expect(canvas.getPixel([10, 10])).toEqual(DEFAULT_AREA_COLOR)
		expect(canvas.getPixel([29, 29])).toEqual(DEFAULT_AREA_COLOR)
		expect(canvas.getPixel([30, 30])).toEqual(TRANSPARENT)
		expect(canvas.getPixel([5, 5])).toEqual(TRANSPARENT)
	})

	it("leaves holes empty with the even-odd rule", () => {
		const canvas = new RasterCanvas(64, 64)
		canvas.drawPolygon([square(0, 0, 40, 40), square(10, 10, 30, 30)])

		expect(canvas.getPixel([5, 5])).toEqual(DEFAULT_AREA_COLOR)
		expect(canvas.getPixel([20, 20])).toEqual(TRANSPARENT)
		expect(canvas.getPixel([35, 20])).toEqual(DEFAULT_AREA_COLOR)
	})

	it("fills polygons that extend past the canvas up to the edge", () => {
		const canvas = new RasterCanvas(16, 16, 8)
		canvas.drawPolygon([square(-100, -100, 8, 100)])

		expect(canvas.getPixel([0, 0])).toEqual(DEFAULT_AREA_COLOR)
		expect(canvas.getPixel([7, 15])).toEqual(DEFAULT_AREA_COLOR)
		expect(canvas.getPixel([8, 0])).toEqual(TRANSPARENT)
	})

	it("draws lines including both end pixels", () => {
		const canvas = new RasterCanvas(64, 64)
		canvas.drawLineString([
			[5.2, 5.7],
			[40.9, 36.1],
		])

		expect(canvas.getPixel([5, 5])).toEqual(DEFAULT_LINE_COLOR)
		expect(canvas.getPixel([40, 36])).toEqual(DEFAULT_LINE_COLOR)
		expect(canvas.getPixel([40, 5])).toEqual(TRANSPARENT)
	})

	it("clips lines that leave the canvas", () => {
		const canvas = new RasterCanvas(32, 32)
		canvas.drawLineString([
			[-50, 10.5],
			[100, 10.5],
		])

		for (let x = 0; x < 32; x++) {
			expect(canvas.getPixel([x, 10])).toEqual(DEFAULT_LINE_COLOR)
		}
		expect(canvas.getPixel([0, 11])).toEqual(TRANSPARENT)
	})

	it("draws circles centred just outside the canvas only inside the buffer", () => {
		const unbuffered = new RasterCanvas(32, 32)
		unbuffered.drawCircle([-1, 10], 3)
		expect(unbuffered.getPixel([0, 10])).toEqual(TRANSPARENT)

		const buffered = new RasterCanvas(32, 32, 4)
		buffered.drawCircle([-1, 10], 3)
		expect(buffered.getPixel([0, 10])).toEqual(DEFAULT_POINT_COLOR)
		expect(buffered.getPixel([3, 10])).toEqual(TRANSPARENT)
	})

	it("blends repeated translucent pixels", () => {
		const canvas = new RasterCanvas(4, 4)
		canvas.setPixel([1, 1], [255, 255, 255, 128])
		canvas.setPixel([1, 1], [255, 255, 255, 128])
		expect(canvas.getPixel([1, 1])).toEqual([255, 255, 255, 192])
	})

	it("ignores pixels outside the canvas", () => {
		const canvas = new RasterCanvas(4, 4)
		canvas.setPixel([4, 0], [255, 0, 0, 255])
		canvas.setPixel([-1, 2], [255, 0, 0, 255])
		expect(canvas.imageData.every((value) => value === 0)).toBe(true)
	})

	it("fills the whole canvas with a background", () => {
		const canvas = new RasterCanvas(3, 2)
		canvas.fill([1, 2, 3, 4])
		expect(Array.from(canvas.imageData)).toEqual([
			1, 2, 3, 4, 1, 2, 3, 4, 1, 2, 3, 4, 1, 2, 3, 4, 1, 2, 3, 4, 1, 2, 3, 4,
		])
	})
})
