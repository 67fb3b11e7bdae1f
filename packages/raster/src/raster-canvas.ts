import type { Rgba, XY } from "@tilepress/shared/types"
import { clipPolygon, clipPolyline } from "lineclip"
import { compositeRGBA } from "./color"

export const DEFAULT_LINE_COLOR: Rgba = [255, 255, 255, 230] // semi-transparent white
export const DEFAULT_POINT_COLOR: Rgba = [255, 0, 0, 255] // red
export const DEFAULT_AREA_COLOR: Rgba = [0, 0, 255, 64] // low opacity blue
export const DEFAULT_POINT_RADIUS = 2

/**
 * An RGBA pixel buffer with drawing primitives in pixel coordinates.
 *
 * Geometry is clipped to the canvas grown by `bufferSize` pixels on every side
 * before it is drawn, so shapes that start just outside the canvas still cover
 * the pixels they reach inside it. Pixels are only ever written inside the canvas.
 */
export class RasterCanvas {
	readonly width: number
	readonly height: number
	readonly bufferSize: number
	readonly imageData: Uint8ClampedArray

	constructor(width: number, height: number, bufferSize = 0) {
		this.width = width
		this.height = height
		this.bufferSize = bufferSize
		this.imageData = new Uint8ClampedArray(width * height * 4)
	}

	/**
	 * Clip region as [minX, minY, maxX, maxY] in pixels.
	 */
	get clipBox(): [number, number, number, number] {
		const b = this.bufferSize
		return [-b, -b, this.width + b, this.height + b]
	}

	getIndex(px: XY) {
		return (px[1] * this.width + px[0]) * 4
	}

	getPixel(px: XY): Rgba {
		const idx = this.getIndex(px)
		return [
			this.imageData[idx] ?? 0,
			this.imageData[idx + 1] ?? 0,
			this.imageData[idx + 2] ?? 0,
			this.imageData[idx + 3] ?? 0,
		]
	}

	fill(color: Rgba) {
		for (let idx = 0; idx < this.imageData.length; idx += 4) {
			this.imageData[idx] = color[0] ?? 0
			this.imageData[idx + 1] = color[1] ?? 0
			this.imageData[idx + 2] = color[2] ?? 0
			this.imageData[idx + 3] = color[3] ?? 0
		}
	}

	/**
	 * Blend `color` over the pixel at integer position `px`. Positions outside the
	 * canvas are ignored.
	 */
	setPixel(px: XY, color: Rgba) {
		const [x, y] = px
		if (x < 0 || y < 0 || x >= this.width || y >= this.height) return
		const idx = this.getIndex(px)
		const composite =
			this.imageData[idx + 3] === 0
				? color
				: compositeRGBA([this.imageData.slice(idx, idx + 4), color])
		this.imageData[idx] = composite[0] ?? 0
		this.imageData[idx + 1] = composite[1] ?? 0
		this.imageData[idx + 2] = composite[2] ?? 0
		this.imageData[idx + 3] = composite[3] ?? 0
	}

	/**
	 * Bresenham line between two integer pixels, inclusive of both ends.
	 */
	drawLine(px0: XY, px1: XY, color: Rgba = DEFAULT_LINE_COLOR) {
		const dx = Math.abs(px1[0] - px0[0])
		const dy = Math.abs(px1[1] - px0[1])
		const sx = px0[0] < px1[0] ? 1 : -1
		const sy = px0[1] < px1[1] ? 1 : -1
		let err = dx - dy
		let x = px0[0]
		let y = px0[1]

		while (true) {
			this.setPixel([x, y], color)
			if (x === px1[0] && y === px1[1]) break
			const e2 = 2 * err
			if (e2 > -dy) {
				err -= dy
				x += sx
			}
			if (e2 < dx) {
				err += dx
				y += sy
			}
		}
	}

	drawLineString(coords: XY[], color: Rgba = DEFAULT_LINE_COLOR) {
		for (const part of clipPolyline(coords, this.clipBox)) {
			for (let i = 1; i < part.length; i++) {
				const prev = part[i - 1]
				const curr = part[i]
				if (!prev || !curr) continue
				this.drawLine(pixelOf(prev), pixelOf(curr), color)
			}
		}
	}

	/**
	 * Fill a polygon given as rings (outer first, then holes) using the even-odd
	 * rule. A pixel is filled when its center lies inside.
	 */
	drawPolygon(rings: XY[][], color: Rgba = DEFAULT_AREA_COLOR) {
		const clippedRings: XY[][] = []
		for (const ring of rings) {
			const clipped = clipPolygon(ring, this.clipBox)
			if (clipped.length >= 3) clippedRings.push(clipped)
		}
		if (clippedRings.length === 0) return
		this.fillPolygonScanline(clippedRings, color)
	}

	/**
	 * Draw a filled disc. Points within `bufferSize` of the canvas are drawn so
	 * their discs are not cut off at the edge.
	 */
	drawCircle(center: XY, radius: number, color: Rgba = DEFAULT_POINT_COLOR) {
		const [cx, cy] = center
		const [minX, minY, maxX, maxY] = this.clipBox
		if (cx < minX || cy < minY || cx > maxX || cy > maxY) return

		const r2 = radius * radius
		const x0 = Math.max(0, Math.floor(cx - radius))
		const x1 = Math.min(this.width - 1, Math.ceil(cx + radius))
		const y0 = Math.max(0, Math.floor(cy - radius))
		const y1 = Math.min(this.height - 1, Math.ceil(cy + radius))
		for (let y = y0; y <= y1; y++) {
			for (let x = x0; x <= x1; x++) {
				const ddx = x + 0.5 - cx
				const ddy = y + 0.5 - cy
				if (ddx * ddx + ddy * ddy <= r2) this.setPixel([x, y], color)
			}
		}
	}

	private fillPolygonScanline(rings: XY[][], color: Rgba) {
		let minY = Number.POSITIVE_INFINITY
		let maxY = Number.NEGATIVE_INFINITY
		for (const ring of rings) {
			for (const [, y] of ring) {
				if (y < minY) minY = y
				if (y > maxY) maxY = y
			}
		}
		const rowStart = Math.max(0, Math.floor(minY))
		const rowEnd = Math.min(this.height - 1, Math.ceil(maxY))

		for (let row = rowStart; row <= rowEnd; row++) {
			const scanY = row + 0.5
			const intersections: number[] = []

			for (const ring of rings) {
				for (let i = 0; i < ring.length; i++) {
					const p0 = ring[i]
					const p1 = ring[(i + 1) % ring.length]
					if (!p0 || !p1) continue
					const [x0, y0] = p0
					const [x1, y1] = p1
					if ((y0 <= scanY && scanY < y1) || (y1 <= scanY && scanY < y0)) {
						intersections.push(x0 + ((scanY - y0) * (x1 - x0)) / (y1 - y0))
					}
				}
			}

			intersections.sort((a, b) => a - b)

			for (let i = 0; i + 1 < intersections.length; i += 2) {
				const start = intersections[i]
				const end = intersections[i + 1]
				if (start === undefined || end === undefined) continue
				const x0 = Math.max(0, Math.ceil(start - 0.5))
				const x1 = Math.min(this.width - 1, Math.floor(end - 0.5))
				for (let x = x0; x <= x1; x++) {
					this.setPixel([x, row], color)
				}
			}
		}
	}
}

/**
 * The integer pixel containing a fractional position.
 */
function pixelOf(xy: XY): XY {
	return [Math.floor(xy[0]), Math.floor(xy[1])]
}
