import sharp from "sharp"
import { describe, expect, it } from "vitest"
import { encodeImage, isTileFormat, tileExtension } from "../src/encode"

function solid(width: number, height: number, rgba: number[]) {
	const data = new Uint8ClampedArray(width * height * 4)
	for (let i = 0; i < data.length; i += 4) data.set(rgba, i)
	return data
}

describe("tile formats", () => {
	it("stores every PNG variant as .png", () => {
		expect(tileExtension("png")).toBe("png")
		expect(tileExtension("png8")).toBe("png")
		expect(tileExtension("png256")).toBe("png")
		expect(tileExtension("jpg")).toBe("jpg")
		expect(tileExtension("webp")).toBe("webp")
	})

	it("recognizes known formats", () => {
		expect(isTileFormat("png24")).toBe(true)
		expect(isTileFormat("gif")).toBe(false)
	})
})

describe("encodeImage", () => {
	it("keeps the alpha channel for png", async () => {
		const buffer = await encodeImage(solid(4, 4, [10, 20, 30, 128]), 4, 4, "png")
		const meta = await sharp(buffer).metadata()
		expect(meta.format).toBe("png")
		expect(meta.channels).toBe(4)
		expect(meta.width).toBe(4)
	})

	it("drops the alpha channel for png24", async () => {
		const buffer = await encodeImage(
			solid(4, 4, [10, 20, 30, 255]),
			4,
			4,
			"png24",
		)
		const meta = await sharp(buffer).metadata()
		expect(meta.format).toBe("png")
		expect(meta.channels).toBe(3)
	})

	it("encodes webp losslessly", async () => {
		const buffer = await encodeImage(
			solid(2, 2, [200, 100, 50, 255]),
			2,
			2,
			"webp",
		)
		expect((await sharp(buffer).metadata()).format).toBe("webp")
		const { data } = await sharp(buffer)
			.raw()
			.toBuffer({ resolveWithObject: true })
		expect([data[0], data[1], data[2]]).toEqual([200, 100, 50])
	})
})
