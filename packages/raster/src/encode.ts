import sharp from "sharp"

export const TILE_FORMATS = [
	"jpg",
	"png",
	"png8",
	"png24",
	"png32",
	"png256",
	"webp",
] as const

export type TileFormat = (typeof TILE_FORMATS)[number]

export const DEFAULT_TILE_FORMAT: TileFormat = "png"

export function isTileFormat(value: string): value is TileFormat {
	return (TILE_FORMATS as readonly string[]).includes(value)
}

/**
 * File extension for a format: every PNG variant is stored as `.png`.
 */
export function tileExtension(format: TileFormat): string {
	return format.startsWith("png") ? "png" : format
}

function toSharp(
	data: Uint8ClampedArray,
	width: number,
	height: number,
	format: TileFormat,
) {
	const image = sharp(data, { raw: { width, height, channels: 4 } })
	switch (format) {
		case "jpg":
			return image.jpeg({ quality: 100 })
		case "webp":
			return image.webp({ lossless: true, quality: 100 })
		case "png8":
		case "png256":
			return image.png({ palette: true, colors: 256, compressionLevel: 9 })
		case "png24":
			return image.removeAlpha().png({ compressionLevel: 9 })
		case "png":
		case "png32":
			return image.png({ compressionLevel: 9 })
	}
}

/**
 * Encode raw RGBA pixels in the given tile format.
 */
export function encodeImage(
	data: Uint8ClampedArray,
	width: number,
	height: number,
	format: TileFormat,
): Promise<Buffer> {
	return toSharp(data, width, height, format).toBuffer()
}

/**
 * Encode raw RGBA pixels and write them to `path`.
 */
export async function saveImage(
	data: Uint8ClampedArray,
	width: number,
	height: number,
	format: TileFormat,
	path: string,
): Promise<void> {
	await toSharp(data, width, height, format).toFile(path)
}
