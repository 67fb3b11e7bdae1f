import type { Rgba } from "@tilepress/shared/types"

export const TRANSPARENT: Rgba = [0, 0, 0, 0]

/**
 * Convert an sRGB channel (0..255) to linear light (0..1).
 * Uses the IEC 61966-2-1 transfer function (a piecewise EOTF with 2.4 gamma).
 */
function srgbToLinear(u: number) {
	const c = u / 255
	return c <= 0.04045 ? c / 12.92 : ((c + 0.055) / 1.055) ** 2.4
}

/**
 * Convert a linear-light channel (0..1) back to sRGB (0..255).
 * Inverse of `srgbToLinear`. Keep these two in sync.
 */
function linearToSrgb(x: number) {
	return x <= 0.0031308
		? 255 * (12.92 * x)
		: 255 * (1.055 * x ** (1 / 2.4) - 0.055)
}

function toByte(value: number) {
	return Math.round(Math.min(255, Math.max(0, value)))
}

/**
 * Composite an ordered list of RGBA pixels with Porter–Duff "source-over",
 * blending premultiplied colors in linear light.
 *
 * Drawing the same semi-transparent color repeatedly increases coverage:
 * α_n = 1 - (1 - α)^n. Order matters when colors differ.
 */
export function compositeRGBA(pixels: Rgba[]): Rgba {
	let [accR, accG, accB, accA] = [0, 0, 0, 0]

	for (const [r8, g8, b8, a8] of pixels) {
		if (
			r8 === undefined ||
			g8 === undefined ||
			b8 === undefined ||
			a8 === undefined
		)
			continue
		const a = a8 / 255
		accR = srgbToLinear(r8) * a + accR * (1 - a)
		accG = srgbToLinear(g8) * a + accG * (1 - a)
		accB = srgbToLinear(b8) * a + accB * (1 - a)
		accA = a + accA * (1 - a)
	}

	if (accA <= 0) return [0, 0, 0, 0]

	return [
		toByte(linearToSrgb(accR / accA)),
		toByte(linearToSrgb(accG / accA)),
		toByte(linearToSrgb(accB / accA)),
		toByte(accA * 255),
	]
}

/**
 * Parse a `#rrggbb` or `#rrggbbaa` hex string.
 */
export function parseHexColor(hex: string): Rgba {
	const match = /^#([0-9a-f]{6}|[0-9a-f]{8})$/i.exec(hex)
	if (!match?.[1]) throw Error(`Invalid hex color: "${hex}"`)
	const digits = match[1]
	const channel = (i: number) => Number.parseInt(digits.slice(i, i + 2), 16)
	return [
		channel(0),
		channel(2),
		channel(4),
		digits.length === 8 ? channel(6) : 255,
	]
}
