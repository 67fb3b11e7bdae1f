import type { ProjectedBbox } from "./types"

/**
 * Check if the two bboxes intersect or are contained within each other.
 * Touching edges count as intersecting.
 */
export function bboxIntersects(bb1: ProjectedBbox, bb2: ProjectedBbox) {
	return (
		bb1[0] <= bb2[2] && bb2[0] <= bb1[2] && bb1[1] <= bb2[3] && bb2[1] <= bb1[3]
	)
}

/**
 * Grow a bbox to include a point, returning the same array.
 */
export function extendBbox(bbox: ProjectedBbox, x: number, y: number) {
	if (x < bbox[0]) bbox[0] = x
	if (y < bbox[1]) bbox[1] = y
	if (x > bbox[2]) bbox[2] = x
	if (y > bbox[3]) bbox[3] = y
	return bbox
}

export function emptyBbox(): ProjectedBbox {
	return [
		Number.POSITIVE_INFINITY,
		Number.POSITIVE_INFINITY,
		Number.NEGATIVE_INFINITY,
		Number.NEGATIVE_INFINITY,
	]
}
