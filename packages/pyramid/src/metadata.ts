import { writeFile } from "node:fs/promises"
import { join } from "node:path"
import { formatBounds } from "@tilepress/shared/bbox"
import type { GeoBbox2D } from "@tilepress/shared/types"

export const METADATA_FILE = "metadata.json"

export interface TilesetMetadata {
	name: string
	format: string
	bbox: GeoBbox2D
	minZoom: number
	maxZoom: number
	attribution?: string
	description?: string
	type?: string
	version?: string
}

/**
 * The string fields of a tile directory's `metadata.json`, without empty
 * values and with keys sorted.
 */
export function metadataRecord(
	metadata: TilesetMetadata,
): Record<string, string> {
	const fields: Record<string, string | undefined> = {
		name: metadata.name,
		format: metadata.format,
		bounds: formatBounds(metadata.bbox),
		minzoom: String(metadata.minZoom),
		maxzoom: String(metadata.maxZoom),
		attribution: metadata.attribution,
		description: metadata.description,
		type: metadata.type,
		version: metadata.version,
	}
	const record: Record<string, string> = {}
	for (const key of Object.keys(fields).sort()) {
		const value = fields[key]
		if (value) record[key] = value
	}
	return record
}

/**
 * Write `metadata.json` at the root of `tileDir` and return its path.
 */
export async function writeMetadata(
	tileDir: string,
	metadata: TilesetMetadata,
): Promise<string> {
	const path = join(tileDir, METADATA_FILE)
	await writeFile(path, JSON.stringify(metadataRecord(metadata), null, 4))
	return path
}
