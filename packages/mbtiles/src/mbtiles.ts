/**
 * MBTiles packaging.
 *
 * Copies a `{z}/{x}/{y}.{ext}` tile directory, and the `metadata.json` at its
 * root, into a single SQLite archive following the MBTiles 1.x layout. Rows are
 * stored in the TMS order MBTiles expects.
 *
 * @module
 */

import { createHash } from "node:crypto"
import { existsSync } from "node:fs"
import { readdir, readFile } from "node:fs/promises"
import { join } from "node:path"
import {
	logProgress,
	type ProgressListener,
	progressEvent,
} from "@tilepress/shared/progress"
import Database from "better-sqlite3"

/**
 * Row order of the tile directory: `xyz` counts rows from the north, `tms`
 * from the south.
 */
export type TileScheme = "xyz" | "tms"

export interface DiskToMbtilesOptions {
	/** Extension of the tile files to import. Other files are ignored. */
	format: string
	scheme?: TileScheme
	/** Store identical tiles once, behind a `tiles` view. */
	compression?: boolean
	onProgress?: ProgressListener
}

export interface TileFile {
	z: number
	x: number
	y: number
	path: string
}

const INSERT_BATCH_SIZE = 256

const INTEGER_NAME = /^\d+$/

async function entryNames(dir: string, directories: boolean) {
	const entries = await readdir(dir, { withFileTypes: true })
	return entries
		.filter((entry) => entry.isDirectory() === directories)
		.map((entry) => entry.name)
}

/**
 * Tile files under `tileDir`, sorted by zoom, column and row. Directories that
 * are not named by an integer and files with another extension are skipped.
 */
export async function listTiles(
	tileDir: string,
	format: string,
): Promise<TileFile[]> {
	const suffix = `.${format}`
	const tiles: TileFile[] = []
	for (const zName of await entryNames(tileDir, true)) {
		if (!INTEGER_NAME.test(zName)) continue
		const zDir = join(tileDir, zName)
		for (const xName of await entryNames(zDir, true)) {
			if (!INTEGER_NAME.test(xName)) continue
			const xDir = join(zDir, xName)
			for (const file of await entryNames(xDir, false)) {
				if (!file.endsWith(suffix)) continue
				const yName = file.slice(0, -suffix.length)
				if (!INTEGER_NAME.test(yName)) continue
				tiles.push({
					z: Number(zName),
					x: Number(xName),
					y: Number(yName),
					path: join(xDir, file),
				})
			}
		}
	}
	return tiles.sort((a, b) => a.z - b.z || a.x - b.x || a.y - b.y)
}

/**
 * The string fields of `metadata.json`, or nothing when the file is missing.
 */
export async function readTileMetadata(
	tileDir: string,
): Promise<Record<string, string>> {
	const path = join(tileDir, "metadata.json")
	if (!existsSync(path)) return {}
	let parsed: unknown
	try {
		parsed = JSON.parse(await readFile(path, "utf8"))
	} catch (error) {
		throw Error(`${path} is not valid JSON`, { cause: error })
	}
	if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed))
		throw Error(`${path} must contain a JSON object`)
	const metadata: Record<string, string> = {}
	for (const [name, value] of Object.entries(parsed)) {
		metadata[name] = typeof value === "string" ? value : JSON.stringify(value)
	}
	return metadata
}

function createSchema(db: Database.Database, compression: boolean) {
	db.exec(`
		CREATE TABLE metadata (name TEXT, value TEXT);
		CREATE UNIQUE INDEX name ON metadata (name);
	`)
	if (compression) {
		db.exec(`
			CREATE TABLE images (tile_data BLOB, tile_id TEXT);
			CREATE TABLE map (
				zoom_level INTEGER,
				tile_column INTEGER,
				tile_row INTEGER,
				tile_id TEXT
			);
			CREATE UNIQUE INDEX images_id ON images (tile_id);
			CREATE UNIQUE INDEX map_index ON map (zoom_level, tile_column, tile_row);
			CREATE VIEW tiles AS
				SELECT
					map.zoom_level AS zoom_level,
					map.tile_column AS tile_column,
					map.tile_row AS tile_row,
					images.tile_data AS tile_data
				FROM map JOIN images ON images.tile_id = map.tile_id;
		`)
	} else {
		db.exec(`
			CREATE TABLE tiles (
				zoom_level INTEGER,
				tile_column INTEGER,
				tile_row INTEGER,
				tile_data BLOB
			);
			CREATE UNIQUE INDEX tile_index ON tiles (zoom_level, tile_column, tile_row);
		`)
	}
}

type TileRow = { z: number; x: number; row: number; data: Buffer }

function tileWriter(db: Database.Database, compression: boolean) {
	if (!compression) {
		const insert = db.prepare(
			"INSERT INTO tiles (zoom_level, tile_column, tile_row, tile_data) VALUES (?, ?, ?, ?)",
		)
		return db.transaction((rows: TileRow[]) => {
			for (const { z, x, row, data } of rows) insert.run(z, x, row, data)
		})
	}
	const insertImage = db.prepare(
		"INSERT OR IGNORE INTO images (tile_data, tile_id) VALUES (?, ?)",
	)
	const insertMap = db.prepare(
		"INSERT INTO map (zoom_level, tile_column, tile_row, tile_id) VALUES (?, ?, ?, ?)",
	)
	return db.transaction((rows: TileRow[]) => {
		for (const { z, x, row, data } of rows) {
			const id = createHash("sha1").update(data).digest("hex")
			insertImage.run(data, id)
			insertMap.run(z, x, row, id)
		}
	})
}

/**
 * Write every tile under `tileDir` into a new MBTiles archive at `archivePath`.
 * Fails if the archive already exists. Returns the number of tiles imported.
 */
export async function diskToMbtiles(
	tileDir: string,
	archivePath: string,
	{
		format,
		scheme = "xyz",
		compression = true,
		onProgress = logProgress,
	}: DiskToMbtilesOptions,
): Promise<number> {
	if (existsSync(archivePath))
		throw Error(`Archive already exists: ${archivePath}`)

	const metadata = await readTileMetadata(tileDir)
	const tiles = await listTiles(tileDir, format)
	onProgress(
		progressEvent(
			`Importing ${tiles.length} tiles from ${tileDir} into ${archivePath}`,
		),
	)

	const db = new Database(archivePath)
	try {
		db.pragma("synchronous = OFF")
		db.pragma("locking_mode = EXCLUSIVE")
		db.pragma("journal_mode = DELETE")
		createSchema(db, compression)

		const insertMetadata = db.prepare(
			"INSERT INTO metadata (name, value) VALUES (?, ?)",
		)
		db.transaction(() => {
			for (const [name, value] of Object.entries(metadata))
				insertMetadata.run(name, value)
		})()

		const writeTiles = tileWriter(db, compression)
		for (let i = 0; i < tiles.length; i += INSERT_BATCH_SIZE) {
			const rows: TileRow[] = []
			for (const { z, x, y, path } of tiles.slice(i, i + INSERT_BATCH_SIZE)) {
				const row = scheme === "xyz" ? 2 ** z - 1 - y : y
				rows.push({ z, x, row, data: await readFile(path) })
			}
			writeTiles(rows)
			onProgress(
				progressEvent(
					`Imported ${Math.min(i + INSERT_BATCH_SIZE, tiles.length)} of ${tiles.length} tiles`,
					"debug",
				),
			)
		}

		db.exec("ANALYZE")
		db.exec("VACUUM")
	} finally {
		db.close()
	}

	onProgress(progressEvent(`Wrote ${tiles.length} tiles to ${archivePath}`))
	return tiles.length
}
