import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { dirname, join } from "node:path"
import type { Progress, ProgressEvent } from "@tilepress/shared/progress"
import Database from "better-sqlite3"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { diskToMbtiles, listTiles, readTileMetadata } from "../src/mbtiles"

type TileRecord = {
	zoom_level: number
	tile_column: number
	tile_row: number
	tile_data: Buffer
}

describe("diskToMbtiles", () => {
	let dir: string
	let tileDir: string
	let archive: string
	let logs: Progress[]
	const onProgress = (event: ProgressEvent) => {
		logs.push(event.detail)
	}

	async function writeTile(path: string, contents: string) {
		const full = join(tileDir, path)
		await mkdir(dirname(full), { recursive: true })
		await writeFile(full, contents)
	}

	function readTiles(): TileRecord[] {
		const db = new Database(archive, { readonly: true })
		try {
			const rows: TileRecord[] = db
				.prepare<[], TileRecord>(
					"SELECT zoom_level, tile_column, tile_row, tile_data FROM tiles ORDER BY zoom_level, tile_column, tile_row",
				)
				.all()
			return rows
		} finally {
			db.close()
		}
	}

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "tilepress-mbtiles-"))
		tileDir = join(dir, "tiles")
		archive = join(dir, "world.mbtiles")
		logs = []
		await writeTile("0/0/0.png", "a")
		await writeTile("1/0/0.png", "b")
		await writeTile("1/1/0.png", "a")
		await writeTile("1/1/1.png", "c")
	})

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true })
	})

	it("lists only integer-named tiles of the requested format", async () => {
		await writeTile("1/1/notes.png", "x")
		await writeTile("1/0/1.jpg", "x")
		await writeTile("preview/0/0.png", "x")

		const tiles = await listTiles(tileDir, "png")
		expect(tiles.map(({ z, x, y }) => [z, x, y])).toEqual([
			[0, 0, 0],
			[1, 0, 0],
			[1, 1, 0],
			[1, 1, 1],
		])
		expect(tiles[0]?.path).toBe(join(tileDir, "0", "0", "0.png"))
	})

	it("flips xyz rows into TMS order", async () => {
		const count = await diskToMbtiles(tileDir, archive, {
			format: "png",
			onProgress,
		})

		expect(count).toBe(4)
		expect(
			readTiles().map((t) => [
				t.zoom_level,
				t.tile_column,
				t.tile_row,
				t.tile_data.toString(),
			]),
		).toEqual([
			[0, 0, 0, "a"],
			[1, 0, 1, "b"],
			[1, 1, 0, "c"],
			[1, 1, 1, "a"],
		])
		expect(logs.at(-1)?.msg).toBe(`Wrote 4 tiles to ${archive}`)
	})

	it("stores TMS directories as named", async () => {
		await diskToMbtiles(tileDir, archive, {
			format: "png",
			scheme: "tms",
			onProgress,
		})

		expect(
			readTiles().map((t) => [t.zoom_level, t.tile_column, t.tile_row]),
		).toEqual([
			[0, 0, 0],
			[1, 0, 0],
			[1, 1, 0],
			[1, 1, 1],
		])
	})

	it("stores identical tiles once when compressed", async () => {
		await diskToMbtiles(tileDir, archive, { format: "png", onProgress })

		const db = new Database(archive, { readonly: true })
		try {
			const images = db
				.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM images")
				.get()
			const map = db
				.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM map")
				.get()
			expect(images?.count).toBe(3)
			expect(map?.count).toBe(4)
		} finally {
			db.close()
		}
	})

	it("writes a plain tiles table without compression", async () => {
		await diskToMbtiles(tileDir, archive, {
			format: "png",
			compression: false,
			onProgress,
		})

		const db = new Database(archive, { readonly: true })
		try {
			const kinds = db
				.prepare<[], { name: string; type: string }>(
					"SELECT name, type FROM sqlite_master WHERE name IN ('tiles', 'images', 'map') ORDER BY name",
				)
				.all()
			expect(kinds).toEqual([{ name: "tiles", type: "table" }])
		} finally {
			db.close()
		}
		expect(readTiles()).toHaveLength(4)
	})

	it("copies metadata.json into the metadata table", async () => {
		await writeFile(
			join(tileDir, "metadata.json"),
			JSON.stringify({ name: "world", format: "png", minzoom: "0" }),
		)

		await diskToMbtiles(tileDir, archive, { format: "png", onProgress })

		const db = new Database(archive, { readonly: true })
		try {
			const rows = db
				.prepare<[], { name: string; value: string }>(
					"SELECT name, value FROM metadata ORDER BY name",
				)
				.all()
			expect(rows).toEqual([
				{ name: "format", value: "png" },
				{ name: "minzoom", value: "0" },
				{ name: "name", value: "world" },
			])
		} finally {
			db.close()
		}
	})

	it("refuses to overwrite an existing archive", async () => {
		await writeFile(archive, "")
		await expect(
			diskToMbtiles(tileDir, archive, { format: "png", onProgress }),
		).rejects.toThrow(`Archive already exists: ${archive}`)
	})

	it("rejects a metadata file that is not an object", async () => {
		await writeFile(join(tileDir, "metadata.json"), "[1, 2]")
		await expect(readTileMetadata(tileDir)).rejects.toThrow(
			"must contain a JSON object",
		)
	})
})
