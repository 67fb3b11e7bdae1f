#!/usr/bin/env tsx
import { runCli } from "./cli"

const INTERRUPTED_EXIT_CODE = 130

const controller = new AbortController()
process.once("SIGINT", () => {
	console.error("Ctrl-C detected, exiting...")
	controller.abort(Error("Interrupted"))
	process.exit(INTERRUPTED_EXIT_CODE)
})

process.exitCode = await runCli(process.argv.slice(2), {
	signal: controller.signal,
})
