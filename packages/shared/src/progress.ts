/**
 * Progress event helpers for long-running operations.
 *
 * Provides a standard interface for reporting progress and diagnostics from
 * workers and async operations. Uses CustomEvent so listeners can be shared
 * with any EventTarget.
 *
 * @module
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

/**
 * Progress payload containing a message, its level and a timestamp.
 */
export type Progress = {
	msg: string
	level: LogLevel
	timestamp: number
}

/** CustomEvent carrying progress details. */
export interface ProgressEvent extends CustomEvent<Progress> {}

export type ProgressListener = (progress: ProgressEvent) => void

/**
 * Create a Progress payload with current timestamp.
 * @param msg - The progress message.
 */
export function progress(msg: string, level: LogLevel = "info"): Progress {
	return {
		msg,
		level,
		timestamp: Date.now(),
	}
}

/**
 * Create a ProgressEvent with the given message.
 * @param msg - The progress message.
 */
export function progressEvent(
	msg: string,
	level: LogLevel = "info",
): ProgressEvent {
	return new CustomEvent("progress", { detail: progress(msg, level) })
}

/**
 * Log a progress event's message to the console. Debug events are dropped.
 */
export function logProgress(progress: ProgressEvent) {
	writeToConsole(progress, false)
}

/**
 * Create a listener that writes progress events to the console.
 * Debug events are only written when `verbose` is set.
 */
export function createProgressLogger({
	verbose = false,
}: {
	verbose?: boolean
} = {}): ProgressListener {
	return (progress) => writeToConsole(progress, verbose)
}

function writeToConsole(progress: ProgressEvent, verbose: boolean) {
	const { level, msg } = progress.detail
	switch (level) {
		case "debug":
			if (verbose) console.debug(msg)
			break
		case "info":
			console.log(msg)
			break
		case "warn":
			console.warn(msg)
			break
		case "error":
			console.error(msg)
			break
	}
}
