/**
 * Web Mercator tile pyramids.
 *
 * Enumerates the tiles covering a bounding box over a range of zooms and renders
 * them to `{z}/{x}/{y}.{ext}` files with a pool of workers, each owning its own
 * rendering engine.
 *
 * @example
 * ```ts
 * import { renderPyramid } from "@tilepress/pyramid"
 *
 * const stats = await renderPyramid({
 *   bbox: [-10, 35, 30, 60],
 *   minZoom: 1,
 *   maxZoom: 6,
 *   tileDir: "tiles",
 *   tileExt: "png",
 *   engineFactory: () => createEngine(),
 * })
 * ```
 *
 * @module
 */

export * from "./metadata"
export * from "./pipeline"
export * from "./render-worker"
export * from "./settings"
export * from "./tiles"
export * from "./work-queue"
