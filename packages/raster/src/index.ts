/**
 * @tilepress/raster - a small map rendering engine for raster tiles.
 *
 * Renders map styles made of GeoJSON layers into RGBA pixel buffers for an
 * arbitrary extent and encodes them as PNG, JPEG or WebP tiles.
 *
 * Key features:
 * - **Styles**: validated JSON documents with fill, line and circle layers.
 * - **Projection**: features are projected once into the style's spatial reference.
 * - **Buffering**: geometry is clipped to the extent grown by a pixel buffer.
 * - **Compositing**: alpha blending in linear color space.
 *
 * @example
 * ```ts
 * import { loadStyle, RasterMapEngine } from "@tilepress/raster"
 *
 * const style = await loadStyle("style.json")
 * const engine = new RasterMapEngine(style, { width: 256, format: "png" })
 * await engine.renderToFile([0, 0, 20037508.34, 20037508.34], "tile.png")
 * ```
 *
 * @module @tilepress/raster
 */

export * from "./color"
export * from "./encode"
export * from "./engine"
export * from "./raster-canvas"
export * from "./style"
