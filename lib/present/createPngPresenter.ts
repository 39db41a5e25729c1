import * as fs from "node:fs"
import { encodePNGToBuffer } from "../image/encodePNGToBuffer"
import { pureImageFactory } from "../image/pureImageFactory"
import { paintGlyphGrid } from "./paintGlyphGrid"
import type { Presenter } from "./types"

export interface PngPresenterOptions {
  glyphs: readonly string[]
  cellWidth?: number
  cellHeight?: number
}

/**
 * Writes each presented frame to `outputPath` as a greyscale PNG, replacing
 * the previous one.
 */
export function createPngPresenter(
  outputPath: string,
  { glyphs, cellWidth = 4, cellHeight = 8 }: PngPresenterOptions,
): Presenter {
  return {
    async present(frame) {
      const bitmap = paintGlyphGrid(
        frame,
        { cellWidth, cellHeight, glyphs },
        pureImageFactory,
      )
      const pngBuffer = await encodePNGToBuffer(bitmap)
      await fs.promises.writeFile(outputPath, pngBuffer)
    },
  }
}
