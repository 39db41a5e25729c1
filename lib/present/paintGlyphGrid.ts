import type { FrameBuffer } from "../buffer/FrameBuffer"
import {
  setBitmapPixel,
  type BitmapLike,
  type ImageFactory,
} from "../image/createUint8Bitmap"

export interface PaintGlyphGridOptions {
  cellWidth: number
  cellHeight: number
  /** Ramp used for the frame; a glyph's position in it sets the grey level. */
  glyphs: readonly string[]
}

/**
 * Grey level for one cell: 0 for the background, otherwise the glyph's ramp
 * position scaled so the densest glyph is 255. Glyphs outside the ramp are
 * drawn white.
 */
export function glyphToGray(
  glyph: string,
  glyphs: readonly string[],
  background: string,
) {
  if (glyph === background) return 0
  const i = glyphs.indexOf(glyph)
  if (i < 0) return 255
  return Math.round((255 * (i + 1)) / glyphs.length)
}

/**
 * Paints every cell of `frame` as a solid `cellWidth` x `cellHeight` block.
 * No font rendering happens here.
 */
export function paintGlyphGrid<T extends BitmapLike = BitmapLike>(
  frame: FrameBuffer,
  { cellWidth, cellHeight, glyphs }: PaintGlyphGridOptions,
  imageFactory: ImageFactory<T>,
): T {
  const bitmap = imageFactory(frame.width * cellWidth, frame.height * cellHeight)
  const rows = frame.rows()
  for (let cy = 0; cy < rows.length; cy++) {
    const row = rows[cy]!
    for (let cx = 0; cx < row.length; cx++) {
      const g = glyphToGray(row[cx]!, glyphs, frame.background)
      for (let py = 0; py < cellHeight; py++) {
        for (let px = 0; px < cellWidth; px++) {
          setBitmapPixel(
            bitmap,
            cx * cellWidth + px,
            cy * cellHeight + py,
            [g, g, g, 255],
          )
        }
      }
    }
  }
  return bitmap
}
