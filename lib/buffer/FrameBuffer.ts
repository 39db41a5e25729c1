import { Grid2D } from "./Grid2D"

/** Reciprocal-w of an empty cell. Any visible surface has invW > 0. */
export const FAR_DEPTH = 0

export const DEFAULT_BACKGROUND = " "

/** Char code stored for `glyph`. Throws unless it is a single UTF-16 unit. */
export function glyphCode(glyph: string) {
  if (glyph.length !== 1) {
    throw new Error(`Glyph must be a single character, got "${glyph}"`)
  }
  return glyph.charCodeAt(0)
}

/**
 * Character grid plus a parallel reciprocal-w depth grid. Larger depth values
 * are nearer to the camera.
 */
export class FrameBuffer {
  readonly background: string
  private glyphs: Grid2D<Uint16Array>
  private depth: Grid2D<Float64Array>
  private readonly backgroundCode: number

  constructor(width: number, height: number, background = DEFAULT_BACKGROUND) {
    assertSize(width, height)
    this.background = background
    this.backgroundCode = glyphCode(background)
    this.glyphs = Grid2D.uint16(width, height)
    this.depth = Grid2D.float64(width, height)
    this.clear()
  }

  get width() {
    return this.glyphs.width
  }

  get height() {
    return this.glyphs.height
  }

  clear() {
    this.glyphs.fill(this.backgroundCode)
    this.depth.fill(FAR_DEPTH)
  }

  /** Reallocates both grids. The new buffer starts cleared. */
  resize(width: number, height: number) {
    assertSize(width, height)
    if (width === this.width && height === this.height) return
    this.glyphs = Grid2D.uint16(width, height)
    this.depth = Grid2D.float64(width, height)
    this.clear()
  }

  /** Unconditional write. Returns false (and writes nothing) off the grid. */
  set(x: number, y: number, glyph: string, depth: number) {
    const i = this.glyphs.indexOf(x, y)
    if (i < 0) return false
    this.glyphs.data[i] = glyphCode(glyph)
    this.depth.data[i] = depth
    return true
  }

  /**
   * Depth-tested write: stores the glyph only if `depth` is strictly nearer
   * than what the cell holds.
   */
  testAndSet(x: number, y: number, glyph: string, depth: number) {
    return this.testAndSetCode(x, y, glyphCode(glyph), depth)
  }

  /** `testAndSet` for a glyph already resolved with `glyphCode`. */
  testAndSetCode(x: number, y: number, code: number, depth: number) {
    const i = this.depth.indexOf(x, y)
    if (i < 0) return false
    if (!(depth > this.depth.data[i]!)) return false
    this.depth.data[i] = depth
    this.glyphs.data[i] = code
    return true
  }

  getGlyph(x: number, y: number): string | undefined {
    const code = this.glyphs.get(x, y)
    return code === undefined ? undefined : String.fromCharCode(code)
  }

  getDepth(x: number, y: number): number | undefined {
    return this.depth.get(x, y)
  }

  rows(): string[] {
    const out: string[] = []
    const { width, height, data } = this.glyphs
    for (let y = 0; y < height; y++) {
      let line = ""
      for (let x = 0; x < width; x++) {
        line += String.fromCharCode(data[y * width + x]!)
      }
      out.push(line)
    }
    return out
  }

  toString() {
    return this.rows().join("\n")
  }
}

function assertSize(width: number, height: number) {
  if (
    !Number.isInteger(width) ||
    !Number.isInteger(height) ||
    width <= 0 ||
    height <= 0
  ) {
    throw new Error(`Invalid frame buffer size ${width}x${height}`)
  }
}
