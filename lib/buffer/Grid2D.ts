type NumericArray = Float64Array | Float32Array | Uint16Array | Uint8Array

/**
 * Fixed-size row-major grid over a flat typed array. Every accessor is
 * bounds-checked: reads outside the grid return `undefined` and writes are
 * dropped.
 */
export class Grid2D<TArray extends NumericArray> {
  readonly width: number
  readonly height: number
  readonly data: TArray

  constructor(width: number, height: number, data: TArray) {
    if (data.length !== width * height) {
      throw new Error(
        `Grid2D backing array has ${data.length} cells, expected ${width}x${height}`,
      )
    }
    this.width = width
    this.height = height
    this.data = data
  }

  static float64(width: number, height: number) {
    return new Grid2D(width, height, new Float64Array(width * height))
  }

  static uint16(width: number, height: number) {
    return new Grid2D(width, height, new Uint16Array(width * height))
  }

  contains(x: number, y: number) {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 &&
      y >= 0 &&
      x < this.width &&
      y < this.height
    )
  }

  /** Flat index of (x, y), or -1 when the cell lies outside the grid. */
  indexOf(x: number, y: number) {
    return this.contains(x, y) ? y * this.width + x : -1
  }

  get(x: number, y: number): number | undefined {
    const i = this.indexOf(x, y)
    return i < 0 ? undefined : this.data[i]
  }

  set(x: number, y: number, value: number) {
    const i = this.indexOf(x, y)
    if (i < 0) return false
    this.data[i] = value
    return true
  }

  fill(value: number) {
    this.data.fill(value)
  }
}
