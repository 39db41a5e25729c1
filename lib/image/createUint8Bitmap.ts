export type RGBA = readonly [number, number, number, number]

export interface BitmapLike {
  width: number
  height: number
  data: Uint8Array | Uint8ClampedArray
}

export type ImageFactory<T extends BitmapLike = BitmapLike> = (
  width: number,
  height: number,
) => T

export const createUint8Bitmap: ImageFactory = (width, height) => ({
  width,
  height,
  data: new Uint8ClampedArray(width * height * 4),
})

export function setBitmapPixel(
  bitmap: BitmapLike,
  x: number,
  y: number,
  [r, g, b, a]: RGBA,
) {
  if (x < 0 || y < 0 || x >= bitmap.width || y >= bitmap.height) return
  const idx = (y * bitmap.width + x) * 4
  bitmap.data[idx + 0] = r
  bitmap.data[idx + 1] = g
  bitmap.data[idx + 2] = b
  bitmap.data[idx + 3] = a
}
