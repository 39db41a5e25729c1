import * as PImage from "pureimage"
import type { ImageFactory } from "./createUint8Bitmap"

export type PureImageBitmap = ReturnType<typeof PImage.make>

export const pureImageFactory: ImageFactory<PureImageBitmap> = (
  width,
  height,
) => PImage.make(width, height)
