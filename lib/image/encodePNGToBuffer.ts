import { PassThrough } from "readable-stream"
import * as PImage from "pureimage"
import type { PureImageBitmap } from "./pureImageFactory"

export async function encodePNGToBuffer(
  image: PureImageBitmap,
): Promise<Buffer> {
  const passThrough = new PassThrough()
  const chunks: Buffer[] = []
  passThrough.on("data", (chunk: Buffer | Uint8Array) => {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
  })
  const resultPromise = new Promise<Buffer>((resolve, reject) => {
    passThrough.on("end", () => resolve(Buffer.concat(chunks)))
    passThrough.on("error", reject)
  })
  // readable-stream's PassThrough is not typed as node's Writable
  await PImage.encodePNGToStream(image, passThrough as any)
  return await resultPromise
}
