import type { FrameBuffer } from "../buffer/FrameBuffer"
import { clamp } from "../utils/clamp"
import type { ScreenVertex } from "./projectToScreen"

/**
 * Depth-tested Bresenham line between two screen vertices. The segment is
 * clipped to the viewport first, so far off-screen endpoints cost nothing.
 * Reciprocal w is interpolated linearly along the line. Returns the number
 * of cells written.
 */
export function drawLine(
  frame: FrameBuffer,
  a: ScreenVertex,
  b: ScreenVertex,
  code: number,
): number {
  const { width, height } = frame
  if (!isFinite(a.x + a.y + b.x + b.y)) return 0

  // Liang-Barsky against [0, width] x [0, height]
  const dx = b.x - a.x
  const dy = b.y - a.y
  let t0 = 0
  let t1 = 1
  const edges: [number, number][] = [
    [-dx, a.x],
    [dx, width - a.x],
    [-dy, a.y],
    [dy, height - a.y],
  ]
  for (const [p, q] of edges) {
    if (p === 0) {
      if (q < 0) return 0
      continue
    }
    const r = q / p
    if (p < 0) {
      if (r > t1) return 0
      if (r > t0) t0 = r
    } else {
      if (r < t0) return 0
      if (r < t1) t1 = r
    }
  }

  let x0 = clamp(Math.floor(a.x + t0 * dx), 0, width - 1)
  let y0 = clamp(Math.floor(a.y + t0 * dy), 0, height - 1)
  const x1 = clamp(Math.floor(a.x + t1 * dx), 0, width - 1)
  const y1 = clamp(Math.floor(a.y + t1 * dy), 0, height - 1)
  const w0 = a.invW + t0 * (b.invW - a.invW)
  const w1 = a.invW + t1 * (b.invW - a.invW)

  const sx = x0 < x1 ? 1 : -1
  const sy = y0 < y1 ? 1 : -1
  const ex = Math.abs(x1 - x0)
  const ey = -Math.abs(y1 - y0)
  const steps = Math.max(ex, -ey)
  let err = ex + ey
  let written = 0

  for (let i = 0; ; i++) {
    const invW = steps === 0 ? w0 : w0 + (w1 - w0) * (i / steps)
    if (frame.testAndSetCode(x0, y0, code, invW)) written++
    if (x0 === x1 && y0 === y1) break
    const e2 = 2 * err
    if (e2 >= ey) {
      err += ey
      x0 += sx
    }
    if (e2 <= ex) {
      err += ex
      y0 += sy
    }
  }
  return written
}
