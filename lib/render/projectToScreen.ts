import type { Vec4 } from "../math/vector"

export interface ScreenVertex {
  x: number
  y: number
  /** 1 / clip w. Positive for every vertex in front of the camera. */
  invW: number
}

/**
 * Perspective divide and viewport mapping. Returns null for a vertex at or
 * behind the camera plane (w <= 0), which callers treat as dropping the whole
 * triangle.
 */
export function projectToScreen(
  clip: Vec4,
  width: number,
  height: number,
): ScreenVertex | null {
  const w = clip[3]
  if (!(w > 0) || !isFinite(w)) return null
  const invW = 1 / w
  const ndcX = clip[0] * invW
  const ndcY = clip[1] * invW
  return {
    x: (ndcX + 1) * 0.5 * width,
    // screen rows grow downwards, NDC y grows upwards
    y: (1 - ndcY) * 0.5 * height,
    invW,
  }
}
