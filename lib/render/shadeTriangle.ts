import {
  cross,
  dot,
  negate,
  normalize,
  subtract,
  type MutableVec3,
  type Vec3,
} from "../math/vector"
import { clamp } from "../utils/clamp"

/** Unit normal of (p1 - p0) x (p2 - p0). Zero for a degenerate triangle. */
export function computeFaceNormal(
  p0: Vec3,
  p1: Vec3,
  p2: Vec3,
): MutableVec3 {
  return normalize(cross(subtract(p1, p0), subtract(p2, p0)))
}

/**
 * Single-sided test against the vector from `reference` (one of the
 * triangle's world-space vertices) to the eye. Only a strictly negative dot
 * product counts as front-facing, so zero and NaN normals (from overflowing
 * coordinates) are culled.
 */
export function isBackFacing(normal: Vec3, reference: Vec3, eye: Vec3) {
  return !(dot(normal, subtract(eye, reference)) < 0)
}

export function computeFlatIntensity(
  normal: Vec3,
  lightDir: Vec3,
  ambient: number,
) {
  return Math.max(dot(normal, negate(lightDir)), ambient)
}

/** Ramp index for `intensity`. Non-finite intensities map to 0. */
export function intensityToGlyphIndex(intensity: number, glyphCount: number) {
  const last = glyphCount - 1
  if (!Number.isFinite(intensity) || last <= 0) return 0
  return clamp(Math.round(intensity * last), 0, last)
}

export function intensityToGlyph(intensity: number, glyphs: readonly string[]) {
  return glyphs[intensityToGlyphIndex(intensity, glyphs.length)] ?? ""
}
