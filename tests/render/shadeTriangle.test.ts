import { expect, test } from "vitest"
import {
  computeFaceNormal,
  computeFlatIntensity,
  intensityToGlyph,
  intensityToGlyphIndex,
  isBackFacing,
} from "../../lib/render/shadeTriangle"

const RAMP = [...".:-=+*#%@"]

test("face normal follows the winding", () => {
  expect(computeFaceNormal([0, 0, 0], [1, 0, 0], [0, 1, 0])).toEqual([0, 0, 1])
  expect(computeFaceNormal([0, 0, 0], [0, 1, 0], [1, 0, 0])).toEqual([0, 0, -1])
})

test("a degenerate face has a zero normal", () => {
  expect(computeFaceNormal([0, 0, 0], [1, 1, 1], [2, 2, 2])).toEqual([0, 0, 0])
})

test("back-facing when the normal does not point away from the eye", () => {
  expect(isBackFacing([0, 0, 1], [0, 0, 0], [0, 0, -5])).toBe(false)
  expect(isBackFacing([0, 0, 1], [0, 0, 0], [0, 0, 5])).toBe(true)
  // edge-on counts as back-facing
  expect(isBackFacing([1, 0, 0], [0, 0, 0], [0, 0, -5])).toBe(true)
  expect(isBackFacing([0, 0, 0], [0, 0, 0], [0, 0, -5])).toBe(true)
})

test("a NaN normal is culled", () => {
  expect(isBackFacing([NaN, NaN, NaN], [0, 0, 0], [0, 0, -5])).toBe(true)
})

test("the view vector runs from the reference vertex to the eye", () => {
  expect(isBackFacing([0, 0, 1], [0, 0, 2], [0, 0, 1])).toBe(false)
  expect(isBackFacing([0, 0, 1], [0, 0, 2], [0, 0, 3])).toBe(true)
})

test("flat intensity is floored at the ambient term", () => {
  expect(computeFlatIntensity([0, 0, 1], [0, 0, -1], 0.1)).toBe(1)
  expect(computeFlatIntensity([0, 0, 1], [0, 0, 1], 0.1)).toBe(0.1)
  expect(computeFlatIntensity([0, 0, 0], [0, 0, -1], 0.1)).toBe(0.1)
  expect(computeFlatIntensity([1, 0, 0], [0, 0, 0], 0.25)).toBe(0.25)
})

test("intensity maps linearly onto the ramp", () => {
  expect(intensityToGlyph(0, RAMP)).toBe(".")
  expect(intensityToGlyph(0.1, RAMP)).toBe(":")
  expect(intensityToGlyph(0.5, RAMP)).toBe("+")
  expect(intensityToGlyph(1, RAMP)).toBe("@")
})

test("out-of-range intensities are clamped to the ramp ends", () => {
  expect(intensityToGlyph(2, RAMP)).toBe("@")
  expect(intensityToGlyph(-1, RAMP)).toBe(".")
})

test("a two-glyph ramp rounds at the midpoint", () => {
  expect(intensityToGlyph(0.49, ["a", "b"])).toBe("a")
  expect(intensityToGlyph(0.5, ["a", "b"])).toBe("b")
})

test("non-finite intensities fall back to the first glyph", () => {
  expect(intensityToGlyph(NaN, RAMP)).toBe(".")
  expect(intensityToGlyph(Infinity, RAMP)).toBe(".")
  expect(intensityToGlyphIndex(NaN, 9)).toBe(0)
  expect(intensityToGlyphIndex(0.5, 9)).toBe(4)
})
