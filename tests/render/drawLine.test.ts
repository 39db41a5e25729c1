import { expect, test } from "vitest"
import { FrameBuffer, glyphCode } from "../../lib/buffer/FrameBuffer"
import { drawLine } from "../../lib/render/drawLine"
import type { ScreenVertex } from "../../lib/render/projectToScreen"

const sv = (x: number, y: number, invW = 1): ScreenVertex => ({ x, y, invW })
const HASH = glyphCode("#")

test("steps a shallow line one column at a time", () => {
  const frame = new FrameBuffer(5, 3)
  expect(drawLine(frame, sv(0.5, 0.5), sv(4.5, 2.5), HASH)).toBe(5)
  expect(frame.rows()).toEqual(["#    ", " ##  ", "   ##"])
})

test("steps a steep line one row at a time", () => {
  const frame = new FrameBuffer(3, 4)
  expect(drawLine(frame, sv(0.5, 0.5), sv(1.5, 3.5), HASH)).toBe(4)
  expect(frame.rows()).toEqual(["#  ", "#  ", " # ", " # "])
})

test("a zero-length line writes its single cell", () => {
  const frame = new FrameBuffer(3, 3)
  expect(drawLine(frame, sv(1.2, 1.7, 0.5), sv(1.9, 1.1, 0.5), HASH)).toBe(1)
  expect(frame.rows()).toEqual(["   ", " # ", "   "])
  expect(frame.getDepth(1, 1)).toBe(0.5)
})

test("lines are clipped to the grid", () => {
  const frame = new FrameBuffer(5, 3)
  expect(drawLine(frame, sv(-10, 1.5), sv(20, 1.5), HASH)).toBe(5)
  expect(frame.rows()).toEqual(["     ", "#####", "     "])
})

test("far off-screen endpoints are clipped before stepping", () => {
  const frame = new FrameBuffer(5, 3)
  expect(drawLine(frame, sv(-1e12, 0.5), sv(1e12, 0.5), HASH)).toBe(5)
  expect(frame.rows()[0]).toBe("#####")
})

test("a line entirely outside the grid writes nothing", () => {
  const frame = new FrameBuffer(5, 3)
  expect(drawLine(frame, sv(-3, -1), sv(8, -2), HASH)).toBe(0)
  expect(drawLine(frame, sv(0, 0), sv(NaN, 2), HASH)).toBe(0)
  expect(frame.rows()).toEqual(["     ", "     ", "     "])
})

test("reciprocal w is interpolated along the line and depth tested", () => {
  const frame = new FrameBuffer(5, 1)
  drawLine(frame, sv(0.5, 0.5, 1), sv(4.5, 0.5, 0.5), HASH)
  expect(frame.getDepth(0, 0)).toBe(1)
  expect(frame.getDepth(2, 0)).toBe(0.75)
  expect(frame.getDepth(4, 0)).toBe(0.5)
  // a farther line over the same cells is hidden
  expect(drawLine(frame, sv(0.5, 0.5, 0.25), sv(4.5, 0.5, 0.25), HASH)).toBe(0)
})
