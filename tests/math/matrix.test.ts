import { expect, test } from "vitest"
import {
  identity,
  lookAt,
  multiply,
  perspective,
  rotationY,
  transformPoint,
  transformVec4,
  translation,
} from "../../lib/math/matrix"

function expectClose(actual: readonly number[], expected: readonly number[]) {
  expect(actual).toHaveLength(expected.length)
  expected.forEach((value, i) => expect(actual[i]).toBeCloseTo(value, 10))
}

test("identity leaves vectors untouched", () => {
  expect(transformVec4(identity(), [1, -2, 3, 1])).toEqual([1, -2, 3, 1])
})

test("multiply(a, b) applies b first", () => {
  const t = translation([1, 0, 0])
  const r = rotationY(Math.PI / 2)
  // rotate (1,0,0) to (0,0,-1), then shift
  expectClose(transformPoint(multiply(t, r), [1, 0, 0]), [1, 0, -1, 1])
  // shift to (2,0,0), then rotate
  expectClose(transformPoint(multiply(r, t), [1, 0, 0]), [0, 0, -2, 1])
})

test("rotation wraps without an explicit modulo", () => {
  const full = rotationY(Math.PI * 2)
  expectClose(transformPoint(full, [1, 2, 3]), [1, 2, 3, 1])
})

test("perspective puts -z distance into w and maps near/far to -1/+1", () => {
  const proj = perspective(90, 1, 1, 10)
  expect(transformPoint(proj, [0, 0, -5])[3]).toBe(5)

  const near = transformPoint(proj, [0, 0, -1])
  expect(near[2] / near[3]).toBeCloseTo(-1, 10)
  const far = transformPoint(proj, [0, 0, -10])
  expect(far[2] / far[3]).toBeCloseTo(1, 10)
})

test("lookAt maps the eye to the origin and the target onto -z", () => {
  const view = lookAt([0, 0, -5], [0, 0, 0], [0, 1, 0])
  expectClose(transformPoint(view, [0, 0, -5]), [0, 0, 0, 1])
  expectClose(transformPoint(view, [0, 0, 0]), [0, 0, -5, 1])
  // looking down +z the world x axis points to the camera's left
  expectClose(transformPoint(view, [1, 0, 0]), [-1, 0, -5, 1])
  expectClose(transformPoint(view, [0, 1, 0]), [0, 1, -5, 1])
})

test("lookAt orthonormalizes a skewed up vector", () => {
  const view = lookAt([0, 0, -5], [0, 0, 0], [0.3, 2, 0.4])
  const p = transformPoint(view, [0, 0, 0])
  expectClose(p, [0, 0, -5, 1])
  const q = transformPoint(view, [0, 1, -5])
  expect(Math.hypot(q[0], q[1], q[2])).toBeCloseTo(1, 10)
})
