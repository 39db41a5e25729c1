import { expect, test } from "vitest"
import {
  advanceFrameContext,
  computeModelMatrix,
  createFrameContext,
} from "../../lib/frame/FrameContext"
import { transformPoint } from "../../lib/math/matrix"
import type { CameraState } from "../../lib/camera/buildCamera"

const camera: CameraState = {
  eye: [0, 0, -5],
  target: [0, 0, 0],
  up: [0, 1, 0],
}

test("advancing returns a new context and leaves the old one alone", () => {
  const ctx = createFrameContext(camera)
  const next = advanceFrameContext(advanceFrameContext(ctx, 0.5), 0.25)
  expect(ctx.angle).toBe(0)
  expect(next.angle).toBe(0.75)
  expect(next.camera).toBe(camera)
})

test("the angle keeps growing past a full turn", () => {
  let ctx = createFrameContext(camera, { angle: 6 })
  ctx = advanceFrameContext(ctx, 1)
  expect(ctx.angle).toBe(7)
})

test("the model matrix spins around the pivot", () => {
  const model = computeModelMatrix(
    createFrameContext(camera, { angle: 1.2, pivot: [1, 2, 3] }),
  )
  const p = transformPoint(model, [1, 2, 3])
  expect(p[0]).toBeCloseTo(0, 12)
  expect(p[1]).toBeCloseTo(0, 12)
  expect(p[2]).toBeCloseTo(0, 12)
  expect(p[3]).toBe(1)
})

test("a quarter turn about the y axis sends +x to -z", () => {
  const model = computeModelMatrix(
    createFrameContext(camera, { angle: Math.PI / 2, pivot: [1, 0, 0] }),
  )
  const p = transformPoint(model, [2, 0, 0])
  expect(p[0]).toBeCloseTo(0, 12)
  expect(p[2]).toBeCloseTo(-1, 12)
})
