import type { CameraState } from "../camera/buildCamera"
import { multiply, rotationY, translation, type Mat4 } from "../math/matrix"
import { negate, ZERO_VEC3, type Vec3 } from "../math/vector"

/**
 * Everything that changes from one frame to the next. Owned by the frame
 * loop, which swaps in a new context between frames.
 */
export interface FrameContext {
  /** Rotation about the vertical axis, in radians. Never wrapped. */
  angle: number
  /** Object-space point the model spins around. */
  pivot: Vec3
  camera: CameraState
}

export function createFrameContext(
  camera: CameraState,
  { angle = 0, pivot = ZERO_VEC3 }: { angle?: number; pivot?: Vec3 } = {},
): FrameContext {
  return { angle, pivot, camera }
}

export function advanceFrameContext(
  ctx: FrameContext,
  step: number,
): FrameContext {
  return { ...ctx, angle: ctx.angle + step }
}

export function computeModelMatrix(ctx: FrameContext): Mat4 {
  return multiply(rotationY(ctx.angle), translation(negate(ctx.pivot)))
}
