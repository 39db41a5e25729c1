import { lookAt, perspective, type Mat4 } from "../math/matrix"
import type { Vec3 } from "../math/vector"
import { boundsRadius, computeMeshBounds } from "../mesh/computeMeshBounds"
import type { Mesh } from "../mesh/types"
import { toRad } from "../utils/toRad"

export interface CameraState {
  eye: Vec3
  target: Vec3
  up: Vec3
}

export interface Camera {
  view: Mat4
  proj: Mat4
}

export interface ProjectionSettings {
  width: number
  height: number
  fov: number
  near: number
  far: number
  cellAspect: number
}

export function buildCamera(
  state: CameraState,
  { width, height, fov, near, far, cellAspect }: ProjectionSettings,
): Camera {
  const aspect = (width / height) * cellAspect
  return {
    view: lookAt(state.eye, state.target, state.up),
    proj: perspective(fov, aspect, near, far),
  }
}

/**
 * Places the camera on the -z axis looking at the origin, far enough back for
 * the mesh (rotated about its bounds centre) to fit the vertical fov.
 */
export function frameCameraToMesh(mesh: Mesh, fovDeg: number): CameraState {
  const radius = boundsRadius(computeMeshBounds(mesh)) || 1
  const dist = radius / Math.sin(toRad(fovDeg) * 0.5) + radius * 0.25
  return {
    eye: [0, 0, -dist],
    target: [0, 0, 0],
    up: [0, 1, 0],
  }
}
