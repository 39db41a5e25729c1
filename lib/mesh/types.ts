import type { Vec3 } from "../math/vector"

/** Three positions in winding order. */
export type Triangle = readonly [Vec3, Vec3, Vec3]

export interface Mesh {
  triangles: readonly Triangle[]
}

export interface MeshBounds {
  min: [number, number, number]
  max: [number, number, number]
}
