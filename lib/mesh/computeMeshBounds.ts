import type { Mesh, MeshBounds } from "./types"

export function computeMeshBounds(mesh: Mesh): MeshBounds {
  const min: [number, number, number] = [Infinity, Infinity, Infinity]
  const max: [number, number, number] = [-Infinity, -Infinity, -Infinity]
  for (const tri of mesh.triangles) {
    for (const [x, y, z] of tri) {
      min[0] = Math.min(min[0], x)
      min[1] = Math.min(min[1], y)
      min[2] = Math.min(min[2], z)
      max[0] = Math.max(max[0], x)
      max[1] = Math.max(max[1], y)
      max[2] = Math.max(max[2], z)
    }
  }

  if (!isFinite(min[0])) {
    return {
      min: [-1, -1, -1],
      max: [1, 1, 1],
    }
  }

  return { min, max }
}

export function boundsCenter({ min, max }: MeshBounds): [number, number, number] {
  return [
    0.5 * (min[0] + max[0]),
    0.5 * (min[1] + max[1]),
    0.5 * (min[2] + max[2]),
  ]
}

export function boundsRadius({ min, max }: MeshBounds) {
  return 0.5 * Math.hypot(max[0] - min[0], max[1] - min[1], max[2] - min[2])
}
