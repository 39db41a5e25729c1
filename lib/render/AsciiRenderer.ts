import type { Camera } from "../camera/buildCamera"
import { glyphCode, type FrameBuffer } from "../buffer/FrameBuffer"
import { multiply, transformPoint, type ReadonlyMat4 } from "../math/matrix"
import type { MutableVec3, Vec3 } from "../math/vector"
import type { Mesh, Triangle } from "../mesh/types"
import { barycentricAt, createBarycentricBasis } from "./computeBarycentric"
import { drawLine } from "./drawLine"
import { projectToScreen, type ScreenVertex } from "./projectToScreen"
import {
  computeFaceNormal,
  computeFlatIntensity,
  intensityToGlyph,
  isBackFacing,
} from "./shadeTriangle"

export interface ShadingSettings {
  lightDir: Vec3
  ambient: number
  glyphs: readonly string[]
}

export interface RenderStats {
  submitted: number
  behindCamera: number
  culled: number
  degenerate: number
  rasterized: number
  pixelsWritten: number
}

export function emptyRenderStats(): RenderStats {
  return {
    submitted: 0,
    behindCamera: 0,
    culled: 0,
    degenerate: 0,
    rasterized: 0,
    pixelsWritten: 0,
  }
}

export class AsciiRenderer {
  readonly frame: FrameBuffer

  constructor(frame: FrameBuffer) {
    this.frame = frame
  }

  drawMesh(
    mesh: Mesh,
    camera: Camera,
    model: ReadonlyMat4,
    eye: Vec3,
    shading: ShadingSettings,
    stats: RenderStats = emptyRenderStats(),
  ): RenderStats {
    const mvp = multiply(camera.proj, multiply(camera.view, model))
    for (const tri of mesh.triangles) {
      this.drawTriangle(tri, mvp, model, eye, shading, stats)
    }
    return stats
  }

  /**
   * Wireframe pass: every triangle edge as a depth-tested line in `glyph`.
   * Nothing is culled or shaded. A triangle with any vertex behind the camera
   * is dropped whole, as in the filled pass.
   */
  drawEdges(
    mesh: Mesh,
    camera: Camera,
    model: ReadonlyMat4,
    glyph: string,
    stats: RenderStats = emptyRenderStats(),
  ): RenderStats {
    const mvp = multiply(camera.proj, multiply(camera.view, model))
    const code = glyphCode(glyph)
    const { width, height } = this.frame
    for (const tri of mesh.triangles) {
      stats.submitted++
      const s0 = projectToScreen(transformPoint(mvp, tri[0]), width, height)
      const s1 = projectToScreen(transformPoint(mvp, tri[1]), width, height)
      const s2 = projectToScreen(transformPoint(mvp, tri[2]), width, height)
      if (!s0 || !s1 || !s2) {
        stats.behindCamera++
        continue
      }
      stats.rasterized++
      stats.pixelsWritten +=
        drawLine(this.frame, s0, s1, code) +
        drawLine(this.frame, s1, s2, code) +
        drawLine(this.frame, s2, s0, code)
    }
    return stats
  }

  drawTriangle(
    tri: Triangle,
    mvp: ReadonlyMat4,
    model: ReadonlyMat4,
    eye: Vec3,
    shading: ShadingSettings,
    stats: RenderStats = emptyRenderStats(),
  ): RenderStats {
    stats.submitted++
    const { width, height } = this.frame

    const s0 = projectToScreen(transformPoint(mvp, tri[0]), width, height)
    const s1 = projectToScreen(transformPoint(mvp, tri[1]), width, height)
    const s2 = projectToScreen(transformPoint(mvp, tri[2]), width, height)
    if (!s0 || !s1 || !s2) {
      stats.behindCamera++
      return stats
    }

    const p0 = toWorld(model, tri[0])
    const p1 = toWorld(model, tri[1])
    const p2 = toWorld(model, tri[2])
    const normal = computeFaceNormal(p0, p1, p2)
    if (isBackFacing(normal, p0, eye)) {
      stats.culled++
      return stats
    }

    const intensity = computeFlatIntensity(
      normal,
      shading.lightDir,
      shading.ambient,
    )
    const glyph = intensityToGlyph(intensity, shading.glyphs)

    const written = this.fillTriangle(s0, s1, s2, glyphCode(glyph))
    if (written < 0) {
      stats.degenerate++
    } else {
      stats.rasterized++
      stats.pixelsWritten += written
    }
    return stats
  }

  /**
   * Depth-tested fill of a screen-space triangle with one glyph code (see
   * `glyphCode`). Pixels whose centre lies on an edge are covered. Returns the
   * number of cells written, or -1 if the triangle has (near) zero area.
   */
  fillTriangle(
    s0: ScreenVertex,
    s1: ScreenVertex,
    s2: ScreenVertex,
    code: number,
  ): number {
    const { width, height } = this.frame
    const basis = createBarycentricBasis(
      [s0.x, s0.y],
      [s1.x, s1.y],
      [s2.x, s2.y],
    )
    if (!basis) return -1

    const minX = Math.max(0, Math.floor(Math.min(s0.x, s1.x, s2.x)))
    const maxX = Math.min(width - 1, Math.floor(Math.max(s0.x, s1.x, s2.x)))
    const minY = Math.max(0, Math.floor(Math.min(s0.y, s1.y, s2.y)))
    const maxY = Math.min(height - 1, Math.floor(Math.max(s0.y, s1.y, s2.y)))

    const bary: MutableVec3 = [0, 0, 0]
    let written = 0
    for (let y = minY; y <= maxY; y++) {
      for (let x = minX; x <= maxX; x++) {
        const [u, v, w] = barycentricAt(basis, x + 0.5, y + 0.5, bary)
        if (u < 0 || v < 0 || w < 0) continue

        const invW = u * s0.invW + v * s1.invW + w * s2.invW
        if (this.frame.testAndSetCode(x, y, code, invW)) written++
      }
    }
    return written
  }
}

function toWorld(model: ReadonlyMat4, p: Vec3): MutableVec3 {
  const [x, y, z] = transformPoint(model, p)
  return [x, y, z]
}
