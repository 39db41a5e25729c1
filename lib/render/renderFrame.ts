import { buildCamera, type Camera } from "../camera/buildCamera"
import type { FrameBuffer } from "../buffer/FrameBuffer"
import { computeModelMatrix, type FrameContext } from "../frame/FrameContext"
import type { Mesh } from "../mesh/types"
import {
  AsciiRenderer,
  emptyRenderStats,
  type RenderStats,
} from "./AsciiRenderer"
import type { ResolvedRenderOptions } from "./resolveRenderOptions"

export interface FrameResult {
  stats: RenderStats
  camera: Camera
}

/**
 * Clears `frame` and renders one frame of `mesh` into it. The viewport is the
 * buffer's current size, so a resize between frames takes effect here.
 */
export function renderFrame(
  frame: FrameBuffer,
  mesh: Mesh,
  ctx: FrameContext,
  options: ResolvedRenderOptions,
): FrameResult {
  frame.clear()

  const camera = buildCamera(ctx.camera, {
    width: frame.width,
    height: frame.height,
    fov: options.fov,
    near: options.near,
    far: options.far,
    cellAspect: options.cellAspect,
  })
  const model = computeModelMatrix(ctx)

  const renderer = new AsciiRenderer(frame)
  const stats = options.wireframe
    ? renderer.drawEdges(
        mesh,
        camera,
        model,
        options.glyphs[options.glyphs.length - 1] ?? "#",
        emptyRenderStats(),
      )
    : renderer.drawMesh(
        mesh,
        camera,
        model,
        ctx.camera.eye,
        {
          lightDir: options.lightDir,
          ambient: options.ambient,
          glyphs: options.glyphs,
        },
        emptyRenderStats(),
      )

  return { stats, camera }
}
