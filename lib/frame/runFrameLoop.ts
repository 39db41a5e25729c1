import { setTimeout as sleep } from "node:timers/promises"
import type { FrameBuffer } from "../buffer/FrameBuffer"
import type { Mesh } from "../mesh/types"
import type { Presenter } from "../present/types"
import { emptyRenderStats, type RenderStats } from "../render/AsciiRenderer"
import { renderFrame } from "../render/renderFrame"
import type { ResolvedRenderOptions } from "../render/resolveRenderOptions"
import { advanceFrameContext, type FrameContext } from "./FrameContext"

export interface FrameLoopOptions {
  mesh: Mesh
  frame: FrameBuffer
  presenter: Presenter
  context: FrameContext
  options: ResolvedRenderOptions
  /** Frames per second cap. */
  fps: number
  /** Angle added to the context after every frame, in radians. */
  step: number
  /** Stop after this many frames. Runs until aborted when omitted. */
  frames?: number
  signal?: AbortSignal
  /** Called between frames, before rendering, e.g. to resize the buffer. */
  beforeFrame?: (frame: FrameBuffer, index: number) => void
}

export interface FrameLoopResult {
  framesRendered: number
  lastStats: RenderStats
  context: FrameContext
}

export async function runFrameLoop({
  mesh,
  frame,
  presenter,
  context,
  options,
  fps,
  step,
  frames,
  signal,
  beforeFrame,
}: FrameLoopOptions): Promise<FrameLoopResult> {
  const frameMs = fps > 0 ? 1000 / fps : 0
  let ctx = context
  let lastStats = emptyRenderStats()
  let framesRendered = 0

  while (!signal?.aborted && (frames === undefined || framesRendered < frames)) {
    const startedAt = performance.now()
    beforeFrame?.(frame, framesRendered)
    lastStats = renderFrame(frame, mesh, ctx, options).stats
    await presenter.present(frame)
    framesRendered++
    ctx = advanceFrameContext(ctx, step)

    if (frames !== undefined && framesRendered >= frames) break
    // yield to the event loop between frames, even past the frame budget
    const remaining = frameMs - (performance.now() - startedAt)
    try {
      await sleep(Math.max(0, remaining), undefined, { signal })
    } catch (err) {
      if (signal?.aborted) break
      throw err
    }
  }

  return { framesRendered, lastStats, context: ctx }
}
