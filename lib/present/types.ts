import type { FrameBuffer } from "../buffer/FrameBuffer"

/**
 * Display backend. Receives the finished frame once rasterization is done and
 * must treat it as read-only; the buffer is cleared again for the next frame.
 */
export interface Presenter {
  present(frame: FrameBuffer): void | Promise<void>
  close?(): void | Promise<void>
}
