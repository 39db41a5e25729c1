import type { Presenter } from "./types"

export interface WritableLike {
  write(chunk: string): unknown
}

export const CLEAR_SCREEN = "\x1b[2J\x1b[H"
const SHOW_CURSOR = "\x1b[?25h"
const HIDE_CURSOR = "\x1b[?25l"

export function createTerminalPresenter(
  out: WritableLike,
  { hideCursor = false }: { hideCursor?: boolean } = {},
): Presenter {
  let started = false
  return {
    present(frame) {
      let chunk = CLEAR_SCREEN
      if (hideCursor && !started) chunk = HIDE_CURSOR + chunk
      started = true
      out.write(`${chunk}${frame.rows().join("\n")}\n`)
    },
    close() {
      if (hideCursor && started) out.write(SHOW_CURSOR)
    },
  }
}
