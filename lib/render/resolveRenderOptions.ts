import { normalize } from "../math/vector"
import {
  DEFAULT_RENDER_OPTIONS,
  type RenderOptions,
  type RenderOptionsInput,
} from "./getDefaultRenderOptions"

export class RenderOptionsError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "RenderOptionsError"
  }
}

/** Options after validation, with the ramp split into single glyphs. */
export interface ResolvedRenderOptions extends RenderOptions {
  glyphs: readonly string[]
}

export function resolveRenderOptions(
  options: RenderOptionsInput = {},
): ResolvedRenderOptions {
  const merged: RenderOptions = {
    ...DEFAULT_RENDER_OPTIONS,
    ...stripUndefined(options),
  }

  const { width, height, fov, near, far, cellAspect, ambient } = merged
  if (!Number.isInteger(width) || width <= 0) {
    throw new RenderOptionsError(`width must be a positive integer, got ${width}`)
  }
  if (!Number.isInteger(height) || height <= 0) {
    throw new RenderOptionsError(
      `height must be a positive integer, got ${height}`,
    )
  }
  if (!(fov > 0 && fov < 180)) {
    throw new RenderOptionsError(`fov must be in (0, 180) degrees, got ${fov}`)
  }
  if (!(near > 0)) {
    throw new RenderOptionsError(`near must be positive, got ${near}`)
  }
  if (!(far > near)) {
    throw new RenderOptionsError(`far (${far}) must be greater than near (${near})`)
  }
  if (!(cellAspect > 0)) {
    throw new RenderOptionsError(`cellAspect must be positive, got ${cellAspect}`)
  }
  if (!Number.isFinite(ambient)) {
    throw new RenderOptionsError(`ambient must be a number, got ${ambient}`)
  }
  if (merged.lightDir.some((c) => !Number.isFinite(c))) {
    throw new RenderOptionsError(
      `lightDir must be three finite numbers, got [${merged.lightDir.join(", ")}]`,
    )
  }

  const glyphs = [...merged.ramp]
  if (glyphs.some((g) => g.length !== 1)) {
    throw new RenderOptionsError(
      `ramp must be made of single-unit characters, got "${merged.ramp}"`,
    )
  }
  if (new Set(glyphs).size < 2) {
    throw new RenderOptionsError(
      `ramp needs at least 2 distinct glyphs, got "${merged.ramp}"`,
    )
  }
  if (merged.background.length !== 1) {
    throw new RenderOptionsError(
      `background must be a single character, got "${merged.background}"`,
    )
  }

  return {
    ...merged,
    lightDir: normalize(merged.lightDir),
    glyphs,
  }
}

function stripUndefined(options: RenderOptionsInput): RenderOptionsInput {
  const out: RenderOptionsInput = {}
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) Object.assign(out, { [key]: value })
  }
  return out
}
