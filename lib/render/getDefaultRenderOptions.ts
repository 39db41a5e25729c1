export const DEFAULT_LIGHT_DIR = [-0.3, -0.5, -0.8] as const

/** Sparse to dense. Index 0 is the darkest glyph a lit face can get. */
export const DEFAULT_GLYPH_RAMP = ".:-=+*#%@"

export interface RenderOptions {
  /** Character columns. */
  width: number
  /** Character rows. */
  height: number
  /** Vertical field of view in degrees. */
  fov: number
  near: number
  far: number
  /**
   * Width of one character cell divided by its height. Terminal cells are
   * roughly twice as tall as they are wide.
   */
  cellAspect: number
  ambient: number
  lightDir: readonly [number, number, number]
  ramp: string
  background: string
  /** Draw triangle edges in the densest glyph instead of shaded faces. */
  wireframe: boolean
}

export type RenderOptionsInput = Partial<RenderOptions>

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  width: 80,
  height: 40,
  fov: 60,
  near: 0.1,
  far: 100,
  cellAspect: 0.5,
  ambient: 0.1,
  lightDir: DEFAULT_LIGHT_DIR,
  ramp: DEFAULT_GLYPH_RAMP,
  background: " ",
  wireframe: false,
}

export function getDefaultRenderOptions(): RenderOptions {
  return { ...DEFAULT_RENDER_OPTIONS }
}
