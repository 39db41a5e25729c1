export {
  DEFAULT_BACKGROUND,
  FAR_DEPTH,
  FrameBuffer,
  glyphCode,
} from "./buffer/FrameBuffer"
export { Grid2D } from "./buffer/Grid2D"

export { buildCamera, frameCameraToMesh } from "./camera/buildCamera"
export type {
  Camera,
  CameraState,
  ProjectionSettings,
} from "./camera/buildCamera"

export {
  add,
  cross,
  dot,
  length,
  negate,
  normalize,
  scale,
  subtract,
  ZERO_VEC3,
} from "./math/vector"
export type { MutableVec3, MutableVec4, Vec3, Vec4 } from "./math/vector"
export {
  identity,
  lookAt,
  multiply,
  perspective,
  rotationY,
  transformPoint,
  transformVec4,
  translation,
} from "./math/matrix"
export type { Mat4, ReadonlyMat4 } from "./math/matrix"

export { parseOBJ, ObjParseError } from "./mesh/parseOBJ"
export type { ParseOBJOptions } from "./mesh/parseOBJ"
export {
  boundsCenter,
  boundsRadius,
  computeMeshBounds,
} from "./mesh/computeMeshBounds"
export type { Mesh, MeshBounds, Triangle } from "./mesh/types"

export {
  advanceFrameContext,
  computeModelMatrix,
  createFrameContext,
} from "./frame/FrameContext"
export type { FrameContext } from "./frame/FrameContext"
export { runFrameLoop } from "./frame/runFrameLoop"
export type { FrameLoopOptions, FrameLoopResult } from "./frame/runFrameLoop"

export { AsciiRenderer, emptyRenderStats } from "./render/AsciiRenderer"
export type { RenderStats, ShadingSettings } from "./render/AsciiRenderer"
export {
  barycentricAt,
  computeBarycentric,
  createBarycentricBasis,
  DEGENERATE_EPSILON,
} from "./render/computeBarycentric"
export type { BarycentricBasis, Point2 } from "./render/computeBarycentric"
export { drawLine } from "./render/drawLine"
export { projectToScreen } from "./render/projectToScreen"
export type { ScreenVertex } from "./render/projectToScreen"
export {
  computeFaceNormal,
  computeFlatIntensity,
  intensityToGlyph,
  intensityToGlyphIndex,
  isBackFacing,
} from "./render/shadeTriangle"
export { renderFrame } from "./render/renderFrame"
export type { FrameResult } from "./render/renderFrame"
export {
  DEFAULT_GLYPH_RAMP,
  DEFAULT_LIGHT_DIR,
  DEFAULT_RENDER_OPTIONS,
  getDefaultRenderOptions,
} from "./render/getDefaultRenderOptions"
export type {
  RenderOptions,
  RenderOptionsInput,
} from "./render/getDefaultRenderOptions"
export {
  RenderOptionsError,
  resolveRenderOptions,
} from "./render/resolveRenderOptions"
export type { ResolvedRenderOptions } from "./render/resolveRenderOptions"

export {
  CLEAR_SCREEN,
  createTerminalPresenter,
} from "./present/createTerminalPresenter"
export type { WritableLike } from "./present/createTerminalPresenter"
export { createPngPresenter } from "./present/createPngPresenter"
export type { PngPresenterOptions } from "./present/createPngPresenter"
export { glyphToGray, paintGlyphGrid } from "./present/paintGlyphGrid"
export type { PaintGlyphGridOptions } from "./present/paintGlyphGrid"
export type { Presenter } from "./present/types"

export { createUint8Bitmap, setBitmapPixel } from "./image/createUint8Bitmap"
export type { BitmapLike, ImageFactory, RGBA } from "./image/createUint8Bitmap"
export { pureImageFactory } from "./image/pureImageFactory"
export type { PureImageBitmap } from "./image/pureImageFactory"
export { encodePNGToBuffer } from "./image/encodePNGToBuffer"
