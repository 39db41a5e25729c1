import type { Vec3 } from "../math/vector"
import type { Mesh, Triangle } from "./types"

export class ObjParseError extends Error {
  readonly line: number

  constructor(line: number, message: string) {
    super(`OBJ line ${line}: ${message}`)
    this.name = "ObjParseError"
    this.line = line
  }
}

export interface ParseOBJOptions {
  /**
   * Swap the second and third vertex of every face. Use for models whose faces
   * wind counter-clockwise when seen from outside.
   */
  flipWinding?: boolean
}

/**
 * Reads `v` and `f` records from Wavefront OBJ text into independent
 * triangles. Face vertices may be written `i`, `i/t`, `i/t/n` or `i//n`;
 * indices are 1-based and negative ones count back from the latest vertex.
 * Every other record type is skipped.
 */
export function parseOBJ(text: string, options: ParseOBJOptions = {}): Mesh {
  const vertices: Vec3[] = []
  const triangles: Triangle[] = []
  const lines = text.split(/\r?\n/)

  for (let n = 0; n < lines.length; n++) {
    const lineNo = n + 1
    const line = lines[n]!.replace(/#.*/, "").trim()
    if (!line) continue
    const [type, ...rest] = line.split(/\s+/)

    if (type === "v") {
      if (rest.length < 3) {
        throw new ObjParseError(
          lineNo,
          `vertex needs 3 coordinates, got ${rest.length}`,
        )
      }
      const [x, y, z] = rest.slice(0, 3).map((tok) => parseNumber(tok, lineNo))
      vertices.push([x!, y!, z!])
    } else if (type === "f") {
      if (rest.length !== 3) {
        throw new ObjParseError(
          lineNo,
          `only triangular faces are supported, got ${rest.length} vertices`,
        )
      }
      const [a, b, c] = rest.map((tok) => resolveVertex(tok, vertices, lineNo))
      triangles.push(options.flipWinding ? [a!, c!, b!] : [a!, b!, c!])
    }
  }

  return { triangles }
}

function parseNumber(tok: string, lineNo: number) {
  const value = Number(tok)
  if (!Number.isFinite(value)) {
    throw new ObjParseError(lineNo, `invalid number "${tok}"`)
  }
  return value
}

function resolveVertex(tok: string, vertices: Vec3[], lineNo: number): Vec3 {
  const ref = tok.split("/")[0]!
  if (!/^-?\d+$/.test(ref)) {
    throw new ObjParseError(lineNo, `invalid face vertex "${tok}"`)
  }
  const idx = Number.parseInt(ref, 10)
  const resolved = idx < 0 ? vertices.length + idx : idx - 1
  const v = vertices[resolved]
  if (idx === 0 || !v) {
    throw new ObjParseError(
      lineNo,
      `vertex index ${idx} out of range (${vertices.length} vertices defined)`,
    )
  }
  return v
}
