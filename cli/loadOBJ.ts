import * as fs from "node:fs"
import { parseOBJ, type ParseOBJOptions } from "../lib/mesh/parseOBJ"
import type { Mesh } from "../lib/mesh/types"

export async function loadOBJ(
  objPath: string,
  options: ParseOBJOptions = {},
): Promise<Mesh> {
  const text = await fs.promises.readFile(objPath, "utf8")
  return parseOBJ(text, options)
}
