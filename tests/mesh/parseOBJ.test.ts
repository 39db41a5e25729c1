import { expect, test } from "vitest"
import { ObjParseError, parseOBJ } from "../../lib/mesh/parseOBJ"

const square = `
# a unit square
v 0 0 0
v 1 0 0
v 1 1 0
v 0 1 0
vt 0 0
vn 0 0 -1
f 1 2 3
f 1/1 3/1/1 4//1
`

test("reads vertices and triangular faces", () => {
  const mesh = parseOBJ(square)
  expect(mesh.triangles).toEqual([
    [
      [0, 0, 0],
      [1, 0, 0],
      [1, 1, 0],
    ],
    [
      [0, 0, 0],
      [1, 1, 0],
      [0, 1, 0],
    ],
  ])
})

test("negative indices count back from the latest vertex", () => {
  const mesh = parseOBJ("v 0 0 0\nv 2 0 0\nv 0 2 0\nf -3 -2 -1\n")
  expect(mesh.triangles[0]).toEqual([
    [0, 0, 0],
    [2, 0, 0],
    [0, 2, 0],
  ])
})

test("flipWinding swaps the last two vertices", () => {
  const mesh = parseOBJ("v 0 0 0\nv 2 0 0\nv 0 2 0\nf 1 2 3\n", {
    flipWinding: true,
  })
  expect(mesh.triangles[0]).toEqual([
    [0, 0, 0],
    [0, 2, 0],
    [2, 0, 0],
  ])
})

test("trailing comments, CRLF and unknown records are ignored", () => {
  const mesh = parseOBJ(
    "o thing\r\nv 0 0 0 # origin\r\nv 1 0 0\r\nv 0 1 0\r\ns off\r\nf 1 2 3\r\n",
  )
  expect(mesh.triangles).toHaveLength(1)
})

test("text without faces gives an empty mesh", () => {
  expect(parseOBJ("v 1 2 3\n")).toEqual({ triangles: [] })
})

test("quads are rejected with the line number", () => {
  const text = "v 0 0 0\nv 1 0 0\nv 1 1 0\nv 0 1 0\nf 1 2 3 4\n"
  expect(() => parseOBJ(text)).toThrow(
    "OBJ line 5: only triangular faces are supported, got 4 vertices",
  )
})

test.each([
  ["v 0 0 0\nf 1 2 3\n", "OBJ line 2: vertex index 2 out of range (1 vertices defined)"],
  ["v 0 0 0\nf 0 1 1\n", "OBJ line 2: vertex index 0 out of range (1 vertices defined)"],
  ["v 0 0 0\nf -2 1 1\n", "OBJ line 2: vertex index -2 out of range (1 vertices defined)"],
  ["v 0 0 0\nf a 1 1\n", 'OBJ line 2: invalid face vertex "a"'],
  ["v 0 zero 0\n", 'OBJ line 1: invalid number "zero"'],
  ["v 1 2\n", "OBJ line 1: vertex needs 3 coordinates, got 2"],
])("rejects %j", (text, message) => {
  expect(() => parseOBJ(text)).toThrow(message)
})

test("errors carry the failing line", () => {
  try {
    parseOBJ("\n\nv 1 2\n")
    expect.unreachable()
  } catch (err) {
    expect(err).toBeInstanceOf(ObjParseError)
    if (err instanceof ObjParseError) expect(err.line).toBe(3)
  }
})
