import { describe, test, expect } from "vitest";
import { WgslSyntaxError, reflectWgsl } from "@shaderweave/extensions";
import { catchError } from "../_helpers/tree.js";

const SHADER = `
struct Camera {
  view_proj: mat4x4<f32>,
  @align(16) position: vec3<f32>,
}

struct Lights { items: array<vec4<f32>, 4> };

@group(0) @binding(0) var<uniform> camera: Camera;
@group(1) @binding(2) var<storage, read_write> lights: array<Lights>;
@group(1) @binding(0) var albedo: texture_2d<f32>;
var<private> scratch: f32 = 1.0;
const SCALE = 2.0;

fn helper(x: f32) -> f32 { return x * SCALE; }

@vertex
fn vs_main(@location(0) pos: vec3<f32>) -> @builtin(position) vec4<f32> {
  if (pos.x > 0.0) { return vec4<f32>(pos, 1.0); }
  return vec4<f32>(0.0);
}

@compute @workgroup_size(8, 4)
fn cs_main() {}
`;

describe("reflectWgsl", () => {
  const reflection = reflectWgsl(SHADER);

  test("structs and their member types", () => {
    expect(reflection.structs).toEqual([
      {
        name: "Camera",
        members: [
          { name: "view_proj", type: "mat4x4<f32>" },
          { name: "position", type: "vec3<f32>" },
        ],
      },
      { name: "Lights", members: [{ name: "items", type: "array<vec4<f32>,4>" }] },
    ]);
  });

  test("resource bindings in declaration order", () => {
    expect(reflection.bindings).toEqual([
      { group: 0, binding: 0, name: "camera", addressSpace: "uniform", access: null, type: "Camera" },
      { group: 1, binding: 2, name: "lights", addressSpace: "storage", access: "read_write", type: "array<Lights>" },
      { group: 1, binding: 0, name: "albedo", addressSpace: null, access: null, type: "texture_2d<f32>" },
    ]);
  });

  test("entry points only", () => {
    expect(reflection.entryPoints).toEqual([
      { name: "vs_main", stage: "vertex", workgroupSize: null },
      { name: "cs_main", stage: "compute", workgroupSize: [8, 4] },
    ]);
  });

  test("an empty module reflects to nothing", () => {
    expect(reflectWgsl("// nothing here\n")).toEqual({ structs: [], bindings: [], entryPoints: [] });
  });

  test("syntax errors carry a position", () => {
    const error = catchError(() => reflectWgsl("struct A { x f32 }"));

    expect(error).toBeInstanceOf(WgslSyntaxError);
    expect(error).toMatchObject({ reason: "Expected ':' but found 'f32'", line: 1, column: 14 });
  });

  test("binding indices must be literals", () => {
    expect(catchError(() => reflectWgsl("@group(G) @binding(0) var x: f32;"))).toMatchObject({
      reason: "@group arguments must be integer literals",
      line: 1,
      column: 1,
    });
  });

  test("workgroup sizes may be const expressions", () => {
    const source = "const WG: u32 = 64;\n@compute @workgroup_size(WG, WG / 2, 1u)\nfn main() {}\n";

    expect(reflectWgsl(source).entryPoints).toEqual([
      { name: "main", stage: "compute", workgroupSize: ["WG", "WG/2", 1] },
    ]);
  });

  test("truncated input", () => {
    expect(catchError(() => reflectWgsl("struct A {"))).toMatchObject({
      reason: "Unexpected end of input",
      line: 1,
      column: 10,
    });
  });
});
