import { describe, test, expect, afterEach } from "vitest";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { ExtensionError, buildShaderDir, silentLogger } from "@shaderweave/core";
import { MinifierExtension, MinifyError, ShaderToolErrorCode, minifyWgsl } from "@shaderweave/extensions";
import { catchError, createWorkspace, type Workspace } from "../_helpers/tree.js";

// =============================================================================
// minifyWgsl
// =============================================================================

describe("minifyWgsl", () => {
  test("drops comments and surplus whitespace", () => {
    const source = [
      "// c",
      "struct A { x: f32, };",
      "@fragment",
      "fn main() -> @location(0) vec4<f32> {",
      "  return vec4<f32>(1.0);",
      "}",
      "",
    ].join("\n");

    expect(minifyWgsl(source)).toBe("struct A{x:f32,};@fragment fn main()->@location(0)vec4<f32>{return vec4<f32>(1.0);}\n");
  });

  test("keeps tokens that would fuse apart", () => {
    expect(minifyWgsl("let a = b - -c;")).toBe("let a=b- -c;\n");
    expect(minifyWgsl("var<private> v: array<f32, 2> = array<f32, 2>(1.0, 2.0);")).toBe(
      "var<private>v:array<f32,2> =array<f32,2>(1.0,2.0);\n",
    );
  });

  test("empty input stays empty", () => {
    expect(minifyWgsl("  // only a comment\n")).toBe("");
  });

  test("rejects mismatched brackets", () => {
    const error = catchError(() => minifyWgsl("fn a() { (]"));

    expect(error).toBeInstanceOf(MinifyError);
    expect(error).toMatchObject({
      code: ShaderToolErrorCode.MINIFY,
      line: 1,
      column: 11,
      message: "']' closes '(' opened at 1:10 at 1:11",
    });
  });

  test("rejects unclosed and unmatched brackets", () => {
    expect(catchError(() => minifyWgsl("fn a() {"))).toMatchObject({ message: "Unclosed '{' at 1:8" });
    expect(catchError(() => minifyWgsl(")"))).toMatchObject({ message: "Unmatched ')' at 1:1" });
  });

  test("rejects an unterminated comment", () => {
    expect(catchError(() => minifyWgsl("/* open", "x.wgsl"))).toMatchObject({
      code: ShaderToolErrorCode.MINIFY,
      file: "x.wgsl",
      line: 1,
      column: 1,
      message: "Unterminated block comment at 1:1",
    });
  });
});

// =============================================================================
// MinifierExtension
// =============================================================================

describe("MinifierExtension", () => {
  let ws: Workspace | null = null;

  afterEach(() => {
    ws?.cleanup();
    ws = null;
  });

  function build(extension: MinifierExtension, files: Record<string, string>): Workspace {
    ws = createWorkspace(files);
    buildShaderDir({
      shaderRoot: ws.shaders,
      outDir: ws.out,
      extensions: [extension],
      publish: [],
      logger: silentLogger,
    });
    return ws;
  }

  test("rewrites every artifact in place", () => {
    const { out } = build(new MinifierExtension(), { "a.wgsl": "// hi\nfn a() { }\n" });

    expect(readFileSync(join(out, "package_1_a.wgsl"), "utf-8")).toBe("fn a(){}\n");
  });

  test("releaseOnly leaves artifacts alone outside production", () => {
    const extension = new MinifierExtension({ releaseOnly: true, env: { NODE_ENV: "development" } });
    const { out } = build(extension, { "a.wgsl": "// hi\nfn a() { }\n" });

    expect(extension.isActive).toBe(false);
    expect(readFileSync(join(out, "package_1_a.wgsl"), "utf-8")).toBe("// hi\nfn a() { }\n");
  });

  test("releaseOnly minifies in production", () => {
    const extension = new MinifierExtension({ releaseOnly: true, env: { NODE_ENV: "production" } });
    const { out } = build(extension, { "a.wgsl": "fn a() { }\n" });

    expect(extension.isActive).toBe(true);
    expect(readFileSync(join(out, "package_1_a.wgsl"), "utf-8")).toBe("fn a(){}\n");
  });

  test("invalid artifacts fail the build", () => {
    const error = catchError(() => build(new MinifierExtension(), { "a.wgsl": "fn a() {\n" }));

    expect(error).toBeInstanceOf(ExtensionError);
    expect(error).toMatchObject({ extensionName: "MinifierExtension", stage: "post-build" });
    expect(error instanceof Error ? error.cause : null).toBeInstanceOf(MinifyError);
  });
});
