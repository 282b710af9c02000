import { describe, test, expect, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  ConfigError,
  ModulePath,
  OUT_DIR_ENV,
  ROOT_PATH_ENV,
  artifactNameFor,
  artifactPath,
  artifactPathFor,
  envSink,
  manifestSink,
} from "@shaderweave/core";

describe("artifact naming", () => {
  test("artifactPath joins the output dir and the mangled name", () => {
    expect(artifactPath("/out", "package_1_a")).toBe(join("/out", "package_1_a.wgsl"));
    expect(artifactPath("/out", "package_1_a", "txt")).toBe(join("/out", "package_1_a.txt"));
  });

  test("artifactNameFor splits the leaf off as the item name", () => {
    expect(artifactNameFor(ModulePath.absolute("a"))).toBe("package_1_a");
    expect(artifactNameFor(ModulePath.absolute("sub", "b"))).toBe("package_3_sub_1_b");
  });

  test("artifactPathFor", () => {
    expect(artifactPathFor("/out", ModulePath.absolute("sub", "b"))).toBe(
      join("/out", "package_3_sub_1_b.wgsl"),
    );
  });

  test("the root module has no artifact", () => {
    expect(() => artifactNameFor(ModulePath.root())).toThrow(ConfigError);
  });
});

describe("publish sinks", () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = null;
  });

  test("envSink writes both locations", () => {
    const env: NodeJS.ProcessEnv = {};
    envSink(env).publish({ shaderRoot: "/src/shaders", outDir: "/build/out" }, []);

    expect(env[ROOT_PATH_ENV]).toBe("/src/shaders");
    expect(env[OUT_DIR_ENV]).toBe("/build/out");
  });

  test("manifestSink writes a JSON manifest", () => {
    dir = mkdtempSync(join(tmpdir(), "manifest-"));
    const file = join(dir, "shaders.json");

    manifestSink(file).publish(
      { shaderRoot: "/src/shaders", outDir: "/build/out" },
      [{ module: "package::a", artifact: "/build/out/package_1_a.wgsl" }],
    );

    expect(JSON.parse(readFileSync(file, "utf-8"))).toEqual({
      shaderRoot: "/src/shaders",
      outDir: "/build/out",
      artifacts: [{ module: "package::a", artifact: "/build/out/package_1_a.wgsl" }],
    });
  });
});
