import { describe, test, expect, afterEach, vi } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { OUT_DIR_ENV, ROOT_PATH_ENV, envSink } from "@shaderweave/core";
import { ShaderHost, VIRTUAL_SHADER_PREFIX, shaderweave } from "@shaderweave/vite-plugin";
import {
  createContextStub,
  createLoggerStub,
  createViteWorkspace,
  type ViteWorkspace,
} from "./_helpers/workspace.js";

const FILES = {
  "util.wgsl": "fn util() {}\n",
  "lighting/pbr.wesl": "import package::util;\nfn pbr() {}\n",
};

let workspace: ViteWorkspace | null = null;

afterEach(() => {
  workspace?.cleanup();
  workspace = null;
});

function setup(files: Record<string, string> = FILES) {
  const ws = createViteWorkspace(files);
  workspace = ws;
  const logger = createLoggerStub();
  const host = new ShaderHost({ shaderRoot: "shaders", publish: [] });
  host.configure({ root: ws.root, cacheDir: ws.cacheDir, logger });
  return { ws, host, logger };
}

// =============================================================================
// Build
// =============================================================================

describe("ShaderHost.build", () => {
  test("builds into the cache dir and watches every file read", () => {
    const { ws, host, logger } = setup();
    const ctx = createContextStub();

    const result = host.build(ctx);

    const outDir = join(ws.cacheDir, "shaderweave");
    expect(result.outDir).toBe(outDir);
    expect(readFileSync(join(outDir, "package_8_lighting_3_pbr.wgsl"), "utf-8")).toBe("fn util() {}\nfn pbr() {}\n");
    expect(ctx.addWatchFile.mock.calls.map(([id]) => id)).toEqual([
      join(ws.shaders, "util.wgsl"),
      join(ws.shaders, "lighting", "pbr.wesl"),
    ]);
    expect(logger.info.mock.calls.map(([m]) => m)).toEqual([
      "[shaderweave] built: package::util",
      "[shaderweave] built: package::lighting::pbr",
    ]);
    expect(ctx.error).not.toHaveBeenCalled();
  });

  test("outDir is resolved against the Vite root", () => {
    const ws = createViteWorkspace(FILES);
    workspace = ws;
    const host = new ShaderHost({ shaderRoot: "shaders", outDir: "gen/wgsl", publish: [] });
    host.configure({ root: ws.root, cacheDir: ws.cacheDir, logger: createLoggerStub() });

    host.build(createContextStub());

    expect(existsSync(join(ws.root, "gen", "wgsl", "package_4_util.wgsl"))).toBe(true);
  });

  test("failures go through the context's error", () => {
    const { host } = setup({ "broken.wgsl": "import package::missing;\n" });
    const ctx = createContextStub();

    expect(() => host.build(ctx)).toThrow(/^\[shaderweave\] shader build failed: /);
    expect(ctx.error).toHaveBeenCalledTimes(1);
    expect(ctx.addWatchFile).not.toHaveBeenCalled();
    expect(host.result).toBeNull();
  });

  test("an extension factory is called once per build", () => {
    const ws = createViteWorkspace(FILES);
    workspace = ws;
    const extensions = vi.fn(() => []);
    const host = new ShaderHost({ shaderRoot: "shaders", extensions, publish: [] });
    host.configure({ root: ws.root, cacheDir: ws.cacheDir, logger: createLoggerStub() });

    host.build(createContextStub());
    host.build(createContextStub());

    expect(extensions).toHaveBeenCalledTimes(2);
  });

  test("publishes through the configured sinks", () => {
    const ws = createViteWorkspace(FILES);
    workspace = ws;
    const env: NodeJS.ProcessEnv = {};
    const host = new ShaderHost({ shaderRoot: "shaders", publish: [envSink(env)] });
    host.configure({ root: ws.root, cacheDir: ws.cacheDir, logger: createLoggerStub() });

    host.build(createContextStub());

    expect(env[ROOT_PATH_ENV]).toBe(ws.shaders);
    expect(env[OUT_DIR_ENV]).toBe(join(ws.cacheDir, "shaderweave"));
  });

  test("refuses to run before the config is resolved", () => {
    const host = new ShaderHost({ shaderRoot: "shaders", publish: [] });
    expect(() => host.build(createContextStub())).toThrow(
      "[shaderweave] plugin used before Vite resolved its config",
    );
  });
});

// =============================================================================
// Virtual modules
// =============================================================================

describe("ShaderHost.resolveId / load", () => {
  test("claims only shader: ids", () => {
    const host = new ShaderHost({ shaderRoot: "shaders" });
    expect(host.resolveId("shader:lighting::pbr")).toBe(`${VIRTUAL_SHADER_PREFIX}lighting::pbr`);
    expect(host.resolveId("./main.ts")).toBeNull();
    expect(host.resolveId("shaders/util.wgsl")).toBeNull();
  });

  test("loads the built WGSL as a default export", () => {
    const { ws, host } = setup();
    host.build(createContextStub());
    const ctx = createContextStub();

    const code = host.load(`${VIRTUAL_SHADER_PREFIX}lighting::pbr`, ctx);

    expect(code).toBe(`export default ${JSON.stringify("fn util() {}\nfn pbr() {}\n")};`);
    expect(ctx.addWatchFile).toHaveBeenCalledWith(join(ws.shaders, "lighting", "pbr.wesl"));
  });

  test("leaves other ids alone", () => {
    const { host } = setup();
    expect(host.load("/src/main.ts", createContextStub())).toBeNull();
  });

  test("a load before any build is an error", () => {
    const { host } = setup();
    const ctx = createContextStub();
    expect(() => host.load(`${VIRTUAL_SHADER_PREFIX}util`, ctx)).toThrow(
      "[shaderweave] shader `util` requested before the shader build ran",
    );
  });

  test("lookup failures go through the context's error", () => {
    const { host } = setup();
    host.build(createContextStub());

    expect(() => host.load(`${VIRTUAL_SHADER_PREFIX}lighting::nope`, createContextStub())).toThrow(
      "[shaderweave] shader `nope` does not exist (`lighting` is the last component of the path that exists)",
    );
    expect(() => host.load(`${VIRTUAL_SHADER_PREFIX}lighting`, createContextStub())).toThrow(
      "[shaderweave] `lighting` is a module, not a shader file; add `::` and the shader's name",
    );
  });
});

// =============================================================================
// Dev rebuilds
// =============================================================================

describe("ShaderHost rebuilds", () => {
  test("recognizes shader sources under the root", () => {
    const { ws, host } = setup();
    expect(host.isShaderFile(join(ws.shaders, "lighting", "pbr.wesl"))).toBe(true);
    expect(host.isShaderFile("shaders/util.wgsl")).toBe(true);
    expect(host.isShaderFile(join(ws.shaders, "notes.txt"))).toBe(false);
    expect(host.isShaderFile(join(ws.root, "src", "main.wgsl"))).toBe(false);
    expect(host.isShaderFile(ws.shaders)).toBe(false);
  });

  test("a successful rebuild is logged", () => {
    const { ws, host, logger } = setup();
    const file = join(ws.shaders, "util.wgsl");

    expect(host.rebuild(file)).toBe(true);
    expect(logger.info).toHaveBeenLastCalledWith(`[shaderweave] rebuilt shaders after ${file} changed`);
    expect(host.result?.artifacts).toHaveLength(2);
  });

  test("a failed rebuild is logged and reported", () => {
    const { ws, host, logger } = setup({ "broken.wgsl": "import package::missing;\n" });
    const file = join(ws.shaders, "broken.wgsl");

    expect(host.rebuild(file)).toBe(false);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error.mock.calls[0]?.[0]).toMatch(
      new RegExp(`^\\[shaderweave\\] shader rebuild after ${escapeRegExp(file)} failed: `),
    );
  });
});

// =============================================================================
// Plugin
// =============================================================================

describe("shaderweave()", () => {
  test("is a pre plugin named shaderweave", () => {
    const plugin = shaderweave({ shaderRoot: "shaders" });
    expect(plugin.name).toBe("shaderweave");
    expect(plugin.enforce).toBe("pre");
  });
});

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
