/**
 * Bindings Extension
 *
 * Mirrors the shader tree as a tree of TypeScript modules:
 *
 * ```
 * shaders/lighting/pbr.wesl  →  <bindingsRoot>/lighting/pbr.ts
 *                               <bindingsRoot>/lighting/index.ts   export * as pbr from "./pbr.js";
 *                               <bindingsRoot>/index.ts            export * as lighting from "./lighting/index.js";
 * ```
 *
 * A shader whose stem would take the barrel's own file name gets a suffix
 * (`index.wgsl` → `index_shader.ts`, exported as `index`). Two entries of one
 * directory that would share an export name or a file name (`a.wgsl` beside
 * `a/`, `my-fx.wgsl` beside `myFx.wgsl`) fail the build.
 *
 * Each directory's `index.ts` stays open while the walk is inside that
 * directory. The open barrels form a stack: entering a directory writes its
 * re-export into the parent's barrel and pushes a new one; leaving pops and
 * closes it, and the parent becomes the writable barrel again.
 *
 * Ordering: register before MinifierExtension so `SOURCE` holds the readable
 * artifact.
 */

import { closeSync, mkdirSync, openSync, readFileSync, writeFileSync, writeSync } from "node:fs";
import { basename, join, resolve } from "node:path";
import { BaseExtension, BuildIoError, debug, type ModulePath } from "@shaderweave/core";
import { ShaderToolError, ShaderToolErrorCode } from "../errors.js";
import { generateBindings, type CodegenOptions, type Demangler } from "./codegen.js";
import { bindingIdentifier } from "./identifier.js";

export interface BindingsExtensionOptions {
  /** Directory the binding modules are written under; created if missing */
  bindingsRoot: string;
  codegen?: Partial<CodegenOptions>;
  demangle?: Demangler;
  /** Base for a relative bindingsRoot (default: process.cwd()) */
  cwd?: string;
}

interface BarrelFrame {
  readonly dir: string;
  readonly file: string;
  readonly fd: number;
  /** Export name → the entry that declared it */
  readonly exports: Map<string, string>;
  /** Lowercased file name → the entry that wrote it */
  readonly files: Map<string, string>;
}

export const BARREL_FILE = "index.ts";
export const BARREL_STEM_SUFFIX = "_shader";
export const BARREL_HEADER = "// Generated by shaderweave\n";

export class BindingsExtension extends BaseExtension {
  override readonly name = "BindingsExtension";
  readonly bindingsRoot: string;
  private readonly codegen: Partial<CodegenOptions>;
  private readonly demangle: Demangler | undefined;
  private frames: BarrelFrame[] = [];

  constructor(options: BindingsExtensionOptions) {
    super();
    this.bindingsRoot = resolve(options.cwd ?? process.cwd(), options.bindingsRoot);
    this.codegen = options.codegen ?? {};
    this.demangle = options.demangle;
  }

  /** Barrels currently held open */
  get openBarrels(): number {
    return this.frames.length;
  }

  override initRoot(): void {
    this.release();
    ensureDir(this.bindingsRoot);
    this.frames.push(openBarrel(this.bindingsRoot));
  }

  override enterModule(dirPath: string): void {
    const parent = this.top("enterModule");
    const name = basename(dirPath);
    const id = bindingIdentifier(name);
    claimExport(parent, id, `directory ${name}/`);
    append(parent, `export * as ${id} from "./${name}/index.js";\n`);

    const dir = join(parent.dir, name);
    ensureDir(dir);
    this.frames.push(openBarrel(dir));
    debug.extension("bindings.enter", { dir });
  }

  override exitModule(dirPath: string): void {
    if (this.frames.length < 2) {
      throw new ShaderToolError(
        `exitModule(${dirPath}) without a matching enterModule`,
        ShaderToolErrorCode.BINDINGS_STATE,
      );
    }
    const frame = this.frames.pop();
    if (frame) closeBarrel(frame);
  }

  override postBuild(modulePath: ModulePath, artifactPath: string): void {
    const barrel = this.top("postBuild");
    const stem = modulePath.last();
    if (stem === null) {
      throw new ShaderToolError("postBuild for the root module", ShaderToolErrorCode.BINDINGS_STATE);
    }

    const entry = `shader ${modulePath.toString()}`;
    const id = bindingIdentifier(stem);
    const fileStem = moduleFileStem(stem);
    claimExport(barrel, id, entry);
    claimFile(barrel, `${fileStem}.ts`, entry);

    let source: string;
    try {
      source = readFileSync(artifactPath, "utf-8");
    } catch (error) {
      throw new BuildIoError("Failed to read artifact", artifactPath, error);
    }

    const code = generateBindings(source, artifactPath, this.codegen, this.demangle);
    const file = join(barrel.dir, `${fileStem}.ts`);
    try {
      writeFileSync(file, code);
    } catch (error) {
      throw new BuildIoError("Failed to write bindings", file, error);
    }
    append(barrel, `export * as ${id} from "./${fileStem}.js";\n`);
    debug.extension("bindings.module", { module: modulePath, file });
  }

  override exitRoot(): void {
    if (this.frames.length !== 1) {
      throw new ShaderToolError(
        `exitRoot with ${this.frames.length} open barrels; expected only the root`,
        ShaderToolErrorCode.BINDINGS_STATE,
      );
    }
    this.release();
  }

  /** Close whatever barrels an aborted build left open. */
  dispose(): void {
    this.release();
  }

  private top(hook: string): BarrelFrame {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) {
      throw new ShaderToolError(`${hook} called before initRoot`, ShaderToolErrorCode.BINDINGS_STATE);
    }
    return frame;
  }

  /** Close every open barrel, innermost first, then report the first failure. */
  private release(): void {
    let first: unknown = null;
    for (let frame = this.frames.pop(); frame; frame = this.frames.pop()) {
      try {
        closeBarrel(frame);
      } catch (error) {
        first ??= error;
      }
    }
    if (first !== null) throw first;
  }
}

/* =============================================================================
 * BARREL FILES
 * ============================================================================= */

function ensureDir(dir: string): void {
  try {
    mkdirSync(dir, { recursive: true });
  } catch (error) {
    throw new BuildIoError("Failed to create bindings directory", dir, error);
  }
}

function openBarrel(dir: string): BarrelFrame {
  const file = join(dir, BARREL_FILE);
  let fd: number;
  try {
    fd = openSync(file, "w");
  } catch (error) {
    throw new BuildIoError("Failed to open barrel", file, error);
  }
  const frame: BarrelFrame = { dir, file, fd, exports: new Map(), files: new Map([[BARREL_FILE, "the barrel"]]) };
  append(frame, BARREL_HEADER);
  return frame;
}

/** File stem of a binding module; never the barrel's own name. */
function moduleFileStem(stem: string): string {
  return `${stem}.ts`.toLowerCase() === BARREL_FILE ? `${stem}${BARREL_STEM_SUFFIX}` : stem;
}

function claimExport(frame: BarrelFrame, id: string, entry: string): void {
  const owner = frame.exports.get(id);
  if (owner !== undefined) {
    throw new ShaderToolError(
      `\`${id}\` is exported twice from ${frame.file}: by ${owner} and by ${entry}`,
      ShaderToolErrorCode.BINDINGS_COLLISION,
      frame.file,
    );
  }
  frame.exports.set(id, entry);
}

function claimFile(frame: BarrelFrame, fileName: string, entry: string): void {
  const key = fileName.toLowerCase();
  const owner = frame.files.get(key);
  if (owner !== undefined) {
    throw new ShaderToolError(
      `${join(frame.dir, fileName)} would be written by both ${owner} and ${entry}`,
      ShaderToolErrorCode.BINDINGS_COLLISION,
      frame.file,
    );
  }
  frame.files.set(key, entry);
}

function append(frame: BarrelFrame, text: string): void {
  try {
    writeSync(frame.fd, text);
  } catch (error) {
    throw new BuildIoError("Failed to write barrel", frame.file, error);
  }
}

function closeBarrel(frame: BarrelFrame): void {
  try {
    closeSync(frame.fd);
  } catch (error) {
    throw new BuildIoError("Failed to close barrel", frame.file, error);
  }
}
