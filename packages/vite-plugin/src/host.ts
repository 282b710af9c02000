/**
 * Shader Host
 *
 * What the plugin's hooks do, kept apart from Vite's hook signatures: run
 * the shader build, map `shader:` imports to virtual modules, and load a
 * virtual module from the last build's artifacts.
 */

import { mkdirSync } from "node:fs";
import { extname, isAbsolute, join, relative, resolve } from "node:path";
import {
  DEFAULT_SHADER_EXTENSIONS,
  buildShaderDir,
  debug,
  errorMessage,
  type BuildLogger,
  type BuildResult,
} from "@shaderweave/core";
import { includeShader, resolveShaderArtifact, type LookupOptions } from "@shaderweave/lookup";
import type { HookContext, HostConfig, ShaderweavePluginOptions } from "./types.js";

/** Import prefix for shaders: `import pbr from "shader:lighting::pbr"` */
export const SHADER_IMPORT_PREFIX = "shader:";

/** Rollup convention: a leading NUL marks a virtual module */
export const VIRTUAL_SHADER_PREFIX = `\0${SHADER_IMPORT_PREFIX}`;

const LOG_PREFIX = "[shaderweave]";

export class ShaderHost {
  private config: HostConfig | null = null;
  private logger: BuildLogger | null = null;
  private lastBuild: BuildResult | null = null;

  constructor(private readonly options: ShaderweavePluginOptions) {}

  /** Result of the most recent successful build */
  get result(): BuildResult | null {
    return this.lastBuild;
  }

  configure(config: HostConfig): void {
    this.config = config;
    this.logger = prefixed(config.logger);
    debug.vite("configured", { root: config.root, shaderRoot: this.options.shaderRoot });
  }

  /**
   * Build every shader and register each file the build read for watching.
   * Failures go to `ctx.error`.
   */
  build(ctx: HookContext): BuildResult {
    let result: BuildResult;
    try {
      result = this.runBuild();
    } catch (error) {
      return ctx.error(`${LOG_PREFIX} shader build failed: ${errorMessage(error)}`);
    }
    for (const file of result.touched) {
      ctx.addWatchFile(file);
    }
    return result;
  }

  /**
   * Rebuild after a watched file changed. Outside a hook there is no context
   * to fail through, so failures are logged and reported as `false`.
   */
  rebuild(file: string): boolean {
    const { logger } = this.requireConfig();
    try {
      this.runBuild();
    } catch (error) {
      logger.error(`shader rebuild after ${file} failed: ${errorMessage(error)}`);
      return false;
    }
    logger.info(`rebuilt shaders after ${file} changed`);
    return true;
  }

  resolveId(id: string): string | null {
    if (!id.startsWith(SHADER_IMPORT_PREFIX)) return null;
    return `\0${id}`;
  }

  /** Module source for a virtual shader id; null for any other id. */
  load(id: string, ctx: HookContext): string | null {
    if (!id.startsWith(VIRTUAL_SHADER_PREFIX)) return null;
    const path = id.slice(VIRTUAL_SHADER_PREFIX.length);

    const built = this.lastBuild;
    if (!built) {
      return ctx.error(`${LOG_PREFIX} shader \`${path}\` requested before the shader build ran`);
    }

    const lookup: LookupOptions = {
      shaderRoot: built.shaderRoot,
      outDir: built.outDir,
      shaderExtensions: this.options.shaderExtensions,
      artifactExtension: this.options.artifactExtension,
    };
    let wgsl: string;
    try {
      const { sourceFile } = resolveShaderArtifact(path, lookup);
      ctx.addWatchFile(sourceFile);
      wgsl = includeShader(path, lookup);
    } catch (error) {
      return ctx.error(`${LOG_PREFIX} ${errorMessage(error)}`);
    }

    debug.vite("load", { path, length: wgsl.length });
    return `export default ${JSON.stringify(wgsl)};`;
  }

  /** Whether `file` is a shader source under the shader root. */
  isShaderFile(file: string): boolean {
    const { root } = this.requireConfig().config;
    const shaderRoot = resolve(root, this.options.shaderRoot);
    const rel = relative(shaderRoot, resolve(root, file));
    if (rel === "" || rel.startsWith("..") || isAbsolute(rel)) return false;
    const extensions = this.options.shaderExtensions ?? DEFAULT_SHADER_EXTENSIONS;
    return extensions.includes(extname(rel).slice(1));
  }

  /* ---------------------------------------------------------------------------
   * Internals
   * --------------------------------------------------------------------------- */

  private runBuild(): BuildResult {
    const { config, logger } = this.requireConfig();
    const outDir = resolve(config.root, this.options.outDir ?? join(config.cacheDir, "shaderweave"));
    mkdirSync(outDir, { recursive: true });

    const { extensions } = this.options;
    const result = buildShaderDir({
      shaderRoot: this.options.shaderRoot,
      outDir,
      cwd: config.root,
      extensions: typeof extensions === "function" ? extensions() : extensions,
      compileOptions: this.options.compileOptions,
      shaderExtensions: this.options.shaderExtensions,
      artifactExtension: this.options.artifactExtension,
      publish: this.options.publish,
      logger,
    });

    this.lastBuild = result;
    debug.vite("build", { artifacts: result.artifacts.length, outDir: result.outDir });
    return result;
  }

  private requireConfig(): { config: HostConfig; logger: BuildLogger } {
    if (!this.config || !this.logger) {
      throw new Error(`${LOG_PREFIX} plugin used before Vite resolved its config`);
    }
    return { config: this.config, logger: this.logger };
  }
}

function prefixed(logger: BuildLogger): BuildLogger {
  return {
    info: (message) => logger.info(`${LOG_PREFIX} ${message}`),
    warn: (message) => logger.warn(`${LOG_PREFIX} ${message}`),
    error: (message) => logger.error(`${LOG_PREFIX} ${message}`),
  };
}
