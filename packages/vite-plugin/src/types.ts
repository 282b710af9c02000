/**
 * Vite Plugin Types
 */

import type {
  BuildExtension,
  BuildLogger,
  CompileOptions,
  PublishSink,
} from "@shaderweave/core";

/**
 * Configuration options for the shaderweave Vite plugin.
 */
export interface ShaderweavePluginOptions {
  /**
   * Root directory of the shader tree, relative to the Vite root.
   *
   * @example './src/shaders'
   */
  shaderRoot: string;

  /**
   * Where compiled artifacts go, relative to the Vite root. Created when
   * missing.
   *
   * @default '<cacheDir>/shaderweave'
   */
  outDir?: string;

  /**
   * Extensions run over every build. A factory is called once per build, so
   * dev-server rebuilds can start from fresh extension state.
   */
  extensions?: readonly BuildExtension[] | (() => readonly BuildExtension[]);

  /** Options for the default compiler */
  compileOptions?: Partial<CompileOptions>;

  /** @default ['wesl', 'wgsl'] */
  shaderExtensions?: readonly string[];

  /** @default 'wgsl' */
  artifactExtension?: string;

  /**
   * Where the build publishes its location.
   *
   * @default [envSink()]
   */
  publish?: readonly PublishSink[];
}

/**
 * The parts of Vite's resolved config the plugin reads.
 */
export interface HostConfig {
  root: string;
  cacheDir: string;
  logger: BuildLogger;
}

/**
 * The parts of a Rollup plugin context the hooks use. Vite passes its
 * PluginContext; tests pass a stand-in.
 */
export interface HookContext {
  error(message: string): never;
  addWatchFile(id: string): void;
}
