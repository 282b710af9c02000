/**
 * Minifier Extension
 *
 * Rewrites every artifact in place with comments and surplus whitespace
 * removed.
 *
 * Ordering: register after BindingsExtension (whose SOURCE should stay
 * readable) and before SizeReportExtension (which should see the final size).
 */

import { readFileSync, writeFileSync } from "node:fs";
import { BaseExtension, BuildIoError, debug, type ModulePath } from "@shaderweave/core";
import { minifyWgsl } from "./minify.js";

export interface MinifierOptions {
  /** Only minify when NODE_ENV is "production" */
  releaseOnly?: boolean;
  /** Environment read for NODE_ENV (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export class MinifierExtension extends BaseExtension {
  override readonly name = "MinifierExtension";
  private readonly releaseOnly: boolean;
  private readonly env: NodeJS.ProcessEnv;
  private active = true;

  constructor(options: MinifierOptions = {}) {
    super();
    this.releaseOnly = options.releaseOnly ?? false;
    this.env = options.env ?? process.env;
  }

  /** Whether the current build rewrites artifacts. Decided at init-root. */
  get isActive(): boolean {
    return this.active;
  }

  override initRoot(): void {
    this.active = !this.releaseOnly || this.env["NODE_ENV"] === "production";
    debug.extension("minify.mode", { active: this.active, releaseOnly: this.releaseOnly });
  }

  override postBuild(modulePath: ModulePath, artifactPath: string): void {
    if (!this.active) return;

    let source: string;
    try {
      source = readFileSync(artifactPath, "utf-8");
    } catch (error) {
      throw new BuildIoError("Failed to read artifact", artifactPath, error);
    }

    const minified = minifyWgsl(source, artifactPath);
    try {
      writeFileSync(artifactPath, minified);
    } catch (error) {
      throw new BuildIoError("Failed to write artifact", artifactPath, error);
    }
    debug.extension("minify.done", { module: modulePath, before: source.length, after: minified.length });
  }
}
