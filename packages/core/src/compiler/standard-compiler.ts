import { writeFileSync } from "node:fs";
import {
  BuildErrorCode,
  BuildIoError,
  CompileError,
  ConfigError,
  ShaderweaveError,
  errorMessage,
} from "../shared/errors.js";
import { debug } from "../shared/debug.js";
import { link, type LinkResult } from "./linker.js";
import { FileResolver, type Resolver } from "./resolver.js";
import type { CompileOptions, CompileRequest, CompiledArtifact, ShaderCompiler } from "./types.js";

export const DEFAULT_COMPILE_OPTIONS: CompileOptions = {
  sourceMap: true,
  stripComments: false,
};

/**
 * Default compiler: resolves modules from the shader root, links imports and
 * writes the artifact where the orchestrator asks.
 */
export class StandardCompiler implements ShaderCompiler {
  private config: CompileOptions;
  private sealed = false;
  readonly resolver: Resolver;

  constructor(
    readonly root: string,
    options: Partial<CompileOptions> = {},
    resolver?: Resolver,
  ) {
    this.config = { ...DEFAULT_COMPILE_OPTIONS, ...options };
    this.resolver = resolver ?? new FileResolver(root);
  }

  get options(): Readonly<CompileOptions> {
    return { ...this.config };
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  setOptions(patch: Partial<CompileOptions>): void {
    if (this.sealed) {
      throw new ConfigError(
        "Compiler options can only change before the walk starts (during initRoot)",
        BuildErrorCode.COMPILER_SEALED,
      );
    }
    this.config = { ...this.config, ...patch };
  }

  seal(): void {
    this.sealed = true;
  }

  compile(request: CompileRequest): CompiledArtifact {
    const { modulePath, artifactName, artifactPath } = request;

    let linked: LinkResult;
    try {
      linked = link(modulePath, this.resolver, this.config);
    } catch (error) {
      if (error instanceof ShaderweaveError) throw error;
      throw new CompileError(
        `Failed to compile ${modulePath.toString()}: ${errorMessage(error)}`,
        modulePath.toString(),
        error,
      );
    }

    try {
      writeFileSync(artifactPath, linked.code);
    } catch (error) {
      throw new BuildIoError("Failed to write artifact", artifactPath, error);
    }
    debug.compile("artifact.written", { module: modulePath, artifactPath, modules: linked.modules.length });

    return {
      modulePath,
      artifactName,
      artifactPath,
      sourceMap: linked.sourceMap,
      modules: linked.modules,
      files: linked.files,
    };
  }
}
