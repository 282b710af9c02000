/**
 * Compiler contract
 *
 * The orchestrator treats the shader compiler as a black box: hand it a
 * module path and the location the artifact must land at, get back the
 * compiled artifact. Anything implementing ShaderCompiler can be plugged in;
 * StandardCompiler is the default.
 */

import type { ModulePath } from "../model/module-path.js";
import type { BasicSourceMap } from "../model/source-map.js";
import type { MangledIdentifier } from "../codec/mangler.js";

export interface CompileOptions {
  /** Produce a line map from the artifact back to its sources (default: true) */
  sourceMap: boolean;
  /** Drop `//` line comments from the output (default: false) */
  stripComments: boolean;
}

export interface CompileRequest {
  readonly modulePath: ModulePath;
  readonly artifactName: MangledIdentifier;
  /** Where the artifact must be written, from the naming glue */
  readonly artifactPath: string;
}

/**
 * Output of one compile. Written once by the compiler; extensions may
 * rewrite the file at `artifactPath` in place afterwards.
 */
export interface CompiledArtifact {
  readonly modulePath: ModulePath;
  readonly artifactName: MangledIdentifier;
  readonly artifactPath: string;
  readonly sourceMap: BasicSourceMap | null;
  /** Every module linked into the artifact, entry module last */
  readonly modules: readonly ModulePath[];
  /** Source files read, for rebuild triggers */
  readonly files: readonly string[];
}

export interface ShaderCompiler {
  /** Shader root the compiler resolves module paths against */
  readonly root: string;

  readonly options: Readonly<CompileOptions>;

  /**
   * Reconfigure the compiler. Only permitted before the walk starts, i.e.
   * from an extension's initRoot.
   */
  setOptions(patch: Partial<CompileOptions>): void;

  /** Close the configuration window. Called by the orchestrator after root-init. */
  seal(): void;

  compile(request: CompileRequest): CompiledArtifact;
}
