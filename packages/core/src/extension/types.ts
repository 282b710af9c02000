/**
 * Extension Protocol
 *
 * An extension observes the build at five fixed lifecycle points. Extensions
 * are always run one at a time, in registration order, so a later extension
 * sees the artifact as an earlier one left it (a minifier registered after a
 * binding generator lets the generator read unminified output; a size report
 * registered last sees the minified result). Any extension that rewrites
 * artifacts must document where it belongs in that order.
 *
 * Hooks signal failure by throwing. The orchestrator wraps the error in an
 * ExtensionError naming the extension and lifecycle point, and no further
 * lifecycle hook runs for any extension.
 */

import type { ModulePath } from "../model/module-path.js";
import type { BasicSourceMap } from "../model/source-map.js";
import type { ShaderCompiler } from "../compiler/types.js";

export interface BuildExtension {
  /** Name reported in errors as the source extension */
  readonly name: string;

  /**
   * First call, before any directory is entered. The only point at which the
   * compiler may be reconfigured.
   */
  initRoot(shaderRoot: string, compiler: ShaderCompiler): void;

  /**
   * Going one level into a shader module (a directory). Never called for the
   * root directory.
   */
  enterModule(dirPath: string): void;

  /**
   * Going one level out, after the directory's whole subtree is processed.
   * Never called for the root directory.
   */
  exitModule(dirPath: string): void;

  /**
   * After a shader file is compiled.
   *
   * @param artifactPath - the compiled output, possibly already rewritten by
   *   earlier extensions
   */
  postBuild(modulePath: ModulePath, artifactPath: string, sourceMap: BasicSourceMap | null): void;

  /** Last call, after the whole tree is processed. */
  exitRoot(shaderRoot: string, compiler: ShaderCompiler): void;

  /**
   * Release anything the extension still holds. Not a lifecycle hook: the
   * orchestrator calls it once after the walk whether the build succeeded or
   * was aborted.
   */
  dispose?(): void;
}

export type ExtensionRegistry = readonly BuildExtension[];
