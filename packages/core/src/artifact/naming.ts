/**
 * Artifact Naming
 *
 * The single source of truth for where a compiled shader lands. Shared by the
 * orchestrator (to find what the compiler just wrote) and by lookup tooling
 * that finds a previously built artifact from its module path alone.
 */

import { join } from "node:path";
import { mangle, type MangledIdentifier } from "../codec/mangler.js";
import { BuildErrorCode, ConfigError } from "../shared/errors.js";
import type { ModulePath } from "../model/module-path.js";

export const DEFAULT_ARTIFACT_EXTENSION = "wgsl";

/**
 * Mangled artifact name for a shader module: its parent module plus its
 * leaf as the item name.
 */
export function artifactNameFor(modulePath: ModulePath): MangledIdentifier {
  const leaf = modulePath.last();
  if (leaf === null) {
    throw new ConfigError(
      "The root module has no artifact; a shader path needs at least one component",
      BuildErrorCode.EMPTY_COMPONENT,
    );
  }
  return mangle(modulePath.parent(), leaf);
}

/** `{outDir}/{mangled}.{extension}` */
export function artifactPath(
  outDir: string,
  mangled: MangledIdentifier,
  extension: string = DEFAULT_ARTIFACT_EXTENSION,
): string {
  return join(outDir, `${mangled}.${extension}`);
}

export function artifactPathFor(
  outDir: string,
  modulePath: ModulePath,
  extension: string = DEFAULT_ARTIFACT_EXTENSION,
): string {
  return artifactPath(outDir, artifactNameFor(modulePath), extension);
}
