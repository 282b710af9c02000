/**
 * Publishing the build location to out-of-process consumers.
 *
 * The orchestrator returns the published location from its top-level call
 * and additionally hands it to each configured sink. The environment sink is
 * what the lookup package reads by default.
 */

import { writeFileSync } from "node:fs";
import { BuildIoError } from "../shared/errors.js";

export const ROOT_PATH_ENV = "SHADERWEAVE_ROOT_PATH";
export const OUT_DIR_ENV = "SHADERWEAVE_OUT_DIR";

export interface PublishedLocation {
  /** Shader root that was walked */
  readonly shaderRoot: string;
  /** Directory holding every compiled artifact */
  readonly outDir: string;
}

export interface PublishedArtifact {
  readonly module: string;
  readonly artifact: string;
}

export interface PublishSink {
  readonly name: string;
  publish(location: PublishedLocation, artifacts: readonly PublishedArtifact[]): void;
}

/**
 * Write the location into an environment record (process.env by default).
 */
export function envSink(env: NodeJS.ProcessEnv = process.env): PublishSink {
  return {
    name: "env",
    publish(location) {
      env[ROOT_PATH_ENV] = location.shaderRoot;
      env[OUT_DIR_ENV] = location.outDir;
    },
  };
}

/**
 * Write a JSON manifest of the location and every built artifact.
 */
export function manifestSink(file: string): PublishSink {
  return {
    name: "manifest",
    publish(location, artifacts) {
      const manifest = {
        shaderRoot: location.shaderRoot,
        outDir: location.outDir,
        artifacts,
      };
      try {
        writeFileSync(file, JSON.stringify(manifest, null, 2) + "\n");
      } catch (error) {
        throw new BuildIoError("Failed to write build manifest", file, error);
      }
    },
  };
}
