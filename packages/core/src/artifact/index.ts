export {
  artifactNameFor,
  artifactPath,
  artifactPathFor,
  DEFAULT_ARTIFACT_EXTENSION,
} from "./naming.js";
export {
  envSink,
  manifestSink,
  ROOT_PATH_ENV,
  OUT_DIR_ENV,
  type PublishSink,
  type PublishedLocation,
  type PublishedArtifact,
} from "./publish.js";
