// Shared core infrastructure
//
// Cross-cutting utilities used by every layer. Imports nothing else from core.

export {
  BuildErrorCode,
  ShaderweaveError,
  BuildIoError,
  ConfigError,
  ResolveError,
  CompileError,
  ExtensionError,
  errorMessage,
  type BuildErrorCodeType,
  type ExtensionStage,
} from "./errors.js";

export {
  debug,
  configureDebug,
  isDebugEnabled,
  refreshDebugChannels,
  DEBUG_ENV,
  type Debug,
  type DebugChannel,
  type DebugChannelName,
  type DebugConfig,
  type DebugData,
} from "./debug.js";

export { consoleLogger, silentLogger, type BuildLogger } from "./logger.js";
