/**
 * @coordmap/core - configuration and logging shared by the coordmap packages
 *
 * @packageDocumentation
 */

export {
  config,
  defineConfig,
  LOG_LEVELS,
  type LogLevel,
  type LinearizeConfig,
  type CoordmapConfig,
  type CoordmapConfigInput,
  type ResetOptions,
} from "./config.js";

export { createLogger, isLevelEnabled, type Logger, type LogMethod } from "./logger.js";
