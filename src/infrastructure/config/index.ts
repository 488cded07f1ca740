/**
 * Configuration Infrastructure
 *
 * Finds and loads the resub config file from the filesystem.
 */

export {
  getConfigSearchDirs,
  findConfigFile,
  loadConfig,
  type LoadedConfig,
} from "./configLoader";
