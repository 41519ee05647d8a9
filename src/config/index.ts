export {
  configSchema,
  loadConfig,
  getConfig,
  resetConfig,
  type Config,
  type LoggingConfig,
  type DefinitionsConfig,
  type DispatchConfig,
} from './config.js';
export { resolveDefinitionPaths, BUNDLED_TOOLS_PATH, BUNDLED_PROFILES_PATH } from './paths.js';
