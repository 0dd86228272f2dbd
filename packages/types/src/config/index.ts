export {
  ConfigLoader,
  CONFIG_FILE_NAMES,
  CONFIG_ENV_VAR,
  type ResolveConfigOptions,
} from './loader.js';
export { validateConfig, type PartialDocChunksConfig } from './validator.js';
