export { DEFAULT_CONFIG, DEFAULT_CAPABILITIES, CONFIG_FILE_NAMES } from './defaults.js';
export {
  loadConfig,
  loadConfigFile,
  findConfigFile,
  validateConfig,
  configFileToCassetteConfig,
  parseCapabilityList,
  parseMatchFields,
  parseFormat,
  type ConfigFile,
  type ConfigOverrides,
  type CliOptions,
} from './loader.js';
