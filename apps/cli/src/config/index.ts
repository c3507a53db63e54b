export type { ConfigData } from "./defaults.js";
export { CONFIG_KEYS, DEFAULTS, ENV_MAP, isConfigKey } from "./defaults.js";
export {
  readConfigFile,
  writeConfigFile,
  updateConfigFile,
  getConfigDir,
  getConfigPath,
} from "./configFile.js";
export type { GameSettings } from "./resolve.js";
export { resolveConfig, setCliOverride, clearCliOverrides, toSettings } from "./resolve.js";
