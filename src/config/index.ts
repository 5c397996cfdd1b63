export {
  applyConfigDefaults,
  expandHomePath,
  loadConfig,
  resolveConfigPath,
  type ConfigLoadResult,
} from "./loader";
export { HarbormasterConfigSchema, type ContainerEntry, type HarbormasterConfig } from "./schema";
export { readConfigSnapshot, hashConfigRaw, type ConfigSnapshot } from "./snapshot";
