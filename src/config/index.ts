/**
 * Configuration module.
 * Loads and validates the suite file; exposes runtime defaults.
 */

export {
  TIMEOUTS,
  LIMITS,
  TRANSLATION,
  MOBILE_DEVICE,
  DEFAULT_CONFIG_PATH,
  DEFAULT_ARTIFACTS_DIR,
} from './defaults.js';
export { loadSuiteConfig, ConfigError } from './loader.js';
