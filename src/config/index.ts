export { ConfigManager, INIT_CONFIG } from './manager.js';
export { readConfig, validateConfig, parseConfig, formatIssues, type ConfigIssue, type ValidationResult } from './schema.js';
export { resolveSettings, type SettingsOverrides } from './settings.js';
