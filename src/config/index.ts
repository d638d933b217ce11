/**
 * @fileoverview Configuration entry point
 */

export {
  AuditConfigSchema,
  CONFIG_FILE_NAMES,
  ENV_CONCURRENCY,
  findConfigFile,
  loadAuditConfig,
  mergeConfigs,
  parseAuditConfig,
  parseConcurrency,
  readEnvConfig,
  type AuditConfig,
  type Concurrency,
  type LoadedConfig,
} from './audit_config.js';
