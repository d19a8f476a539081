/**
 * Config Module
 *
 * Provides:
 * - YAML and JSON config parsing
 * - Zod-validated schemas
 * - Default configuration merging
 */

export {
  ConfigParser,
  createConfigParser,
  loadConfig,
  resolveConfig,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  AuditConfigSchema,
  type A11yStandard,
  type AuditConfig,
  type AuditConfigInput,
  type CheckerSettings,
  type ServerSettings,
} from './parser.js';
