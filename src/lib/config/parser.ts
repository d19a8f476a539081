/**
 * Configuration Parser
 *
 * Parse .a11y-audit.yml config files to configure the checker, URL
 * detection and the two web apps.
 */

import { readFile, access } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

// ============================================================================
// Schemas
// ============================================================================

const CheckerSchema = z.object({
  command: z.string().min(1).optional(),
  standard: z.enum(['WCAG2A', 'WCAG2AA', 'WCAG2AAA']).optional(),
  timeout_ms: z.number().int().positive().optional(),
  concurrency: z.number().int().min(1).max(16).optional(),
  include_warnings: z.boolean().optional(),
  include_notices: z.boolean().optional(),
});

const IngestionSchema = z.object({
  url_headers: z.array(z.string().min(1)).min(1).optional(),
});

const ServerSchema = z.object({
  host: z.string().min(1).optional(),
  port: z.number().int().min(0).max(65535).optional(),
});

export const AuditConfigSchema = z.object({
  checker: CheckerSchema.optional(),
  ingestion: IngestionSchema.optional(),
  audit_server: ServerSchema.optional(),
  analyzer_server: ServerSchema.optional(),
});

// ============================================================================
// Types
// ============================================================================

export type AuditConfigInput = z.infer<typeof AuditConfigSchema>;
export type A11yStandard = NonNullable<z.infer<typeof CheckerSchema>['standard']>;

export interface CheckerSettings {
  command: string;
  standard: A11yStandard;
  timeout_ms: number;
  concurrency: number;
  include_warnings: boolean;
  include_notices: boolean;
}

export interface ServerSettings {
  host: string;
  port: number;
}

export interface AuditConfig {
  checker: CheckerSettings;
  ingestion: { url_headers: string[] };
  audit_server: ServerSettings;
  analyzer_server: ServerSettings;
}

// ============================================================================
// Default Config
// ============================================================================

export const DEFAULT_CONFIG_FILE = '.a11y-audit.yml';

export const DEFAULT_CONFIG: AuditConfig = {
  checker: {
    command: 'pa11y',
    standard: 'WCAG2AA',
    timeout_ms: 30000,
    concurrency: 4,
    include_warnings: false,
    include_notices: false,
  },
  ingestion: {
    url_headers: ['url', 'urls', 'link', 'links', 'address', 'website', 'page', 'href', 'uri'],
  },
  audit_server: { host: 'localhost', port: 3847 },
  analyzer_server: { host: 'localhost', port: 3848 },
};

// ============================================================================
// Config Parser
// ============================================================================

export class ConfigParser {
  /**
   * Load and parse config from file
   */
  async loadFile(path: string): Promise<AuditConfig> {
    const content = await readFile(path, 'utf-8');
    return this.parse(content, path);
  }

  /**
   * Parse config from string content
   */
  parse(content: string, filename: string = 'config'): AuditConfig {
    let parsed: unknown;

    if (filename.endsWith('.json')) {
      parsed = JSON.parse(content);
    } else {
      parsed = parseYaml(content);
    }

    // An empty YAML document parses to null
    const validated = AuditConfigSchema.parse(parsed ?? {});

    return this.mergeWithDefaults(validated);
  }

  /**
   * Merge config with defaults
   */
  mergeWithDefaults(config: AuditConfigInput): AuditConfig {
    return {
      checker: {
        ...DEFAULT_CONFIG.checker,
        ...config.checker,
      },
      ingestion: {
        url_headers: config.ingestion?.url_headers ?? DEFAULT_CONFIG.ingestion.url_headers,
      },
      audit_server: {
        ...DEFAULT_CONFIG.audit_server,
        ...config.audit_server,
      },
      analyzer_server: {
        ...DEFAULT_CONFIG.analyzer_server,
        ...config.analyzer_server,
      },
    };
  }

  /**
   * Validate config object
   */
  validate(config: unknown): AuditConfigInput {
    return AuditConfigSchema.parse(config);
  }

  /**
   * Generate example config
   */
  static generateExample(): string {
    return `# a11y-batch-audit configuration

checker:
  command: pa11y          # must be on PATH
  standard: WCAG2AA       # WCAG2A | WCAG2AA | WCAG2AAA
  timeout_ms: 30000       # per URL
  concurrency: 4          # parallel pa11y processes (1-16)
  include_warnings: false
  include_notices: false

ingestion:
  url_headers: [url, urls, link, links, address, website, page, href, uri]

audit_server:
  host: localhost
  port: 3847

analyzer_server:
  host: localhost
  port: 3848
`;
  }
}

// ============================================================================
// Factory
// ============================================================================

export function createConfigParser(): ConfigParser {
  return new ConfigParser();
}

/**
 * Quick load function
 */
export async function loadConfig(path: string): Promise<AuditConfig> {
  return new ConfigParser().loadFile(path);
}

/**
 * Load the given file, or the default file when it exists, or the defaults.
 */
export async function resolveConfig(path?: string): Promise<AuditConfig> {
  if (path) {
    return loadConfig(path);
  }

  try {
    await access(DEFAULT_CONFIG_FILE);
  } catch {
    return new ConfigParser().mergeWithDefaults({});
  }
  return loadConfig(DEFAULT_CONFIG_FILE);
}
