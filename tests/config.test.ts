/**
 * Config Parser Tests
 */

import { describe, it, expect, afterAll } from 'vitest';
import {
  ConfigParser,
  createConfigParser,
  loadConfig,
  resolveConfig,
  DEFAULT_CONFIG,
} from '../src/lib/config/index.js';
import { writeFile, mkdir, rm } from 'fs/promises';
import { join } from 'path';

const TEST_CONFIG_DIR = './test-config-parser';

afterAll(async () => {
  await rm(TEST_CONFIG_DIR, { recursive: true, force: true });
});

describe('ConfigParser', () => {
  const parser = createConfigParser();

  describe('parse', () => {
    it('should parse JSON config', () => {
      const json = JSON.stringify({ checker: { concurrency: 8 } });

      const config = parser.parse(json, 'config.json');

      expect(config.checker.concurrency).toBe(8);
    });

    it('should parse YAML config', () => {
      const config = parser.parse(`
checker:
  command: /usr/local/bin/pa11y
  standard: WCAG2AAA
  include_notices: true
audit_server:
  port: 8080
`, 'config.yml');

      expect(config.checker.command).toBe('/usr/local/bin/pa11y');
      expect(config.checker.standard).toBe('WCAG2AAA');
      expect(config.checker.include_notices).toBe(true);
      expect(config.audit_server).toEqual({ host: 'localhost', port: 8080 });
    });

    it('should keep defaults for everything not overridden', () => {
      const config = parser.parse('checker:\n  timeout_ms: 60000', 'config.yml');

      expect(config.checker).toEqual({ ...DEFAULT_CONFIG.checker, timeout_ms: 60000 });
      expect(config.ingestion.url_headers).toEqual(DEFAULT_CONFIG.ingestion.url_headers);
      expect(config.analyzer_server).toEqual(DEFAULT_CONFIG.analyzer_server);
    });

    it('should treat an empty file as all defaults', () => {
      expect(parser.parse('', 'config.yml')).toEqual(DEFAULT_CONFIG);
    });

    it('should replace the URL header list', () => {
      const config = parser.parse('ingestion:\n  url_headers: [adresse, seite]', 'config.yml');

      expect(config.ingestion.url_headers).toEqual(['adresse', 'seite']);
    });
  });

  describe('validate', () => {
    it('should reject concurrency outside 1-16', () => {
      expect(() => parser.validate({ checker: { concurrency: 0 } })).toThrow();
      expect(() => parser.validate({ checker: { concurrency: 17 } })).toThrow();
    });

    it('should reject an unknown standard', () => {
      expect(() => parser.validate({ checker: { standard: 'Section508' } })).toThrow();
    });

    it('should reject a non-numeric port', () => {
      expect(() => parser.parse('audit_server:\n  port: eighty', 'config.yml')).toThrow();
    });
  });

  describe('loadFile', () => {
    it('should load from file', async () => {
      await mkdir(TEST_CONFIG_DIR, { recursive: true });
      await writeFile(join(TEST_CONFIG_DIR, 'audit.yml'), 'checker:\n  timeout_ms: 45000\n');

      const config = await parser.loadFile(join(TEST_CONFIG_DIR, 'audit.yml'));

      expect(config.checker.timeout_ms).toBe(45000);
    });
  });

  describe('generateExample', () => {
    it('should generate an example that parses to the defaults', () => {
      const example = ConfigParser.generateExample();

      expect(example).toContain('checker:');
      expect(parser.parse(example, 'example.yml')).toEqual(DEFAULT_CONFIG);
    });
  });
});

describe('loadConfig', () => {
  it('should be a convenience function', async () => {
    await mkdir(TEST_CONFIG_DIR, { recursive: true });
    await writeFile(join(TEST_CONFIG_DIR, 'quick.json'), '{"analyzer_server": {"port": 9000}}');

    const config = await loadConfig(join(TEST_CONFIG_DIR, 'quick.json'));

    expect(config.analyzer_server.port).toBe(9000);
  });
});

describe('resolveConfig', () => {
  it('should load an explicit path', async () => {
    await mkdir(TEST_CONFIG_DIR, { recursive: true });
    await writeFile(join(TEST_CONFIG_DIR, 'explicit.yml'), 'checker:\n  concurrency: 2\n');

    const config = await resolveConfig(join(TEST_CONFIG_DIR, 'explicit.yml'));

    expect(config.checker.concurrency).toBe(2);
  });
});
