/**
 * @module cli/shared.test
 * @description Tests for CLI config resolution
 * @status COMPLETE
 * @dependencies src/cli/shared.ts
 * @lastModified 2026-10-18
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { resolvePipelineConfig } from './shared';
import { DEFAULT_CONFIG } from '../pipeline/config';

describe('cli/shared', () => {
  let tempDir: string;

  beforeAll(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pii-reconcile-cli-'));
  });

  afterAll(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeTemp(name: string, content: string): string {
    const file = path.join(tempDir, name);
    fs.writeFileSync(file, content, 'utf-8');
    return file;
  }

  describe('resolvePipelineConfig', () => {
    it('should default to the balanced preset', () => {
      expect(resolvePipelineConfig({})).toEqual({ success: true, data: DEFAULT_CONFIG });
    });

    it('should apply --strict on top of the config', () => {
      const result = resolvePipelineConfig({ strict: true });
      expect(result.success && result.data.strict).toBe(true);
    });

    it('should append dictionary terms to the configured allow-list', () => {
      const config = writeTemp('config.json', JSON.stringify({ preset: 'PERMISSIVE', noise: { allowList: ['Acme'] } }));
      const dictionary = writeTemp('allow.dic', '# internal names\nGlobex\n');

      const result = resolvePipelineConfig({ config, allowList: dictionary });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.noise).toEqual({ minContentRatio: 0.3, allowList: ['Acme', 'Globex'] });
    });

    it('should report a missing config file', () => {
      const result = resolvePipelineConfig({ config: path.join(tempDir, 'absent.json') });
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('FILE_NOT_FOUND');
    });

    it('should report unknown config keys', () => {
      const config = writeTemp('typo.json', JSON.stringify({ stirct: true }));
      const result = resolvePipelineConfig({ config });
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe('SCHEMA_VIOLATION');
    });
  });
});
