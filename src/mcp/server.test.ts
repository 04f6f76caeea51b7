/**
 * @module mcp/server.test
 * @description Unit tests for MCP Server tool handlers
 * @status COMPLETE
 * @dependencies src/mcp/server.ts
 * @lastModified 2026-10-18
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PiiReconcileMcpServer, toolError, toolJSON, type ToolResult } from './server';
import { PatternDetector } from '../detectors/pattern-detector';
import type { SpanDetector } from '../detectors/types';
import { MCP_LIMITS } from '../constants';

const TEXT = 'Contact John Smith, john@x.com';

function readText(result: ToolResult): string {
  return result.content[0]?.text ?? '';
}

function readJson(result: ToolResult): unknown {
  expect('isError' in result).toBe(false);
  return JSON.parse(readText(result));
}

const crashing: SpanDetector = {
  kind: 'span',
  name: 'broken-ner',
  source: 'NER',
  isReady: true,
  load: async () => undefined,
  dispose: async () => undefined,
  detect: async () => {
    throw new Error('model crashed');
  },
};

describe('MCP Server', () => {
  let server: PiiReconcileMcpServer;

  beforeEach(() => {
    server = new PiiReconcileMcpServer({ verbose: false });
  });

  // ============================================================================
  // Config
  // ============================================================================

  it('should fill in default config', () => {
    expect(server.getConfig()).toEqual({ verbose: false, preset: 'BALANCED', timeoutMs: 30_000 });
  });

  // ============================================================================
  // pii_reconcile
  // ============================================================================

  describe('pii_reconcile', () => {
    const detections = [
      { start: 8, end: 18, rawType: 'PER', score: 0.9, source: 'NER' as const },
      { start: 20, end: 30, rawType: 'EMAIL_ADDRESS', score: 0.95, source: 'PATTERN' as const },
    ];

    it('should return candidates with their text', async () => {
      const report = readJson(await server.handleReconcile({ text: TEXT, detections }));

      expect(report).toMatchObject({
        candidates: [
          { start: 8, end: 18, canonicalType: 'PERSON', text: 'John Smith', source: 'NER' },
          { start: 20, end: 30, canonicalType: 'EMAIL', text: 'john@x.com', source: 'PATTERN' },
        ],
        events: [],
      });
    });

    it('should mask when asked', async () => {
      const report = readJson(await server.handleReconcile({ text: TEXT, detections, mask: 'tag' }));
      expect(report).toMatchObject({ masked: 'Contact [PERSON], [EMAIL]' });
    });

    it('should drop single-source candidates in strict mode', async () => {
      const report = readJson(await server.handleReconcile({ text: TEXT, detections, strict: true }));
      expect(report).toMatchObject({ candidates: [] });
    });

    it('should report out-of-range detections as events', async () => {
      const report = readJson(
        await server.handleReconcile({
          text: TEXT,
          detections: [
            { start: 8, end: 18, rawType: 'PER', score: 0.9, source: 'NER' },
            { start: -1, end: 30, rawType: 'EMAIL_ADDRESS', score: 0.95, source: 'PATTERN' },
          ],
        })
      );

      expect(report).toMatchObject({
        candidates: [{ canonicalType: 'PERSON', text: 'John Smith' }],
        events: [
          {
            category: 'RECOVERY_DISCARD',
            reason: 'NO_MATCH',
            detail: 'invalid offsets [-1,30) for text of length 30',
          },
        ],
      });
    });

    it('should reject oversized text', async () => {
      const result = await server.handleReconcile({ text: 'a'.repeat(MCP_LIMITS.MAX_CONTENT_SIZE + 1) });

      expect(result).toMatchObject({ isError: true });
      expect(readText(result)).toBe(
        'Error: Text size (10.0MB) exceeds maximum allowed (10MB). Split the text and call again.'
      );
    });
  });

  // ============================================================================
  // pii_detect
  // ============================================================================

  describe('pii_detect', () => {
    it('should run the pattern detector by default', async () => {
      const report = readJson(await server.handleDetect({ text: 'TEL 090-1234-5678' }));

      expect(report).toMatchObject({
        candidates: [{ start: 4, end: 17, canonicalType: 'PHONE', text: '090-1234-5678', source: 'PATTERN' }],
        detectors: ['pattern'],
      });
    });

    it('should not apply consensus with detectors on one side only', async () => {
      const report = readJson(await server.handleDetect({ text: 'TEL 090-1234-5678', preset: 'STRICT' }));
      expect(report).toMatchObject({ candidates: [{ canonicalType: 'PHONE', source: 'PATTERN' }] });
    });

    it('should honor extra allow-list terms', async () => {
      const result = await server.handleDetect({
        text: 'Mail support@acme.test or 090-1234-5678',
        allowList: ['support@acme.test'],
      });
      const report = readJson(result);

      expect(report).toMatchObject({ candidates: [{ canonicalType: 'PHONE', text: '090-1234-5678' }] });
    });

    it('should report detector failures as events', async () => {
      const withBroken = new PiiReconcileMcpServer({}, [new PatternDetector(), crashing]);
      const report = readJson(await withBroken.handleDetect({ text: 'TEL 090-1234-5678' }));

      expect(report).toMatchObject({
        candidates: [{ canonicalType: 'PHONE' }],
        events: [{ category: 'DETECTOR_FAILURE', reason: 'DETECTOR_ERROR', detail: 'broken-ner: model crashed' }],
        detectors: ['pattern', 'broken-ner'],
      });
    });
  });

  // ============================================================================
  // pii_mask
  // ============================================================================

  describe('pii_mask', () => {
    const candidates = [
      { start: 0, end: 4, canonicalType: 'PERSON' as const, rawType: 'PER', score: 0.9, source: 'NER' as const },
      { start: 9, end: 13, canonicalType: 'PERSON' as const, rawType: 'PER', score: 0.9, source: 'NER' as const },
    ];

    it('should mask with numbered placeholders', async () => {
      const report = readJson(await server.handleMask({ text: 'Sato met Sato.', candidates, mode: 'numbered' }));
      expect(report).toMatchObject({ masked: '[PERSON_1] met [PERSON_1].', count: 2, skipped: [] });
    });

    it('should reject scores outside [0, 1]', async () => {
      const result = await server.handleMask({
        text: 'Sato',
        candidates: [{ start: 0, end: 4, canonicalType: 'PERSON', rawType: 'PER', score: 2, source: 'NER' }],
      });

      expect(result).toMatchObject({ isError: true });
      expect(readText(result).startsWith('Error: candidates.0.score:')).toBe(true);
    });
  });

  // ============================================================================
  // Result Helpers
  // ============================================================================

  describe('result helpers', () => {
    it('should wrap JSON and errors as text content', () => {
      expect(toolJSON({ a: 1 })).toEqual({ content: [{ type: 'text', text: '{\n  "a": 1\n}' }] });
      expect(toolError('boom')).toEqual({ content: [{ type: 'text', text: 'Error: boom' }], isError: true });
    });
  });
});
