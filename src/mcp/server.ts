/**
 * @module mcp/server
 * @description MCP (Model Context Protocol) server exposing reconciliation, detection and masking
 * @status COMPLETE
 * @dependencies @modelcontextprotocol/sdk, src/pipeline, src/detectors, src/masking
 * @lastModified 2026-10-18
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';

import { ConfigurationError, toError } from '../types/common';
import { DETECTOR_DEFAULTS, MCP_LIMITS } from '../constants';
import { getPreset, mergeConfig, PIPELINE_PRESETS, type PipelineConfig, type PipelinePreset } from '../pipeline/config';
import { EntityCandidateListSchema, formatIssues, RawDetectionSchema, TaggedValueSchema } from '../pipeline/inputs';
import { Reconciler } from '../pipeline/reconciler';
import { DetectionService } from '../detectors/detection-service';
import { PatternDetector } from '../detectors/pattern-detector';
import type { Detector } from '../detectors/types';
import type { DetectorSource } from '../types/entities';
import { maskText, MASK_MODES } from '../masking/masker';
import { buildJsonReport } from '../output/report';
import { createConsoleSink } from '../observability/sinks';
import { TOOL_NAMES } from './tools';

// ============================================================================
// Constants
// ============================================================================

/**
 * Maximum text size to accept, in bytes
 */
const MAX_CONTENT_SIZE = MCP_LIMITS.MAX_CONTENT_SIZE;

const SERVER_NAME = 'pii-reconcile';
const SERVER_VERSION = '0.4.0';

// ============================================================================
// Tool Schemas
// ============================================================================

export const ReconcileToolSchema = z.object({
  text: z.string().describe('Source text the detections refer to'),
  detections: z.array(RawDetectionSchema).default([]).describe('Span detections with character offsets'),
  tagged: z.array(TaggedValueSchema).optional().describe('Values tagged by a generative detector, without offsets'),
  strict: z.boolean().optional().describe('Require cross-detector agreement'),
  preset: z.enum(PIPELINE_PRESETS).optional().describe('Pipeline preset (default: server preset)'),
  mask: z.enum(MASK_MODES).optional().describe('Also return masked text in this mode'),
});

export const DetectToolSchema = z.object({
  text: z.string().describe('Text to scan for personal information'),
  preset: z.enum(PIPELINE_PRESETS).optional().describe('Pipeline preset (default: server preset)'),
  allowList: z.array(z.string()).optional().describe('Extra terms never reported as entities'),
  mask: z.enum(MASK_MODES).optional().describe('Also return masked text in this mode'),
});

export const MaskToolSchema = z.object({
  text: z.string().describe('Text to mask'),
  candidates: EntityCandidateListSchema.describe('Reconciled candidates, e.g. from pii_reconcile'),
  mode: z.enum(MASK_MODES).default('tag').describe('Placeholder style'),
  trackOriginals: z.boolean().default(false).describe('Include original values in the redaction list'),
});

export type ReconcileToolArgs = z.input<typeof ReconcileToolSchema>;
export type DetectToolArgs = z.input<typeof DetectToolSchema>;
export type MaskToolArgs = z.input<typeof MaskToolSchema>;

// ============================================================================
// Server Config
// ============================================================================

/**
 * Server configuration options
 */
export interface ServerConfig {
  /** Log pipeline events to stderr */
  verbose: boolean;

  /** Preset used when a request names none */
  preset: PipelinePreset;

  /** Per-detector time limit for pii_detect */
  timeoutMs: number;
}

const DEFAULT_SERVER_CONFIG: ServerConfig = {
  verbose: false,
  preset: 'BALANCED',
  timeoutMs: DETECTOR_DEFAULTS.TIMEOUT_MS,
};

export type ToolResult = ReturnType<typeof toolJSON> | ReturnType<typeof toolError>;

// ============================================================================
// MCP Server Class
// ============================================================================

/**
 * PII reconciliation MCP server
 *
 * Exposes tools for AI assistants to:
 * - Reconcile detections they already have
 * - Run the configured detectors and reconcile their output
 * - Mask text from reconciled candidates
 */
export class PiiReconcileMcpServer {
  private readonly mcpServer: McpServer;
  private readonly config: ServerConfig;
  private readonly detectors: readonly Detector[];

  constructor(config: Partial<ServerConfig> = {}, detectors?: readonly Detector[]) {
    this.config = { ...DEFAULT_SERVER_CONFIG, ...config };
    this.detectors = detectors ?? [new PatternDetector()];

    this.mcpServer = new McpServer(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.registerTools();
  }

  /**
   * Load detectors and start serving over stdio
   */
  async start(): Promise<void> {
    await Promise.all(this.detectors.map((detector) => detector.load()));

    const transport = new StdioServerTransport();
    await this.mcpServer.connect(transport);

    if (this.config.verbose) {
      console.error(`PII reconcile MCP server started (${this.detectors.map((d) => d.name).join(', ')})`);
    }
  }

  /**
   * Release detectors and close the transport
   */
  async stop(): Promise<void> {
    await Promise.all(this.detectors.map((detector) => detector.dispose()));
    await this.mcpServer.close();
    if (this.config.verbose) {
      console.error('PII reconcile MCP server stopped');
    }
  }

  getConfig(): Readonly<ServerConfig> {
    return this.config;
  }

  // ============================================================================
  // Tool Handlers
  // ============================================================================

  async handleReconcile(args: ReconcileToolArgs): Promise<ToolResult> {
    const parsed = ReconcileToolSchema.safeParse(args);
    if (!parsed.success) return toolError(describeZodError(parsed.error));

    const { text, detections, tagged, strict, preset, mask } = parsed.data;
    const sizeError = checkContentSize(text);
    if (sizeError) return sizeError;

    return this.withReconciler(
      mergeConfig({ strict }, getPreset(preset ?? this.config.preset)),
      (reconciler) => {
        const result = reconciler.reconcile(text, { detections, tagged });
        const masked = mask ? maskText(text, result.candidates, { mode: mask }) : undefined;
        return toolJSON(buildJsonReport({ text, result, mask: masked }));
      }
    );
  }

  async handleDetect(args: DetectToolArgs): Promise<ToolResult> {
    const parsed = DetectToolSchema.safeParse(args);
    if (!parsed.success) return toolError(describeZodError(parsed.error));

    const { text, preset, allowList, mask } = parsed.data;
    const sizeError = checkContentSize(text);
    if (sizeError) return sizeError;

    const base = getPreset(preset ?? this.config.preset);
    // Consensus needs a detector on each side
    const sources = new Set<DetectorSource>(this.detectors.map((detector) => detector.source));
    const bothSides =
      base.consensus.primarySources.some((source) => sources.has(source)) &&
      base.consensus.secondarySources.some((source) => sources.has(source));
    const config = mergeConfig(
      {
        strict: base.strict && bothSides,
        noise: { allowList: [...base.noise.allowList, ...(allowList ?? [])] },
      },
      base
    );

    return this.withReconciler(config, async (reconciler) => {
      const service = new DetectionService(this.detectors, reconciler, { timeoutMs: this.config.timeoutMs });
      const result = await service.analyze(text);
      const masked = mask ? maskText(text, result.candidates, { mode: mask }) : undefined;
      return toolJSON({ ...buildJsonReport({ text, result, mask: masked }), detectors: this.detectors.map((d) => d.name) });
    });
  }

  async handleMask(args: MaskToolArgs): Promise<ToolResult> {
    const parsed = MaskToolSchema.safeParse(args);
    if (!parsed.success) return toolError(describeZodError(parsed.error));

    const { text, candidates, mode, trackOriginals } = parsed.data;
    const sizeError = checkContentSize(text);
    if (sizeError) return sizeError;

    const result = maskText(text, candidates, { mode, trackOriginals });
    return toolJSON({
      masked: result.masked,
      count: result.count,
      redactions: result.redactions,
      skipped: result.skipped,
    });
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async withReconciler(
    config: PipelineConfig,
    run: (reconciler: Reconciler) => ToolResult | Promise<ToolResult>
  ): Promise<ToolResult> {
    let reconciler: Reconciler;
    try {
      reconciler = new Reconciler(
        config,
        this.config.verbose ? { sink: createConsoleSink({ verbose: true, prefix: '[pii-reconcile]' }) } : {}
      );
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return toolError(`${error.code}: ${error.message}`);
      }
      throw error;
    }

    try {
      return await run(reconciler);
    } catch (error) {
      return toolError(toError(error).message);
    }
  }

  /**
   * Register all tools with the MCP server
   */
  private registerTools(): void {
    this.mcpServer.tool(
      TOOL_NAMES.RECONCILE,
      'Reconcile detections from several PII detectors into one list of typed spans. ' +
        'Pass span detections with offsets and/or generative tagged values; returns candidates, stats and discard events.',
      ReconcileToolSchema.shape,
      async (args) => this.handleReconcile(args)
    );

    this.mcpServer.tool(
      TOOL_NAMES.DETECT,
      'Run the server detectors over text and reconcile their output. Detector failures are reported as events.',
      DetectToolSchema.shape,
      async (args) => this.handleDetect(args)
    );

    this.mcpServer.tool(
      TOOL_NAMES.MASK,
      'Replace reconciled candidate spans in text with placeholders (tag, numbered or fixed).',
      MaskToolSchema.shape,
      async (args) => this.handleMask(args)
    );
  }
}

// ============================================================================
// Helpers
// ============================================================================

function checkContentSize(text: string): ToolResult | null {
  const bytes = Buffer.byteLength(text, 'utf-8');
  if (bytes <= MAX_CONTENT_SIZE) return null;
  return toolError(
    `Text size (${(bytes / 1024 / 1024).toFixed(1)}MB) exceeds maximum allowed (${MAX_CONTENT_SIZE / 1024 / 1024}MB). Split the text and call again.`
  );
}

function describeZodError(error: z.ZodError): string {
  return formatIssues(error).join('; ');
}

// ============================================================================
// Tool Result Helpers
// ============================================================================

/**
 * Create a JSON result
 */
export function toolJSON(data: unknown): { content: Array<{ type: 'text'; text: string }> } {
  return {
    content: [{ type: 'text', text: JSON.stringify(data, null, 2) }],
  };
}

/**
 * Create an error result
 */
export function toolError(message: string): { content: Array<{ type: 'text'; text: string }>; isError: true } {
  return {
    content: [{ type: 'text', text: `Error: ${message}` }],
    isError: true,
  };
}

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Create and start the MCP server
 */
export async function startMCPServer(
  config?: Partial<ServerConfig>,
  detectors?: readonly Detector[]
): Promise<PiiReconcileMcpServer> {
  const server = new PiiReconcileMcpServer(config, detectors);
  await server.start();
  return server;
}
