#!/usr/bin/env node
/**
 * @module mcp/index
 * @description MCP (Model Context Protocol) server entry point
 * @status COMPLETE
 * @dependencies src/mcp/server.ts
 * @lastModified 2026-10-18
 */

// ============================================================================
// Server Exports
// ============================================================================

export {
  PiiReconcileMcpServer,
  startMCPServer,
  toolJSON,
  toolError,
  ReconcileToolSchema,
  DetectToolSchema,
  MaskToolSchema,
  type ServerConfig,
  type ToolResult,
  type ReconcileToolArgs,
  type DetectToolArgs,
  type MaskToolArgs,
} from './server';

// ============================================================================
// Tool Exports
// ============================================================================

export {
  TOOL_NAMES,
  ALL_TOOL_NAMES,
  CAVEATS,
  type ToolName,
} from './tools';

// ============================================================================
// Main Entry Point
// ============================================================================

import { startMCPServer, type PiiReconcileMcpServer } from './server';
import { PIPELINE_PRESETS, type PipelinePreset } from '../pipeline/config';

function readPreset(argv: readonly string[]): PipelinePreset | undefined {
  const index = argv.indexOf('--preset');
  const value = index >= 0 ? argv[index + 1]?.toUpperCase() : undefined;
  return PIPELINE_PRESETS.find((preset) => preset === value);
}

function shutdown(server: PiiReconcileMcpServer): void {
  console.error('MCP Server shutting down...');
  server.stop().then(
    () => process.exit(0),
    (error: unknown) => {
      console.error('Failed to stop MCP server:', error);
      process.exit(1);
    }
  );
}

/**
 * Start the MCP server when run directly
 */
async function main(): Promise<void> {
  const verbose = process.argv.includes('--verbose') || process.argv.includes('-v');
  const preset = readPreset(process.argv);

  try {
    const server = await startMCPServer({ verbose, ...(preset ? { preset } : {}) });

    process.on('SIGINT', () => shutdown(server));
    process.on('SIGTERM', () => shutdown(server));
  } catch (error) {
    console.error('Failed to start MCP server:', error);
    process.exit(1);
  }
}

// Run if executed directly
if (require.main === module) {
  void main();
}
