/**
 * @module mcp/tools
 * @description MCP tool names and usage caveats
 * @status COMPLETE
 * @dependencies MCP SDK
 * @lastModified 2026-10-18
 *
 * Note: Tool registrations live in src/mcp/server.ts using the
 * McpServer.tool() API.
 */

import { MCP_LIMITS } from '../../constants';

export const TOOL_NAMES = {
  RECONCILE: 'pii_reconcile',
  DETECT: 'pii_detect',
  MASK: 'pii_mask',
} as const;

/**
 * All available tool names
 */
export const ALL_TOOL_NAMES = [TOOL_NAMES.RECONCILE, TOOL_NAMES.DETECT, TOOL_NAMES.MASK] as const;

export type ToolName = typeof ALL_TOOL_NAMES[number];

/**
 * Known Caveats & Limitations for AI Assistants
 *
 * 1. OFFSETS:
 *    - Offsets are UTF-16 code unit indexes, as JavaScript strings count them
 *    - Detections with offsets outside the text are discarded with an event
 *
 * 2. CONTENT SIZE LIMITS:
 *    - Maximum text size: 10MB (all tools)
 *    - Larger texts must be split
 *
 * 3. GENERATIVE OUTPUT:
 *    - Tagged values carry no offsets; a value is located in the text
 *      (exact, then normalized, then fuzzy) or dropped with RECOVERY_DISCARD
 *
 * 4. STRICT MODE:
 *    - Only candidates corroborated by a second detector survive
 *    - pii_detect turns it off unless server detectors cover both consensus sides
 */
export const CAVEATS = {
  MAX_CONTENT_SIZE_MB: MCP_LIMITS.MAX_CONTENT_SIZE / 1024 / 1024,
  OFFSET_UNIT: 'utf16',
} as const;
