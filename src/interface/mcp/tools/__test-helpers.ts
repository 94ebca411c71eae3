/**
 * Shared test helpers for MCP tool tests
 */

import { WikiLadderEngine } from '../../../core/engine.js';
import { FakeWikiTransport, type FakeGraph } from '../../../core/transport/__test-helpers.js';
import { DEFAULT_CONFIG } from '../../../config/defaults.js';

/**
 * Engine over an in-memory link graph: no cache file, every page an anchor.
 */
export function createTestEngine(graph: FakeGraph): {
  engine: WikiLadderEngine;
  transport: FakeWikiTransport;
} {
  const transport = new FakeWikiTransport(graph);
  const engine = new WikiLadderEngine({
    config: {
      ...DEFAULT_CONFIG,
      search: { ...DEFAULT_CONFIG.search, anchor_threshold: 1 },
      cache: { ...DEFAULT_CONFIG.cache, enabled: false },
    },
    transport,
    now: () => 0,
  });
  return { engine, transport };
}

/** Parse the single JSON text block of a tool result. */
export function parseToolText(result: {
  content: Array<{ type: string; text?: unknown }>;
}): unknown {
  const [first] = result.content;
  if (!first || first.type !== 'text' || typeof first.text !== 'string') {
    throw new Error('Expected a single text content block');
  }
  return JSON.parse(first.text);
}
