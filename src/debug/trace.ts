/**
 * Debug Module - Trace Logging Interface
 *
 * Category-based tracing for detailed subsystem debugging.
 *
 * @module debug/trace
 */

import {
  type TraceCategory,
  isTraceEnabled,
} from './config.js';
import { storeLog } from './log.js';

/**
 * Format a trace message with category tag.
 */
function formatTraceMessage(category: TraceCategory, message: string, layerIdx?: number): string {
  const timestamp = performance.now().toFixed(1);
  const layerTag = layerIdx !== undefined ? `L${layerIdx}:` : '';
  return `[${timestamp}ms][TRACE:${category}] ${layerTag}${message}`;
}

function emitTrace(
  category: TraceCategory,
  module: string,
  message: string,
  data: unknown,
  layerIdx?: number
): void {
  if (!isTraceEnabled(category, layerIdx)) return;
  const formatted = formatTraceMessage(category, message, layerIdx);
  storeLog(`TRACE:${category}`, module, message, data);
  if (data !== undefined) {
    console.log(formatted, data);
  } else {
    console.log(formatted);
  }
}

/**
 * Trace logging interface - only logs if category is enabled.
 */
export const trace = {
  /** Checkpoint and config loading. */
  loader(message: string, data?: unknown): void {
    emitTrace('loader', 'Loader', message, data);
  },

  embed(message: string, data?: unknown): void {
    emitTrace('embed', 'Embed', message, data);
  },

  attn(layerIdx: number, message: string, data?: unknown): void {
    emitTrace('attn', `Attn:L${layerIdx}`, message, data, layerIdx);
  },

  ffn(layerIdx: number, message: string, data?: unknown): void {
    emitTrace('ffn', `FFN:L${layerIdx}`, message, data, layerIdx);
  },

  logits(message: string, data?: unknown): void {
    emitTrace('logits', 'Logits', message, data);
  },

  /** Token sampling; one line per generation step. */
  sample(message: string, data?: unknown): void {
    emitTrace('sample', 'Sample', message, data);
  },
};
