/**
 * Classifies one SSE line into a Frame.
 * Pure and total: every input maps to exactly one Frame, nothing throws.
 */

import { parseJsonObject } from '../shared/json.js';
import type { Frame } from '../shared/types.js';
import { ContentChunkSchema, toContentChunk } from './schema.js';

export const METERING_PREFIX = ': energy ';
export const DATA_PREFIX = 'data: ';
export const DONE_TOKEN = '[DONE]';

export function classifyLine(input: string): Frame {
  const line = input.trim();

  if (line === '') {
    return { kind: 'unparseable' };
  }

  if (line.startsWith(METERING_PREFIX)) {
    const payload = parseJsonObject(line.slice(METERING_PREFIX.length));
    // Malformed metering data is just a comment; metering never aborts a stream
    return payload ? { kind: 'metering', payload } : { kind: 'comment', raw: line };
  }

  if (line.startsWith(':')) {
    return { kind: 'comment', raw: line };
  }

  if (line.startsWith(DATA_PREFIX)) {
    const data = line.slice(DATA_PREFIX.length).trim();
    if (data === DONE_TOKEN) {
      return { kind: 'termination' };
    }

    const json = parseJsonObject(data);
    if (!json) {
      return { kind: 'unparseable' };
    }

    const result = ContentChunkSchema.safeParse(json);
    return result.success
      ? { kind: 'chunk', payload: toContentChunk(result.data) }
      : { kind: 'unparseable' };
  }

  return { kind: 'unparseable' };
}
