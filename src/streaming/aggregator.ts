/**
 * Incremental aggregator: folds classified frames into one completion.
 *
 * Merge policy across chunks:
 *   content                  appended in arrival order
 *   role, id, model, created first non-null wins
 *   finish_reason, usage     last non-null wins
 *   metering                 last seen wins
 *   tool calls               keyed by index, ordered by first appearance;
 *                            id and name first non-null wins, argument
 *                            fragments concatenated in arrival order
 */

import { parseJsonObject } from '../shared/json.js';
import type {
  ContentChunk,
  FinalResult,
  FinalToolCall,
  Frame,
  MeteringPayload,
  ToolCallFragment,
  Usage,
} from '../shared/types.js';

/** Tool-call state accumulated for one index. */
export interface ToolCallState {
  index: number;
  id?: string;
  name?: string;
  argumentParts: string[];
}

/** Everything one stream has contributed so far. */
export interface AggregationState {
  contentParts: string[];
  role?: string;
  finishReason?: string;
  usage?: Usage;
  id?: string;
  model?: string;
  created?: number;
  toolCalls: Map<number, ToolCallState>;
  metering?: MeteringPayload;
}

export class StreamAggregator {
  private readonly state: AggregationState = {
    contentParts: [],
    toolCalls: new Map(),
  };

  /**
   * Apply one frame. Returns the content delta when the frame carried one,
   * otherwise undefined.
   */
  observe(frame: Frame): string | undefined {
    switch (frame.kind) {
      case 'chunk':
        return this.applyChunk(frame.payload);
      case 'metering':
        this.state.metering = frame.payload;
        return undefined;
      case 'termination':
      case 'comment':
      case 'unparseable':
        return undefined;
    }
  }

  /**
   * Build the merged result. Safe to call repeatedly; each call returns a
   * fresh object equal to the previous one unless observe() ran in between.
   */
  finalize(): FinalResult {
    const s = this.state;
    const result: FinalResult = { content: s.contentParts.join('') };

    if (s.role !== undefined) result.role = s.role;
    if (s.finishReason !== undefined) result.finish_reason = s.finishReason;
    if (s.usage !== undefined) result.usage = { ...s.usage };
    if (s.id !== undefined) result.id = s.id;
    if (s.model !== undefined) result.model = s.model;
    if (s.created !== undefined) result.created = s.created;
    if (s.toolCalls.size > 0) {
      result.tool_calls = Array.from(s.toolCalls.values(), resolveToolCall);
    }
    if (s.metering !== undefined) result.energy = s.metering;

    return result;
  }

  private applyChunk(chunk: ContentChunk): string | undefined {
    const s = this.state;
    s.id ??= chunk.id;
    s.model ??= chunk.model;
    s.created ??= chunk.created;
    if (chunk.usage !== undefined) s.usage = chunk.usage;

    // Only the first choice is tracked; n > 1 is never requested
    const choice = chunk.choices[0];
    if (!choice) return undefined;

    s.role ??= choice.delta.role;
    if (choice.finish_reason !== undefined) s.finishReason = choice.finish_reason;

    for (const fragment of choice.delta.tool_calls ?? []) {
      this.applyToolCallFragment(fragment);
    }

    const content = choice.delta.content;
    if (content === undefined) return undefined;
    s.contentParts.push(content);
    return content;
  }

  private applyToolCallFragment(fragment: ToolCallFragment): void {
    let call = this.state.toolCalls.get(fragment.index);
    if (!call) {
      call = { index: fragment.index, argumentParts: [] };
      this.state.toolCalls.set(fragment.index, call);
    }
    call.id ??= fragment.id;
    call.name ??= fragment.function?.name;
    if (fragment.function?.arguments !== undefined) {
      call.argumentParts.push(fragment.function.arguments);
    }
  }
}

/**
 * Parse a tool call's concatenated argument string. An empty string means a
 * call without arguments. Anything that is not a JSON object is reported on
 * the call itself rather than thrown.
 */
export function resolveToolCall(call: ToolCallState): FinalToolCall {
  const raw = call.argumentParts.join('');
  const base: { index: number; id?: string; name?: string } = { index: call.index };
  if (call.id !== undefined) base.id = call.id;
  if (call.name !== undefined) base.name = call.name;

  if (raw.trim() === '') {
    return { ...base, arguments: {} };
  }

  const parsed = parseJsonObject(raw);
  if (parsed === undefined) {
    return {
      ...base,
      rawArguments: raw,
      error: `Tool call ${call.index} arguments are not a valid JSON object`,
    };
  }
  return { ...base, arguments: parsed };
}
