/**
 * Non-streaming path: one whole-body JSON response becomes a FinalResult
 * directly, without the line buffer or the aggregator.
 */

import { StreamStateError } from '../shared/errors.js';
import type { FinalResult, FinalToolCall, ParsedToolCall } from '../shared/types.js';
import { resolveToolCall } from '../streaming/aggregator.js';
import type { Completion, StreamStatus } from '../streaming/driver.js';
import type { ParsedCompletionResponse } from './schema.js';

type ResponseMessage = NonNullable<ParsedCompletionResponse['choices'][number]['message']>;
type ResponseToolCall = NonNullable<ResponseMessage['tool_calls']>[number];

function toFinalToolCall(call: ResponseToolCall, index: number): FinalToolCall {
  const name = call.function?.name;
  const args = call.function?.arguments;

  // Some servers send the arguments already decoded
  if (args != null && typeof args !== 'string') {
    const decoded: ParsedToolCall = { index, arguments: args };
    if (call.id != null) decoded.id = call.id;
    if (name != null) decoded.name = name;
    return decoded;
  }

  return resolveToolCall({
    index,
    id: call.id ?? undefined,
    name: name ?? undefined,
    argumentParts: args != null ? [args] : [],
  });
}

/** Build the merged result from a non-streaming response body. */
export function resultFromResponse(body: ParsedCompletionResponse): FinalResult {
  const choice = body.choices[0];
  const message = choice?.message;
  const result: FinalResult = { content: message?.content ?? '' };

  if (message?.role != null) result.role = message.role;
  if (choice?.finish_reason != null) result.finish_reason = choice.finish_reason;
  if (body.usage != null) {
    const usage: NonNullable<FinalResult['usage']> = {};
    if (body.usage.prompt_tokens != null) usage.prompt_tokens = body.usage.prompt_tokens;
    if (body.usage.completion_tokens != null) usage.completion_tokens = body.usage.completion_tokens;
    if (body.usage.total_tokens != null) usage.total_tokens = body.usage.total_tokens;
    result.usage = usage;
  }
  if (body.id != null) result.id = body.id;
  if (body.model != null) result.model = body.model;
  if (body.created != null) result.created = body.created;

  const toolCalls = message?.tool_calls ?? [];
  if (toolCalls.length > 0) {
    result.tool_calls = toolCalls.map(toFinalToolCall);
  }
  if (body.energy != null) result.energy = body.energy;

  return result;
}

/**
 * A completion whose result is already known. Yields the whole content as a
 * single fragment (none when the model returned no content).
 */
export class ResolvedCompletion implements Completion {
  private _status: StreamStatus = 'pending';

  constructor(
    private readonly result: FinalResult,
    private readonly hasContent: boolean,
  ) {}

  static fromResponse(body: ParsedCompletionResponse): ResolvedCompletion {
    const content = body.choices[0]?.message?.content;
    return new ResolvedCompletion(resultFromResponse(body), content != null);
  }

  get status(): StreamStatus {
    return this._status;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string, void, undefined> {
    if (this._status !== 'pending') {
      throw new StreamStateError('A completion stream can only be iterated once');
    }
    this._status = 'streaming';
    try {
      if (this.hasContent) yield this.result.content;
      this._status = 'completed';
    } finally {
      if (this._status === 'streaming') this._status = 'cancelled';
    }
  }

  finalize(): FinalResult {
    if (this._status !== 'completed') {
      throw new StreamStateError(
        `Cannot finalize a ${this._status} stream; drain all fragments first`,
      );
    }
    return structuredClone(this.result);
  }
}
