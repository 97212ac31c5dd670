/**
 * OpenAI-compatible request/response type definitions, plus the result shape
 * produced by the stream interpreter.
 */

/** Any value that survives a JSON round trip. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** A JSON object (the only top-level shape accepted for payloads). */
export type JsonObject = { [key: string]: JsonValue };

/** A single message in a chat conversation. */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string | null;
  name?: string;
  tool_calls?: ToolCall[];
  tool_call_id?: string;
}

/** A tool call within an assistant message. */
export interface ToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string;
  };
}

/** Tool definition for function calling. */
export interface Tool {
  type: 'function';
  function: {
    name: string;
    description?: string;
    parameters?: Record<string, unknown>;
  };
}

/** Generation options forwarded verbatim to the provider. */
export interface CompletionOptions {
  temperature?: number;
  max_tokens?: number;
  top_p?: number;
  stop?: string | string[];
  seed?: number;
  tools?: Tool[];
  tool_choice?: 'none' | 'auto' | 'required' | { type: 'function'; function: { name: string } };
  response_format?: { type: 'text' | 'json_object' };
  presence_penalty?: number;
  frequency_penalty?: number;
  user?: string;
}

/** OpenAI-compatible chat completion request body. */
export interface ChatCompletionRequest extends CompletionOptions {
  model: string;
  messages: ChatMessage[];
  stream?: boolean;
  stream_options?: { include_usage: boolean };
}

/** Token usage statistics. */
export interface Usage {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
}

/** Incremental tool-call fragment inside a streaming delta. */
export interface ToolCallFragment {
  index: number;
  id?: string;
  function?: {
    name?: string;
    arguments?: string;
  };
}

/** One `data:` payload of a streaming response, after validation. */
export interface ContentChunk {
  id?: string;
  model?: string;
  created?: number;
  usage?: Usage;
  choices: Array<{
    index?: number;
    delta: {
      role?: string;
      content?: string;
      tool_calls?: ToolCallFragment[];
    };
    finish_reason?: string;
  }>;
}

/** Opaque out-of-band metering data, e.g. `{ energy_joules, energy_kwh }`. */
export type MeteringPayload = JsonObject;

/** One classified SSE line. */
export type Frame =
  | { kind: 'chunk'; payload: ContentChunk }
  | { kind: 'metering'; payload: MeteringPayload }
  | { kind: 'termination' }
  | { kind: 'comment'; raw: string }
  | { kind: 'unparseable' };

/** A tool call whose argument string parsed to a JSON object. */
export interface ParsedToolCall {
  index: number;
  id?: string;
  name?: string;
  arguments: JsonObject;
}

/** A tool call whose argument string could not be parsed. */
export interface FailedToolCall {
  index: number;
  id?: string;
  name?: string;
  rawArguments: string;
  error: string;
}

export type FinalToolCall = ParsedToolCall | FailedToolCall;

/**
 * The merged completion. Optional fields are omitted when nothing supplied
 * them; they are never present as null.
 */
export interface FinalResult {
  content: string;
  role?: string;
  finish_reason?: string;
  usage?: Usage;
  id?: string;
  model?: string;
  created?: number;
  tool_calls?: FinalToolCall[];
  energy?: MeteringPayload;
}

/** OpenAI-compatible error response. */
export interface OpenAIErrorResponse {
  error: {
    message: string;
    type: string;
    param: string | null;
    code: string | null;
  };
}

/** OpenAI-compatible models list response. */
export interface ModelsResponse {
  object: 'list';
  data: ModelInfo[];
}

/** A single model entry in the models list. */
export interface ModelInfo {
  id: string;
  object: 'model';
  created: number;
  owned_by: string;
}
