/**
 * Zod schemas for streaming `data:` payloads.
 * Servers send explicit nulls for absent fields, so every optional field is
 * nullish here and normalised to absent by toContentChunk(). Each field is
 * checked on its own: one off-type field reads as absent and the rest of the
 * chunk is kept.
 */

import { z } from 'zod';
import { isJsonObject } from '../shared/json.js';
import type { ContentChunk, JsonObject, ToolCallFragment, Usage } from '../shared/types.js';

export const JsonObjectSchema = z.custom<JsonObject>(isJsonObject, {
  message: 'Expected a JSON object',
});

const optionalString = () => z.string().nullish().catch(undefined);
const optionalInt = () => z.number().int().nullish().catch(undefined);

export const UsageSchema = z.object({
  prompt_tokens: optionalInt(),
  completion_tokens: optionalInt(),
  total_tokens: optionalInt(),
});

export const ToolCallFragmentSchema = z.object({
  // Some servers omit the index when only one tool call is in flight
  index: z.number().int().nonnegative().default(0).catch(0),
  id: optionalString(),
  function: z
    .object({
      name: optionalString(),
      // Some servers send arguments already decoded
      arguments: z.union([z.string(), JsonObjectSchema]).nullish().catch(undefined),
    })
    .nullish()
    .catch(undefined),
});

export const ChoiceSchema = z.object({
  index: optionalInt(),
  delta: z
    .object({
      role: optionalString(),
      content: optionalString(),
      tool_calls: z.array(ToolCallFragmentSchema).nullish().catch(undefined),
    })
    .nullish()
    .catch(undefined),
  finish_reason: optionalString(),
});

export const ContentChunkSchema = z.object({
  id: optionalString(),
  model: optionalString(),
  created: optionalInt(),
  usage: UsageSchema.nullish().catch(undefined),
  choices: z.array(ChoiceSchema).nullish().catch(undefined),
});

export type RawContentChunk = z.infer<typeof ContentChunkSchema>;

function toUsage(raw: z.infer<typeof UsageSchema>): Usage {
  const usage: Usage = {};
  if (raw.prompt_tokens != null) usage.prompt_tokens = raw.prompt_tokens;
  if (raw.completion_tokens != null) usage.completion_tokens = raw.completion_tokens;
  if (raw.total_tokens != null) usage.total_tokens = raw.total_tokens;
  return usage;
}

function toToolCallFragment(raw: z.infer<typeof ToolCallFragmentSchema>): ToolCallFragment {
  const fragment: ToolCallFragment = { index: raw.index };
  if (raw.id != null) fragment.id = raw.id;
  if (raw.function != null) {
    fragment.function = {};
    if (raw.function.name != null) fragment.function.name = raw.function.name;
    const args = raw.function.arguments;
    if (args != null) {
      fragment.function.arguments = typeof args === 'string' ? args : JSON.stringify(args);
    }
  }
  return fragment;
}

/** Drop nulls so downstream code only ever sees present-or-absent fields. */
export function toContentChunk(raw: RawContentChunk): ContentChunk {
  const chunk: ContentChunk = { choices: [] };
  if (raw.id != null) chunk.id = raw.id;
  if (raw.model != null) chunk.model = raw.model;
  if (raw.created != null) chunk.created = raw.created;
  if (raw.usage != null) chunk.usage = toUsage(raw.usage);

  for (const choice of raw.choices ?? []) {
    const delta: ContentChunk['choices'][number]['delta'] = {};
    if (choice.delta?.role != null) delta.role = choice.delta.role;
    if (choice.delta?.content != null) delta.content = choice.delta.content;
    if (choice.delta?.tool_calls != null) {
      delta.tool_calls = choice.delta.tool_calls.map(toToolCallFragment);
    }

    const normalized: ContentChunk['choices'][number] = { delta };
    if (choice.index != null) normalized.index = choice.index;
    if (choice.finish_reason != null) normalized.finish_reason = choice.finish_reason;
    chunk.choices.push(normalized);
  }

  return chunk;
}
