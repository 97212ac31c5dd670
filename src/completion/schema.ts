/**
 * Zod schema for whole-body (non-streaming) chat completion responses.
 * Fields are checked one by one, as for streamed chunks.
 */

import { z } from 'zod';
import { JsonObjectSchema, UsageSchema } from '../streaming/schema.js';

export const ResponseToolCallSchema = z.object({
  id: z.string().nullish().catch(undefined),
  function: z
    .object({
      name: z.string().nullish().catch(undefined),
      // Some servers send arguments already decoded
      arguments: z.union([z.string(), JsonObjectSchema]).nullish().catch(undefined),
    })
    .nullish()
    .catch(undefined),
});

export const ChatCompletionResponseSchema = z.object({
  id: z.string().nullish().catch(undefined),
  model: z.string().nullish().catch(undefined),
  created: z.number().int().nullish().catch(undefined),
  choices: z
    .array(
      z.object({
        index: z.number().int().nullish().catch(undefined),
        message: z
          .object({
            role: z.string().nullish().catch(undefined),
            content: z.string().nullish().catch(undefined),
            tool_calls: z.array(ResponseToolCallSchema).nullish().catch(undefined),
          })
          .nullish()
          .catch(undefined),
        finish_reason: z.string().nullish().catch(undefined),
      }),
    )
    .default([])
    .catch([]),
  usage: UsageSchema.nullish().catch(undefined),
  energy: JsonObjectSchema.nullish().catch(undefined),
});

export type ParsedCompletionResponse = z.infer<typeof ChatCompletionResponseSchema>;
