import { z } from 'zod';

export type ChatRole = 'system' | 'user' | 'assistant';

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export const UsageSchema = z.object({
  prompt_tokens: z.number().int().nullish(),
  completion_tokens: z.number().int().nullish(),
  total_tokens: z.number().int().nullish(),
});

export type Usage = {
  prompt_tokens: number | null;
  completion_tokens: number | null;
  total_tokens: number | null;
};

export const ChatCompletionSchema = z
  .object({
    id: z.string().optional(),
    object: z.string().optional(),
    created: z.number().optional(),
    model: z.string().optional(),
    choices: z.array(
      z
        .object({
          message: z
            .object({
              role: z.string().optional(),
              content: z.string().nullish(),
            })
            .passthrough(),
          finish_reason: z.string().nullish(),
        })
        .passthrough(),
    ),
    usage: UsageSchema.nullish(),
  })
  .passthrough();

export type ChatCompletion = z.infer<typeof ChatCompletionSchema>;

// One `data:` payload of a streamed completion.
export const ChatCompletionChunkSchema = z
  .object({
    choices: z
      .array(
        z
          .object({
            delta: z
              .object({ content: z.string().nullish() })
              .passthrough()
              .nullish(),
          })
          .passthrough(),
      )
      .nullish(),
    error: z
      .object({ message: z.string().optional() })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export type CompletionResult = {
  answer: string;
  model: string;
  usage: Usage | null;
  raw: ChatCompletion;
};
