import { z } from 'zod';
import type { ErrorKind } from '../common/errors';
import { RerankModeSchema } from '../config/settings';
import type { ChatCompletion, Usage } from '../ai/schemas';
import type { RetrievedDocument } from '../rag/schemas';

// Explicit null means "use the configured default", same as omitting the field.
const nullToUndefined = <T>(value: T | null | undefined): T | undefined =>
  value ?? undefined;

export const ChatRequestSchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
  top_k: z.number().int().min(1).max(50).nullish().transform(nullToUndefined),
  stream: z.boolean().default(false),
  use_rerank: z.boolean().nullish().transform(nullToUndefined),
  rerank_mode: RerankModeSchema.nullish().transform(nullToUndefined),
  rerank_top_k: z
    .number()
    .int()
    .min(1)
    .max(50)
    .nullish()
    .transform(nullToUndefined),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

export type ChatResult = {
  answer: string;
  model: string;
  usage: Usage | null;
  documents: RetrievedDocument[];
  raw_response: ChatCompletion;
};

export type StreamEvent =
  | { event: 'meta'; data: { model: string; documents: RetrievedDocument[] } }
  | { event: 'delta'; data: { text: string } }
  | { event: 'end'; data: { answer: string } }
  | { event: 'error'; data: { error: ErrorKind; message: string } };
