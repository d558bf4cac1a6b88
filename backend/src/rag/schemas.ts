import { z } from 'zod';

export type RetrievedDocument = {
  id: string;
  title: string | null;
  content: string;
  score: number | null;
  chunk_id: string | null;
  chunk_type: string | null;
  origin_id: string | null;
  source_text: string | null;
  source: Record<string, unknown> | null;
};

// The retriever answers either with a bare list or with `{ results: [...] }`.
const RetrieverItem = z.record(z.unknown());

export const RetrieverResponseSchema = z.union([
  z.array(RetrieverItem),
  z
    .object({ results: z.array(RetrieverItem).nullish() })
    .transform((body) => body.results ?? []),
]);

export type RetrieverItem = z.infer<typeof RetrieverItem>;

function text(v: unknown): string | null {
  if (v === null || v === undefined) return null;
  if (typeof v === 'string') return v;
  if (typeof v === 'number' || typeof v === 'boolean') return String(v);
  return null;
}

function numeric(v: unknown): number | null {
  if (typeof v === 'number') return Number.isFinite(v) ? v : null;
  if (typeof v === 'string' && v.trim()) {
    const n = Number(v);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function record(v: unknown): Record<string, unknown> | null {
  const parsed = RetrieverItem.safeParse(v);
  return parsed.success ? parsed.data : null;
}

/**
 * Maps one retriever hit onto a document. Hits without any text are dropped
 * because they cannot ground an answer.
 */
export function toDocument(
  item: RetrieverItem,
  rank: number,
): RetrievedDocument | null {
  const content = (text(item.text) ?? text(item.name) ?? '').trim();
  if (!content) return null;

  const chunkId = text(item.chunk_id);
  const sourceText = text(item.source_text);

  return {
    id: text(item.id) ?? chunkId ?? `doc-${rank}`,
    title: text(item.name),
    content,
    score:
      numeric(item.combined_score) ??
      numeric(item.rerank_score) ??
      numeric(item.score),
    chunk_id: chunkId,
    chunk_type: text(item.type),
    origin_id: text(item.origin_id),
    source_text: sourceText === null ? null : sourceText.trim(),
    source: record(item.source),
  };
}

/** Stable sort by descending score; documents without a score go last. */
export function byScoreDesc(documents: RetrievedDocument[]): RetrievedDocument[] {
  return [...documents].sort((a, b) => {
    if (a.score === b.score) return 0;
    if (a.score === null) return 1;
    if (b.score === null) return -1;
    return b.score - a.score;
  });
}
