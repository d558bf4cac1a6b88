import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import { RetrievalError, describeError } from '../common/errors';
import { UpstreamCall } from '../common/upstream-call';
import { RerankMode, SETTINGS, Settings } from '../config/settings';
import {
  RetrievedDocument,
  RetrieverResponseSchema,
  byScoreDesc,
  toDocument,
} from './schemas';

export type RetrievalOptions = {
  topK?: number;
  useRerank?: boolean;
  rerankMode?: RerankMode;
  rerankTopK?: number;
};

@Injectable()
export class RetrievalService {
  private readonly logger = new Logger(RetrievalService.name);

  constructor(@Inject(SETTINGS) private readonly settings: Settings) {}

  private resolve(opts: RetrievalOptions) {
    const cfg = this.settings.retrieval;
    const topK = opts.topK ?? cfg.topK;
    const useRerank = opts.useRerank ?? cfg.useRerank;
    const rerankMode = opts.rerankMode ?? cfg.rerankMode;
    const rerankTopK = opts.rerankTopK ?? cfg.rerankTopK ?? topK;
    return {
      topK,
      useRerank,
      rerankMode,
      rerankTopK,
      limit: useRerank ? Math.min(topK, rerankTopK) : topK,
    };
  }

  /**
   * Fetches supporting documents for `query`, ordered by descending score and
   * truncated to the effective top-k.
   */
  async retrieve(
    query: string,
    opts: RetrievalOptions = {},
    signal?: AbortSignal,
  ): Promise<RetrievedDocument[]> {
    const { url, timeoutMs } = this.settings.retrieval;
    const eff = this.resolve(opts);

    const payload: Record<string, unknown> = {
      query,
      k: eff.topK,
      use_rerank: eff.useRerank,
      rerank_mode: eff.rerankMode,
    };
    if (eff.useRerank) payload.rerank_top_k = eff.rerankTopK;

    this.logger.log(`Retrieval request -> ${url} | ${JSON.stringify(payload)}`);

    const body = await this.post(url, payload, timeoutMs, signal);

    const parsed = RetrieverResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RetrievalError('Retriever returned a malformed payload');
    }

    const documents: RetrievedDocument[] = [];
    parsed.data.forEach((item, i) => {
      const doc = toDocument(item, i + 1);
      if (doc) documents.push(doc);
    });

    const ranked = byScoreDesc(documents).slice(0, eff.limit);
    this.logger.log(
      `Retrieval response <- ${parsed.data.length} hits, kept ${ranked.length}`,
    );
    return ranked;
  }

  private async post(
    url: string,
    payload: Record<string, unknown>,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const call = new UpstreamCall(timeoutMs, signal);
    try {
      const res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: call.signal,
      });

      if (!res.ok) {
        const detail = (await res.text()) || res.statusText;
        throw new RetrievalError(
          `Retriever error: ${res.status} - ${detail.slice(0, 500)}`,
        );
      }

      const raw = await res.text();
      try {
        return JSON.parse(raw);
      } catch (err) {
        throw new RetrievalError(
          'Retriever returned a malformed payload',
          HttpStatus.BAD_GATEWAY,
          { cause: err },
        );
      }
    } catch (err) {
      if (err instanceof RetrievalError) throw err;
      if (call.timedOut) {
        throw new RetrievalError(
          `Retriever request timed out after ${timeoutMs}ms`,
          HttpStatus.GATEWAY_TIMEOUT,
          { cause: err },
        );
      }
      this.logger.warn(`Retriever request failed: ${describeError(err)}`);
      throw new RetrievalError('Retriever request failed', HttpStatus.BAD_GATEWAY, {
        cause: err,
      });
    } finally {
      call.release();
    }
  }
}
