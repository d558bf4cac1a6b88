import { Inject, Injectable, Logger } from '@nestjs/common';
import { buildMessages } from '../ai/prompts';
import { ChatCompletionService } from '../ai/completion.service';
import { QueryRewriterService } from '../ai/query-rewriter.service';
import { ServiceError, describeError } from '../common/errors';
import { SETTINGS, Settings } from '../config/settings';
import { RetrievalService } from '../rag/retrieval.service';
import type { RetrievedDocument } from '../rag/schemas';
import type { ChatRequest, ChatResult, StreamEvent } from './chat.schemas';
import { RelayTrace } from './relay-state';

@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);

  constructor(
    @Inject(SETTINGS) private readonly settings: Settings,
    private readonly retrieval: RetrievalService,
    private readonly completions: ChatCompletionService,
    private readonly rewriter: QueryRewriterService,
  ) {}

  private begin(req: ChatRequest) {
    this.logger.log(
      `Incoming /chat | query=${req.query} | stream=${req.stream} | top_k=${req.top_k ?? '-'} | use_rerank=${req.use_rerank ?? '-'} | rerank_mode=${req.rerank_mode ?? '-'}`,
    );
    return new RelayTrace((line) => this.logger.debug(line));
  }

  // Grounding is best-effort: an empty result still goes on to generation.
  private async retrieve(
    req: ChatRequest,
    signal?: AbortSignal,
  ): Promise<RetrievedDocument[]> {
    const query = await this.rewriter.rewrite(req.query, signal);
    const documents = await this.retrieval.retrieve(
      query,
      {
        topK: req.top_k,
        useRerank: req.use_rerank,
        rerankMode: req.rerank_mode,
        rerankTopK: req.rerank_top_k,
      },
      signal,
    );
    if (!documents.length) {
      this.logger.warn('No documents retrieved; generating ungrounded');
    }
    return documents;
  }

  async answer(req: ChatRequest): Promise<ChatResult> {
    const trace = this.begin(req);
    try {
      trace.advance('RETRIEVING');
      const documents = await this.retrieve(req);

      trace.advance('GENERATING');
      const messages = await buildMessages(req.query, documents);
      const out = await this.completions.complete(messages);

      trace.advance('COMPLETED');
      return {
        answer: out.answer,
        model: out.model,
        usage: out.usage,
        documents,
        raw_response: out.raw,
      };
    } catch (err) {
      if (!trace.terminal) trace.advance('FAILED');
      throw err;
    }
  }

  /**
   * Relays one request as stream events: `meta` once, then one `delta` per
   * upstream fragment, then exactly one of `end` or `error`. Nothing more is
   * produced once `signal` aborts, and the upstream stream is released.
   */
  async *stream(
    req: ChatRequest,
    signal?: AbortSignal,
  ): AsyncGenerator<StreamEvent> {
    const trace = this.begin(req);
    try {
      trace.advance('RETRIEVING');
      let documents: RetrievedDocument[];
      try {
        documents = await this.retrieve(req, signal);
      } catch (err) {
        trace.advance('FAILED');
        if (!signal?.aborted) yield this.errorEvent(err);
        return;
      }

      trace.advance('GENERATING');
      yield {
        event: 'meta',
        data: { model: this.settings.model.name, documents },
      };

      // Partial output already sent stays sent; failures only append `error`.
      const fragments: string[] = [];
      try {
        const messages = await buildMessages(req.query, documents);
        for await (const text of this.completions.stream(messages, signal)) {
          fragments.push(text);
          yield { event: 'delta', data: { text } };
        }
      } catch (err) {
        trace.advance('FAILED');
        if (!signal?.aborted) yield this.errorEvent(err);
        return;
      }

      if (signal?.aborted) return;
      trace.advance('COMPLETED');
      yield { event: 'end', data: { answer: fragments.join('').trim() } };
    } finally {
      if (!trace.terminal) {
        trace.advance('FAILED');
        this.logger.log(`relay #${trace.id} cancelled by client`);
      }
    }
  }

  private errorEvent(err: unknown): StreamEvent {
    if (err instanceof ServiceError) {
      this.logger.warn(`Stream failed with ${err.kind}: ${err.message}`);
      return { event: 'error', data: { error: err.kind, message: err.message } };
    }
    this.logger.error(`Stream failed: ${describeError(err)}`);
    return {
      event: 'error',
      data: { error: 'InternalError', message: 'Internal server error' },
    };
  }
}
