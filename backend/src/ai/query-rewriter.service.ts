import { Inject, Injectable, Logger } from '@nestjs/common';
import { ServiceError } from '../common/errors';
import { SETTINGS, Settings } from '../config/settings';
import { ChatCompletionService } from './completion.service';
import { buildRewriterMessages, extractRewrite } from './prompts';

@Injectable()
export class QueryRewriterService {
  private readonly logger = new Logger(QueryRewriterService.name);

  constructor(
    @Inject(SETTINGS) private readonly settings: Settings,
    private readonly completions: ChatCompletionService,
  ) {}

  get enabled() {
    return this.settings.rewriter.enabled;
  }

  /**
   * Rewrites `query` for retrieval. Never fails: any upstream problem falls
   * back to the original query.
   */
  async rewrite(query: string, signal?: AbortSignal): Promise<string> {
    if (!this.enabled) return query;

    try {
      const messages = await buildRewriterMessages(query);
      const out = await this.completions.complete(
        messages,
        this.settings.rewriter.model,
        signal,
      );
      const rewritten = extractRewrite(out.answer);
      if (!rewritten) {
        this.logger.warn('Query rewrite was empty; using original query');
        return query;
      }
      if (rewritten !== query) {
        this.logger.log(`Rewrote query | original=${query} | rewritten=${rewritten}`);
      }
      return rewritten;
    } catch (err) {
      if (!(err instanceof ServiceError)) throw err;
      this.logger.warn(`Query rewrite failed (${err.message}); using original query`);
      return query;
    }
  }
}
