import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common';
import {
  ConfigurationError,
  UpstreamError,
  describeError,
} from '../common/errors';
import { readSseData } from '../common/sse';
import { UpstreamCall } from '../common/upstream-call';
import { GenerationParams, SETTINGS, Settings } from '../config/settings';
import {
  ChatCompletionChunkSchema,
  ChatCompletionSchema,
  ChatMessage,
  CompletionResult,
  Usage,
} from './schemas';

const DONE = '[DONE]';

/**
 * Client for an OpenAI-style `/chat/completions` endpoint, batched or streamed.
 */
@Injectable()
export class ChatCompletionService {
  private readonly logger = new Logger(ChatCompletionService.name);

  constructor(@Inject(SETTINGS) private readonly settings: Settings) {}

  private headers() {
    if (!this.settings.apiKey) {
      throw new ConfigurationError(
        'Chat completion API key is not configured.',
      );
    }
    return {
      Authorization: `Bearer ${this.settings.apiKey}`,
      'Content-Type': 'application/json',
    };
  }

  private payload(
    messages: ChatMessage[],
    params: GenerationParams,
    stream: boolean,
  ) {
    return JSON.stringify({
      model: params.name,
      messages,
      temperature: params.temperature,
      top_p: params.topP,
      max_tokens: params.maxTokens,
      stream,
    });
  }

  private async open(
    call: UpstreamCall,
    body: string,
    headers: Record<string, string>,
  ): Promise<Response> {
    let res: Response;
    try {
      res = await fetch(this.settings.baseUrl, {
        method: 'POST',
        headers,
        body,
        signal: call.signal,
      });
    } catch (err) {
      throw this.transportError(call, err);
    }

    if (!res.ok) {
      const detail = (await res.text().catch(() => '')) || res.statusText;
      throw new UpstreamError(
        `Chat upstream error: ${res.status} - ${detail.slice(0, 500)}`,
      );
    }
    return res;
  }

  private transportError(call: UpstreamCall, err: unknown): UpstreamError {
    if (call.timedOut) {
      return new UpstreamError(
        `Chat upstream timed out after ${this.settings.timeoutMs}ms`,
        HttpStatus.GATEWAY_TIMEOUT,
        { cause: err },
      );
    }
    this.logger.warn(`Chat upstream request failed: ${describeError(err)}`);
    return new UpstreamError(
      'Upstream chat request failed',
      HttpStatus.BAD_GATEWAY,
      { cause: err },
    );
  }

  /** Single blocking completion. */
  async complete(
    messages: ChatMessage[],
    params: GenerationParams = this.settings.model,
    signal?: AbortSignal,
  ): Promise<CompletionResult> {
    const headers = this.headers();
    const call = new UpstreamCall(this.settings.timeoutMs, signal);

    this.logger.log(`Calling chat upstream | model=${params.name} | stream=false`);

    try {
      const res = await this.open(
        call,
        this.payload(messages, params, false),
        headers,
      );

      let json: unknown;
      try {
        json = await res.json();
      } catch (err) {
        if (call.timedOut) throw this.transportError(call, err);
        throw new UpstreamError(
          'Chat upstream returned invalid JSON',
          HttpStatus.BAD_GATEWAY,
          { cause: err },
        );
      }

      const parsed = ChatCompletionSchema.safeParse(json);
      if (!parsed.success) {
        throw new UpstreamError('Chat upstream returned a malformed payload');
      }

      const raw = parsed.data;
      const first = raw.choices[0];
      if (!first) throw new UpstreamError('Chat upstream returned no choices');

      const answer = (first.message.content ?? '').trim();
      if (!answer) {
        throw new UpstreamError('Choice contained no message content');
      }

      const usage: Usage | null = raw.usage
        ? {
            prompt_tokens: raw.usage.prompt_tokens ?? null,
            completion_tokens: raw.usage.completion_tokens ?? null,
            total_tokens: raw.usage.total_tokens ?? null,
          }
        : null;

      return { answer, model: raw.model ?? params.name, usage, raw };
    } finally {
      call.release();
    }
  }

  /**
   * Streams text fragments in arrival order. The deadline only covers the wait
   * for the response head; after that the stream runs until `[DONE]`, the end
   * of the body, an upstream error, or `signal` aborting.
   *
   * Stopping iteration early cancels the body and aborts the request.
   */
  async *stream(
    messages: ChatMessage[],
    signal?: AbortSignal,
  ): AsyncGenerator<string> {
    const params = this.settings.model;
    const headers = this.headers();
    const call = new UpstreamCall(this.settings.timeoutMs, signal);

    this.logger.log(`Calling chat upstream | model=${params.name} | stream=true`);

    let reader: ReadableStreamDefaultReader<Uint8Array> | undefined;
    try {
      const res = await this.open(
        call,
        this.payload(messages, params, true),
        headers,
      );
      call.clearDeadline();

      if (!res.body) throw new UpstreamError('Chat upstream returned no body');
      reader = res.body.getReader();

      try {
        for await (const data of readSseData(reader)) {
          if (data === DONE) break;

          const chunk = this.parseChunk(data);
          if (!chunk) continue;
          if (chunk.error) {
            throw new UpstreamError(
              `Chat upstream stream error: ${chunk.error.message ?? 'unknown'}`,
            );
          }

          const content = chunk.choices?.[0]?.delta?.content;
          if (content) yield content;
        }
      } catch (err) {
        if (err instanceof UpstreamError) throw err;
        if (call.cancelled) return;
        throw new UpstreamError(
          'Chat upstream stream interrupted',
          HttpStatus.BAD_GATEWAY,
          { cause: err },
        );
      }
    } finally {
      // Cancelling an errored body rejects with the original error.
      await reader
        ?.cancel()
        .catch((err: unknown) =>
          this.logger.debug(`Stream cancel: ${describeError(err)}`),
        );
      call.release();
    }
  }

  private parseChunk(data: string) {
    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch {
      this.logger.debug(`Skipping malformed stream line: ${data.slice(0, 120)}`);
      return null;
    }
    const parsed = ChatCompletionChunkSchema.safeParse(json);
    return parsed.success ? parsed.data : null;
  }
}
