import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { Test } from '@nestjs/testing';
import { ChatCompletionService } from '../ai/completion.service';
import { NO_DOCUMENTS } from '../ai/prompts';
import { QueryRewriterService } from '../ai/query-rewriter.service';
import type { ChatMessage, CompletionResult } from '../ai/schemas';
import { RetrievalError, UpstreamError } from '../common/errors';
import { SETTINGS, SettingsInput, loadSettings } from '../config/settings';
import { RetrievalService } from '../rag/retrieval.service';
import type { RetrievedDocument } from '../rag/schemas';
import type { ChatRequest, StreamEvent } from './chat.schemas';
import { ChatService } from './chat.service';

function doc(id: string, score: number, content: string): RetrievedDocument {
  return {
    id,
    title: null,
    content,
    score,
    chunk_id: null,
    chunk_type: null,
    origin_id: null,
    source_text: null,
    source: null,
  };
}

const documents = [
  doc('doc-1', 0.88, 'Coconut milk replaces cream in curries.'),
  doc('doc-2', 0.86, 'Chickpeas stand in for paneer.'),
];

function result(answer: string): CompletionResult {
  return {
    answer,
    model: 'test-model',
    usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    raw: {
      id: 'cmpl-1',
      model: 'test-model',
      choices: [{ message: { role: 'assistant', content: answer } }],
    },
  };
}

const request = (over: Partial<ChatRequest> = {}): ChatRequest => ({
  query: 'vegan curry substitute',
  stream: false,
  ...over,
});

async function* fragments(
  parts: string[],
  failWith?: Error,
): AsyncGenerator<string> {
  for (const p of parts) yield p;
  if (failWith) throw failWith;
}

async function collect(gen: AsyncGenerator<StreamEvent>) {
  const out: StreamEvent[] = [];
  for await (const ev of gen) out.push(ev);
  return out;
}

describe('ChatService', () => {
  const retrieve = jest.fn<RetrievalService['retrieve']>();
  const complete = jest.fn<ChatCompletionService['complete']>();
  const stream = jest.fn<ChatCompletionService['stream']>();
  let chat: ChatService;

  async function build(overrides: SettingsInput = {}) {
    const moduleRef = await Test.createTestingModule({
      providers: [
        ChatService,
        QueryRewriterService,
        {
          provide: SETTINGS,
          useValue: loadSettings({ apiKey: 'test-key', ...overrides }),
        },
        { provide: RetrievalService, useValue: { retrieve } },
        { provide: ChatCompletionService, useValue: { complete, stream } },
      ],
    }).compile();
    chat = moduleRef.get(ChatService);
  }

  beforeEach(async () => {
    retrieve.mockReset();
    complete.mockReset();
    stream.mockReset();
    await build();
  });

  describe('answer', () => {
    it('retrieves, then generates from the grounded prompt', async () => {
      retrieve.mockResolvedValue(documents);
      complete.mockResolvedValue(result('Use coconut milk (Doc-1).'));

      const out = await chat.answer(
        request({ top_k: 2, use_rerank: true, rerank_mode: 'bi', rerank_top_k: 2 }),
      );

      expect(retrieve).toHaveBeenCalledWith(
        'vegan curry substitute',
        { topK: 2, useRerank: true, rerankMode: 'bi', rerankTopK: 2 },
        undefined,
      );
      const sent: ChatMessage[] = complete.mock.calls[0][0];
      expect(sent[1].content).toContain('Coconut milk replaces cream in curries.');
      expect(out).toEqual({
        answer: 'Use coconut milk (Doc-1).',
        model: 'test-model',
        usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
        documents,
        raw_response: result('Use coconut milk (Doc-1).').raw,
      });
    });

    it('generates ungrounded when nothing was retrieved', async () => {
      retrieve.mockResolvedValue([]);
      complete.mockResolvedValue(result("I don't know."));

      const out = await chat.answer(request());

      expect(out.documents).toEqual([]);
      expect(complete.mock.calls[0][0][1].content).toContain(NO_DOCUMENTS);
    });

    it('skips generation when retrieval fails', async () => {
      retrieve.mockRejectedValue(new RetrievalError('Retriever request failed'));

      await expect(chat.answer(request())).rejects.toBeInstanceOf(RetrievalError);
      expect(complete).not.toHaveBeenCalled();
    });

    it('retrieves with the rewritten query but prompts with the original', async () => {
      await build({ rewriter: { enabled: true } });
      retrieve.mockResolvedValue(documents);
      complete
        .mockResolvedValueOnce(result('<rewrite>dairy-free curry recipe</rewrite>'))
        .mockResolvedValueOnce(result('Use coconut milk.'));

      await chat.answer(request());

      expect(retrieve.mock.calls[0][0]).toBe('dairy-free curry recipe');
      expect(complete.mock.calls[1][0][1].content).toContain(
        '<<<vegan curry substitute>>>',
      );
    });
  });

  describe('stream', () => {
    it('emits meta, one delta per fragment, then end', async () => {
      retrieve.mockResolvedValue(documents);
      stream.mockReturnValue(fragments(['Use ', 'coconut ', 'milk.']));

      const events = await collect(chat.stream(request({ stream: true })));

      expect(events).toEqual([
        {
          event: 'meta',
          data: { model: 'Qwen/Qwen2.5-7B-Instruct', documents },
        },
        { event: 'delta', data: { text: 'Use ' } },
        { event: 'delta', data: { text: 'coconut ' } },
        { event: 'delta', data: { text: 'milk.' } },
        { event: 'end', data: { answer: 'Use coconut milk.' } },
      ]);
    });

    it('emits only an error event when retrieval fails', async () => {
      retrieve.mockRejectedValue(
        new RetrievalError('Retriever request timed out after 50ms', 504),
      );

      const events = await collect(chat.stream(request({ stream: true })));

      expect(events).toEqual([
        {
          event: 'error',
          data: {
            error: 'RetrievalError',
            message: 'Retriever request timed out after 50ms',
          },
        },
      ]);
      expect(stream).not.toHaveBeenCalled();
    });

    it('keeps partial output and appends error on mid-stream failure', async () => {
      retrieve.mockResolvedValue(documents);
      stream.mockReturnValue(
        fragments(
          ['a', 'b', 'c'],
          new UpstreamError('Chat upstream stream interrupted'),
        ),
      );

      const events = await collect(chat.stream(request({ stream: true })));

      expect(events.map((e) => e.event)).toEqual([
        'meta',
        'delta',
        'delta',
        'delta',
        'error',
      ]);
      expect(events[4]).toEqual({
        event: 'error',
        data: {
          error: 'UpstreamError',
          message: 'Chat upstream stream interrupted',
        },
      });
    });

    it('reports unexpected failures as InternalError', async () => {
      retrieve.mockResolvedValue([]);
      stream.mockReturnValue(fragments([], new TypeError('boom')));

      const events = await collect(chat.stream(request({ stream: true })));

      expect(events[events.length - 1]).toEqual({
        event: 'error',
        data: { error: 'InternalError', message: 'Internal server error' },
      });
    });

    it('stops without a terminal event once the caller disconnects', async () => {
      retrieve.mockResolvedValue(documents);
      const caller = new AbortController();
      stream.mockImplementation(async function* (_messages, signal) {
        yield 'a';
        if (signal?.aborted) return;
        await new Promise((resolve) =>
          signal?.addEventListener('abort', resolve, { once: true }),
        );
      });

      const events: StreamEvent[] = [];
      for await (const ev of chat.stream(request({ stream: true }), caller.signal)) {
        events.push(ev);
        if (ev.event === 'delta') caller.abort();
      }

      expect(events.map((e) => e.event)).toEqual(['meta', 'delta']);
      expect(stream.mock.calls[0][1]).toBe(caller.signal);
    });
  });
});
