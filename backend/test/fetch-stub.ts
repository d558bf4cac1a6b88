import { jest } from '@jest/globals';

export type Route = (
  body: unknown,
  init: RequestInit | undefined,
) => Response | Promise<Response>;

/**
 * Replaces global fetch with an in-process router keyed by exact URL.
 * Unknown URLs reject like an unreachable host.
 */
export function routeFetch(routes: Record<string, Route>) {
  return jest
    .spyOn(globalThis, 'fetch')
    .mockImplementation(async (input, init) => {
      const url = String(input);
      const route = routes[url];
      if (!route) throw new TypeError(`fetch failed: ${url}`);
      const body: unknown =
        typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
      return route(body, init);
    });
}

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** SSE line carrying one streamed completion fragment. */
export function chunk(content: string): string {
  return `data: ${JSON.stringify({ choices: [{ delta: { content } }] })}\n\n`;
}

export const DONE_LINE = 'data: [DONE]\n\n';

/**
 * Streaming response that hands out one part per read, then either closes,
 * errors with `failWith`, or stays open like an idle socket until `holdUntil`
 * aborts.
 */
export function sse(
  parts: string[],
  opts: {
    failWith?: Error;
    onCancel?: () => void;
    holdUntil?: AbortSignal | null;
  } = {},
): Response {
  const encoder = new TextEncoder();
  let i = 0;
  const body = new ReadableStream<Uint8Array>({
    pull(controller) {
      if (i < parts.length) {
        controller.enqueue(encoder.encode(parts[i++]));
        return;
      }
      if (opts.failWith) {
        controller.error(opts.failWith);
        return;
      }
      const signal = opts.holdUntil;
      if (!signal) {
        controller.close();
        return;
      }
      return new Promise<void>((resolve) => {
        const stop = () => {
          controller.error(new Error('The operation was aborted'));
          resolve();
        };
        if (signal.aborted) stop();
        else signal.addEventListener('abort', stop, { once: true });
      });
    },
    cancel() {
      opts.onCancel?.();
    },
  });
  return new Response(body, {
    status: 200,
    headers: { 'Content-Type': 'text/event-stream' },
  });
}

/** Never answers; rejects once the request signal aborts. */
export function hang(init: RequestInit | undefined): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () =>
      reject(new Error('The operation was aborted')),
    );
  });
}

export type SseFrame = { event: string; data: unknown };

/** Parses a buffered `text/event-stream` body into frames. */
export function parseSse(text: string): SseFrame[] {
  return text
    .split('\n\n')
    .filter((block) => block.trim())
    .map((block) => {
      let event = 'message';
      let data = '';
      for (const line of block.split('\n')) {
        if (line.startsWith('event: ')) event = line.slice('event: '.length);
        if (line.startsWith('data: ')) data = line.slice('data: '.length);
      }
      const parsed: unknown = JSON.parse(data);
      return { event, data: parsed };
    });
}
