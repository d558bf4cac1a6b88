/** Serializes one Server-Sent Events frame with a JSON payload. */
export function formatSse(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

/**
 * Splits a chunked `text/event-stream` body into the payloads of its `data:`
 * lines. Partial lines are carried over to the next chunk.
 */
export async function* readSseData(
  reader: ReadableStreamDefaultReader<Uint8Array>,
): AsyncGenerator<string> {
  const decoder = new TextDecoder();
  let buffer = '';

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;

    buffer += decoder.decode(value, { stream: true });
    const lines = buffer.split('\n');
    buffer = lines.pop() ?? '';

    for (const line of lines) {
      const data = dataOf(line);
      if (data) yield data;
    }
  }

  buffer += decoder.decode();
  const tail = dataOf(buffer);
  if (tail) yield tail;
}

function dataOf(line: string): string | null {
  const trimmed = line.replace(/\r$/, '');
  if (!trimmed.startsWith('data:')) return null;
  const data = trimmed.slice('data:'.length).trim();
  return data || null;
}

/** The part of a writable HTTP response the SSE writer needs. */
export interface SseSink {
  write(chunk: string): boolean;
  once(event: 'drain' | 'close', listener: () => void): unknown;
  off(event: 'drain' | 'close', listener: () => void): unknown;
}

/**
 * Writes one frame and, when the socket buffer is full, waits until it drains
 * or the connection closes before resolving.
 */
export async function writeSse(out: SseSink, frame: string): Promise<void> {
  if (out.write(frame)) return;
  await new Promise<void>((resolve) => {
    const done = () => {
      out.off('drain', done);
      out.off('close', done);
      resolve();
    };
    out.once('drain', done);
    out.once('close', done);
  });
}
