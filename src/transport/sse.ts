/**
 * SSE utilities: a writer for ServerResponse and a reader for fetch bodies.
 */

import type { ServerResponse } from 'node:http';
import type { SSEEvent } from './types.js';

/**
 * Writes SSE frames to an HTTP response.
 */
export class SSEWriter {
  private closed = false;
  private keepAliveTimer: ReturnType<typeof setInterval> | null = null;
  private closeListeners: (() => void)[] = [];

  constructor(
    private res: ServerResponse,
    keepAliveMs = 15_000,
  ) {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.flushHeaders();

    this.keepAliveTimer = setInterval(() => {
      if (!this.closed) {
        this.res.write(':keep-alive\n\n');
      }
    }, keepAliveMs);

    res.on('close', () => this.close());
  }

  send(event: SSEEvent): void {
    if (this.closed) return;
    let frame = '';
    if (event.id) frame += `id: ${event.id}\n`;
    if (event.retry !== undefined) frame += `retry: ${event.retry}\n`;
    frame += `event: ${event.event}\n`;
    for (const line of event.data.split('\n')) {
      frame += `data: ${line}\n`;
    }
    frame += '\n';
    this.res.write(frame);
  }

  /** Called once when the stream closes, from either side. */
  onClose(listener: () => void): void {
    if (this.closed) {
      listener();
      return;
    }
    this.closeListeners.push(listener);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.keepAliveTimer) {
      clearInterval(this.keepAliveTimer);
      this.keepAliveTimer = null;
    }
    if (!this.res.writableEnded) this.res.end();
    for (const listener of this.closeListeners.splice(0)) listener();
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

/**
 * Parses SSE events from a readable byte stream (e.g. a fetch response body).
 */
export class SSEReader {
  constructor(private stream: ReadableStream<Uint8Array>) {}

  async *events(): AsyncGenerator<SSEEvent> {
    const reader = this.stream.getReader();
    const decoder = new TextDecoder();
    let buffer = '';
    let name: string | undefined;
    let data: string | undefined;
    let id: string | undefined;
    let retry: number | undefined;

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        buffer += decoder.decode(value, { stream: true });

        const lines = buffer.split('\n');
        buffer = lines.pop() ?? '';

        for (const line of lines) {
          if (line === '') {
            if (name !== undefined && data !== undefined) {
              const event: SSEEvent = { event: name, data };
              if (id !== undefined) event.id = id;
              if (retry !== undefined) event.retry = retry;
              yield event;
            }
            name = data = id = undefined;
            retry = undefined;
          } else if (line.startsWith('event: ')) {
            name = line.slice(7);
          } else if (line.startsWith('data: ')) {
            data = data !== undefined ? data + '\n' + line.slice(6) : line.slice(6);
          } else if (line.startsWith('id: ')) {
            id = line.slice(4);
          } else if (line.startsWith('retry: ')) {
            retry = parseInt(line.slice(7), 10);
          }
          // Lines starting with ':' are comments
        }
      }
    } finally {
      reader.releaseLock();
    }
  }
}
