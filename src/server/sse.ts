import type { WireEvent } from '../stream/events.js';

/** The slice of an HTTP response the SSE writer needs. */
export interface SseSink {
  write(chunk: string): boolean;
  readonly writableEnded: boolean;
  readonly destroyed: boolean;
}

export const formatSseEvent = (event: WireEvent): string => `data: ${JSON.stringify(event)}\n\n`;

/**
 * Copies a session stream to the sink until the terminal event.
 * Stops early when the sink has been closed. Returns the number of events written.
 */
export async function pipeEventsToSse(events: AsyncIterable<WireEvent>, sink: SseSink): Promise<number> {
  let written = 0;
  // eslint-disable-next-line functional/no-loop-statements -- consume the stream in order
  for await (const event of events) {
    if (sink.writableEnded || sink.destroyed) break;
    sink.write(formatSseEvent(event));
    written += 1;
  }
  return written;
}
