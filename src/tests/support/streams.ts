import type { WireEvent } from '../../stream/events.js';

/** Reads a stream to its end. */
export async function collect(events: AsyncIterable<WireEvent>): Promise<WireEvent[]> {
  const out: WireEvent[] = [];
  // eslint-disable-next-line functional/no-loop-statements -- drain in order
  for await (const event of events) {
    out.push(event);
  }
  return out;
}

export const typesOf = (events: readonly WireEvent[]): string[] => events.map((event) => event.type);
