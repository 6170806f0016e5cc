import { log } from "../logger.js";

/**
 * Pump `source` into a bounded buffer from a separate task so a slow consumer
 * (terminal rendering) does not stall the producer (network reads) until
 * `capacity` items are waiting.
 *
 * Order is preserved, and a producer error surfaces after the buffered items.
 * When the consumer stops early the source is closed with return(); a source
 * blocked on I/O should also observe an abort signal so that return() is reached.
 */
export async function* handoff<T extends object>(
  source: AsyncIterable<T>,
  capacity: number
): AsyncGenerator<T, void, undefined> {
  const limit = Math.max(1, Math.floor(capacity));
  const buffer: T[] = [];
  // Shared with the pump task
  const state: { finished: boolean; stopped: boolean; failure?: { error: unknown } } = {
    finished: false,
    stopped: false,
  };
  let consumerWaiting: (() => void) | null = null;
  let producerWaiting: (() => void) | null = null;

  const wakeConsumer = () => {
    const wake = consumerWaiting;
    consumerWaiting = null;
    wake?.();
  };
  const wakeProducer = () => {
    const wake = producerWaiting;
    producerWaiting = null;
    wake?.();
  };

  const pump = (async () => {
    const iterator = source[Symbol.asyncIterator]();
    try {
      while (!state.stopped) {
        const result = await iterator.next();
        if (result.done) break;
        buffer.push(result.value);
        wakeConsumer();
        while (buffer.length >= limit && !state.stopped) {
          await new Promise<void>((resolve) => {
            producerWaiting = resolve;
          });
        }
      }
      if (state.stopped && iterator.return) {
        await iterator.return();
      }
    } catch (error) {
      if (state.stopped) {
        log(`[Handoff] Source failed after consumer stopped: ${String(error)}`);
      } else {
        state.failure = { error };
      }
    } finally {
      state.finished = true;
      wakeConsumer();
    }
  })();

  try {
    while (true) {
      const next = buffer.shift();
      if (next !== undefined) {
        wakeProducer();
        yield next;
        continue;
      }
      if (state.failure) throw state.failure.error;
      if (state.finished) return;
      await new Promise<void>((resolve) => {
        consumerWaiting = resolve;
      });
    }
  } finally {
    state.stopped = true;
    wakeProducer();
    await pump;
  }
}
