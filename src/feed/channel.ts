// pattern: Imperative Shell

/**
 * A bounded FIFO that transports push provider messages into and a session
 * drains with `for await`. Closing it lets the reader finish the buffered
 * items and then ends the iteration.
 */
export type MessageChannel<T> = AsyncIterable<T> & {
  push(item: T): void;
  close(): void;
  readonly length: number;
  readonly capacity: number;
  readonly closed: boolean;
};

export function createMessageChannel<T>(capacity: number, label = "feed"): MessageChannel<T> {
  const buffer: Array<T> = [];
  let closed = false;
  let wake: (() => void) | null = null;

  const notify = (): void => {
    const resolve = wake;
    wake = null;
    resolve?.();
  };

  return {
    push(item: T): void {
      if (closed) return;
      if (buffer.length >= capacity) {
        buffer.shift(); // drop oldest
        console.warn(`[${label}] channel full (${capacity}), dropped oldest message`);
      }
      buffer.push(item);
      notify();
    },

    close(): void {
      if (closed) return;
      closed = true;
      notify();
    },

    get length(): number {
      return buffer.length;
    },

    get capacity(): number {
      return capacity;
    },

    get closed(): boolean {
      return closed;
    },

    async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
      while (true) {
        if (buffer.length > 0) {
          const [item] = buffer.splice(0, 1);
          if (item !== undefined) {
            yield item;
          }
          continue;
        }
        if (closed) return;
        await new Promise<void>((resolve) => {
          wake = resolve;
        });
      }
    },
  };
}
