/**
 * Single-consumer async mailbox. Producers push from any callback; the one
 * consumer awaits next(), so message handling never interleaves.
 */
export interface MessageQueue<T> {
  push(message: T): void;
  next(): Promise<T>;
  clear(): void;
}

export function createMessageQueue<T>(): MessageQueue<T> {
  const items: T[] = [];
  let waiting: ((message: T) => void) | null = null;

  return {
    push(message: T) {
      if (waiting) {
        const deliver = waiting;
        waiting = null;
        deliver(message);
        return;
      }
      items.push(message);
    },

    next(): Promise<T> {
      if (waiting) {
        return Promise.reject(new Error("MessageQueue supports a single consumer"));
      }
      if (items.length > 0) {
        const [head] = items.splice(0, 1);
        if (head !== undefined) return Promise.resolve(head);
      }
      return new Promise<T>((resolve) => {
        waiting = resolve;
      });
    },

    clear(): void {
      items.length = 0;
    },
  };
}
