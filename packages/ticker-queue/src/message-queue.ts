export interface MessageItem {
  readonly id: number;
  readonly text: string;
  /** Lower values are more urgent. */
  readonly priority: number;
  readonly expiresAt: number;
}

export interface MessageQueueOptions {
  now?: () => number;
  defaultPriority?: number;
}

export interface MessageQueue {
  push(text: string, ttlMs: number, priority?: number): MessageItem;
  current(): string;
  remove(id: number): boolean;
  size(): number;
  items(): readonly MessageItem[];
}

export const DEFAULT_PRIORITY = 10;

export function createMessageQueue(options: MessageQueueOptions = {}): MessageQueue {
  const now = options.now ?? Date.now;
  const defaultPriority = options.defaultPriority ?? DEFAULT_PRIORITY;
  let nextId = 1;
  // Kept sorted by priority; Array#sort is stable, so equal priorities stay in push order.
  let queue: MessageItem[] = [];

  const evictExpired = (): void => {
    const at = now();
    if (queue.some((item) => item.expiresAt <= at)) {
      queue = queue.filter((item) => item.expiresAt > at);
    }
  };

  return {
    push(text, ttlMs, priority = defaultPriority) {
      const item: MessageItem = Object.freeze({
        id: nextId++,
        text,
        priority,
        expiresAt: now() + ttlMs,
      });
      queue = [...queue, item].sort((a, b) => a.priority - b.priority);
      return item;
    },

    current() {
      evictExpired();
      return queue[0]?.text ?? "";
    },

    remove(id) {
      const before = queue.length;
      queue = queue.filter((item) => item.id !== id);
      return queue.length !== before;
    },

    size() {
      evictExpired();
      return queue.length;
    },

    items() {
      evictExpired();
      return [...queue];
    },
  };
}
