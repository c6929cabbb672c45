import { logger } from '../utils/logger';

interface LockHandle {
  tail: Promise<void>;
  pending: number;
}

/**
 * Per-conversation exclusive sections.
 *
 * Each conversation gets a lazily created handle holding the tail of a promise
 * chain; `runExclusive` appends to the chain synchronously, so tasks run one
 * at a time in the order they were submitted. Different conversations never
 * wait on each other.
 *
 * Handles live for the life of the process. Growth is bounded by the number of
 * distinct conversations seen since start.
 */
export class ConversationLocks {
  private readonly handles = new Map<string, LockHandle>();

  get size(): number {
    return this.handles.size;
  }

  isBusy(conversationId: string): boolean {
    return (this.handles.get(conversationId)?.pending ?? 0) > 0;
  }

  runExclusive<T>(conversationId: string, task: () => Promise<T>): Promise<T> {
    let handle = this.handles.get(conversationId);
    if (!handle) {
      handle = { tail: Promise.resolve(), pending: 0 };
      this.handles.set(conversationId, handle);
    }

    const lock = handle;
    lock.pending += 1;
    if (lock.pending > 1) {
      logger.debug('Conversation busy, queued', { conversationId, pending: lock.pending });
    }

    const run = lock.tail.then(task);
    lock.tail = run.then(
      () => {
        lock.pending -= 1;
      },
      () => {
        lock.pending -= 1;
      }
    );
    return run;
  }
}
