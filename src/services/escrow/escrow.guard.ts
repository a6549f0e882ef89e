import { AsyncLocalStorage } from 'async_hooks';

import { EscrowErrors } from './escrow.errors';
import type { MutatingOperation } from './escrow.types';

interface OperationFrame {
  operation: MutatingOperation;
  finished: boolean;
}

/**
 * Serializes ledger operations.
 *
 * Mutations queue FIFO and run one at a time. A mutation requested from
 * inside a running one (a custody callback re-entering the ledger) is
 * rejected instead of queued, since the outer operation would otherwise wait
 * on itself. Reads from inside an operation run immediately against the
 * committed state; reads from outside wait their turn.
 */
export class OperationGuard {
  private tail: Promise<void> = Promise.resolve();
  private readonly frames = new AsyncLocalStorage<OperationFrame>();
  private current: MutatingOperation | null = null;

  get activeOperation(): MutatingOperation | null {
    return this.current;
  }

  run<T>(operation: MutatingOperation, task: () => Promise<T>): Promise<T> {
    const frame = this.activeFrame();
    if (frame) {
      return Promise.reject(EscrowErrors.reentrantCall(operation, frame.operation));
    }

    return this.enqueue(() => {
      const next: OperationFrame = { operation, finished: false };
      return this.frames.run(next, async () => {
        this.current = operation;
        try {
          return await task();
        } finally {
          next.finished = true;
          this.current = null;
        }
      });
    });
  }

  read<T>(query: () => T): Promise<T> {
    if (this.activeFrame()) {
      return Promise.resolve().then(query);
    }
    return this.enqueue(async () => query());
  }

  // Callbacks scheduled during an operation keep its async context after it ends
  private activeFrame(): OperationFrame | undefined {
    const frame = this.frames.getStore();
    return frame && !frame.finished ? frame : undefined;
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
