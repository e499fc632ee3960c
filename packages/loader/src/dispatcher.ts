export type ListenerErrorHandler = (error: unknown) => void;

/**
 * Single-threaded completion queue.
 *
 * State changes run inside `run`; listener invocations requested while a scope
 * is open are deferred and drained in FIFO order once the outermost scope
 * closes. A listener that re-enters the loader opens a nested scope, so its
 * own listeners join the tail of the same drain instead of running mid-scan.
 */
export class CompletionDispatcher {
  private readonly queue: Array<() => void> = [];
  private readonly onListenerError: ListenerErrorHandler;
  private depth = 0;

  constructor(params: { onListenerError: ListenerErrorHandler }) {
    this.onListenerError = params.onListenerError;
  }

  get pending(): number {
    return this.queue.length;
  }

  run(operation: () => void): void {
    this.depth += 1;
    try {
      operation();
    } finally {
      this.depth -= 1;
      if (this.depth === 0) this.drain();
    }
  }

  enqueue(listener: () => void): void {
    this.queue.push(listener);
    if (this.depth === 0) this.drain();
  }

  private drain(): void {
    this.depth += 1;
    try {
      let next = this.queue.shift();
      while (next) {
        try {
          next();
        } catch (error) {
          this.onListenerError(error);
        }
        next = this.queue.shift();
      }
    } finally {
      this.depth -= 1;
    }
  }
}
