export type Unsubscribe = () => void;

/**
 * Minimal synchronous event bus.
 *
 * - Never throws to callers (subscriber errors go to the error sink instead)
 * - Preserves emission order for each subscriber
 */
export class EventBus<TEvent> {
  private subscribers: Set<(event: TEvent) => void> = new Set();

  constructor(private readonly onSubscriberError: (err: unknown) => void = reportToStderr) {}

  subscribe(cb: (event: TEvent) => void): Unsubscribe {
    this.subscribers.add(cb);
    return () => {
      this.subscribers.delete(cb);
    };
  }

  emit(event: TEvent): void {
    for (const sub of this.subscribers) {
      try {
        sub(event);
      } catch (err) {
        this.onSubscriberError(err);
      }
    }
  }

  get size(): number {
    return this.subscribers.size;
  }
}

function reportToStderr(err: unknown): void {
  process.stderr.write(`event bus subscriber failed: ${err instanceof Error ? err.message : String(err)}\n`);
}
