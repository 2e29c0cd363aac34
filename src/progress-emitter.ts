import type { ProgressEvent, RecordedEvent } from './types/index.js';

export interface SubscribeOptions {
  /** Events buffered for a slow reader before it is dropped (default: 1000) */
  maxQueued?: number;
}

export interface EventPage {
  events: RecordedEvent[];
  nextCursor: number;
  ended: boolean;
}

export interface Subscription extends AsyncIterableIterator<RecordedEvent> {
  close(): void;
  readonly dropped: boolean;
}

class EventSubscription implements Subscription {
  private readonly queue: RecordedEvent[] = [];
  private waiting?: (result: IteratorResult<RecordedEvent>) => void;
  private finished = false;
  private wasDropped = false;

  constructor(
    private readonly maxQueued: number,
    private readonly detach: (subscription: EventSubscription) => void
  ) {}

  get dropped(): boolean {
    return this.wasDropped;
  }

  /** Returns false once this subscriber no longer accepts events. */
  deliver(event: RecordedEvent): boolean {
    if (this.finished) return false;

    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = undefined;
      resolve({ value: event, done: false });
    } else if (this.queue.length >= this.maxQueued) {
      this.wasDropped = true;
      this.close();
      return false;
    } else {
      this.queue.push(event);
    }

    if (event.terminal) {
      this.finished = true;
      this.detach(this);
    }
    return true;
  }

  /** Stop delivery without discarding what is already queued. */
  end(): void {
    this.finished = true;
    if (this.waiting && this.queue.length === 0) {
      const resolve = this.waiting;
      this.waiting = undefined;
      resolve({ value: undefined, done: true });
    }
  }

  close(): void {
    this.queue.length = 0;
    this.end();
    this.detach(this);
  }

  next(): Promise<IteratorResult<RecordedEvent>> {
    const event = this.queue.shift();
    if (event) return Promise.resolve({ value: event, done: false });
    if (this.finished) return Promise.resolve({ value: undefined, done: true });
    return new Promise(resolve => {
      this.waiting = resolve;
    });
  }

  return(): Promise<IteratorResult<RecordedEvent>> {
    this.close();
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): this {
    return this;
  }
}

/**
 * Per-session append-only event log. Polling observers read it by cursor;
 * streaming observers subscribe and see everything published after they attach.
 * publish() never throws and never waits on an observer.
 */
export class ProgressEmitter {
  private readonly logs = new Map<string, RecordedEvent[]>();
  private readonly subscribers = new Map<string, Set<EventSubscription>>();
  private readonly lastPercentage = new Map<string, number>();
  private readonly ended = new Set<string>();

  publish(sessionId: string, event: ProgressEvent): RecordedEvent | undefined {
    if (this.ended.has(sessionId)) {
      console.error(`[Emitter] ${sessionId}: dropped event after terminal: ${event.message}`);
      return undefined;
    }

    const log = this.logs.get(sessionId) ?? [];
    this.logs.set(sessionId, log);

    let recorded: RecordedEvent;
    if (event.type === 'progress') {
      const floor = this.lastPercentage.get(sessionId) ?? 0;
      const percentage = Math.min(100, Math.max(floor, Math.round(event.percentage)));
      this.lastPercentage.set(sessionId, percentage);
      recorded = Object.freeze({ ...event, percentage, seq: log.length });
    } else {
      recorded = Object.freeze({ ...event, seq: log.length });
    }

    log.push(recorded);
    if (recorded.terminal) {
      this.ended.add(sessionId);
    }

    for (const subscriber of [...(this.subscribers.get(sessionId) ?? [])]) {
      try {
        if (!subscriber.deliver(recorded) && subscriber.dropped) {
          console.error(`[Emitter] ${sessionId}: dropped saturated subscriber`);
        }
      } catch (error) {
        console.error(`[Emitter] ${sessionId}: subscriber failed, detaching:`, error);
        subscriber.close();
      }
    }
    return recorded;
  }

  read(sessionId: string, cursor = 0): EventPage {
    const log = this.logs.get(sessionId) ?? [];
    const start = Math.max(0, Math.min(cursor, log.length));
    return {
      events: log.slice(start),
      nextCursor: log.length,
      ended: this.ended.has(sessionId),
    };
  }

  subscribe(sessionId: string, options?: SubscribeOptions): Subscription {
    const maxQueued = Math.max(1, options?.maxQueued ?? 1000);
    const set = this.subscribers.get(sessionId) ?? new Set<EventSubscription>();
    const subscription = new EventSubscription(maxQueued, s => {
      set.delete(s);
    });

    if (this.ended.has(sessionId)) {
      subscription.end();
      return subscription;
    }

    set.add(subscription);
    this.subscribers.set(sessionId, set);
    return subscription;
  }

  subscriberCount(sessionId: string): number {
    return this.subscribers.get(sessionId)?.size ?? 0;
  }

  isEnded(sessionId: string): boolean {
    return this.ended.has(sessionId);
  }

  lastProgress(sessionId: string): number {
    return this.lastPercentage.get(sessionId) ?? 0;
  }
}
