import { describe, it, expect } from 'vitest';
import { ProgressEmitter } from '../progress-emitter.js';
import type { ProgressEvent, RecordedEvent } from '../types/index.js';

function progress(percentage: number, terminal?: boolean): ProgressEvent {
  return { type: 'progress', percentage, message: `at ${percentage}`, phase: 'test', timestamp: '2026-01-01T00:00:00.000Z', terminal };
}

function log(message: string, terminal?: boolean): ProgressEvent {
  return { type: 'log', level: 'info', message, timestamp: '2026-01-01T00:00:00.000Z', terminal };
}

function percentages(events: RecordedEvent[]): number[] {
  return events.flatMap(e => (e.type === 'progress' ? [e.percentage] : []));
}

describe('ProgressEmitter', () => {
  it('numbers events and never lets progress go backwards', () => {
    const emitter = new ProgressEmitter();
    emitter.publish('s1', progress(10));
    const late = emitter.publish('s1', progress(5));
    emitter.publish('s1', progress(33.4));
    emitter.publish('s1', progress(150));

    expect(late?.seq).toBe(1);
    expect(percentages(emitter.read('s1').events)).toEqual([10, 10, 33, 100]);
    expect(emitter.lastProgress('s1')).toBe(100);
  });

  it('pages the log by cursor', () => {
    const emitter = new ProgressEmitter();
    emitter.publish('s1', log('one'));
    emitter.publish('s1', log('two'));
    emitter.publish('s1', log('three'));

    const all = emitter.read('s1');
    expect(all.events).toHaveLength(3);
    expect(all.nextCursor).toBe(3);

    const tail = emitter.read('s1', 2);
    expect(tail.events.map(e => e.message)).toEqual(['three']);
    expect(emitter.read('s1', 99).events).toEqual([]);
  });

  it('keeps sessions apart', () => {
    const emitter = new ProgressEmitter();
    emitter.publish('s1', log('mine'));

    expect(emitter.read('s2').events).toEqual([]);
  });

  it('drops events published after a terminal one', () => {
    const emitter = new ProgressEmitter();
    emitter.publish('s1', progress(100, true));

    expect(emitter.publish('s1', log('too late'))).toBeUndefined();
    expect(emitter.read('s1')).toMatchObject({ nextCursor: 1, ended: true });
  });

  it('streams events to subscribers until the terminal event', async () => {
    const emitter = new ProgressEmitter();
    const subscription = emitter.subscribe('s1');
    emitter.publish('s1', log('started'));
    emitter.publish('s1', log('failed', true));

    const received: string[] = [];
    for await (const event of subscription) {
      received.push(event.message);
    }

    expect(received).toEqual(['started', 'failed']);
    expect(emitter.subscriberCount('s1')).toBe(0);
  });

  it('ends a subscription on an already finished session at once', async () => {
    const emitter = new ProgressEmitter();
    emitter.publish('s1', log('done', true));

    const subscription = emitter.subscribe('s1');
    expect(await subscription.next()).toEqual({ value: undefined, done: true });
  });

  it('drops a subscriber that falls too far behind without blocking the log', async () => {
    const emitter = new ProgressEmitter();
    const subscription = emitter.subscribe('s1', { maxQueued: 2 });
    emitter.publish('s1', log('a'));
    emitter.publish('s1', log('b'));
    emitter.publish('s1', log('c'));

    expect(subscription.dropped).toBe(true);
    expect(emitter.subscriberCount('s1')).toBe(0);
    expect(emitter.read('s1').events).toHaveLength(3);
    expect(await subscription.next()).toEqual({ value: undefined, done: true });
  });

  it('stops delivery when the reader closes', () => {
    const emitter = new ProgressEmitter();
    const subscription = emitter.subscribe('s1');
    subscription.close();

    emitter.publish('s1', log('ignored'));
    expect(emitter.subscriberCount('s1')).toBe(0);
  });
});
