import { describe, it, expect, beforeEach } from 'vitest';
import { eventBus, EventType } from '../src/infra/eventBus.js';

describe('EventBus', () => {
  beforeEach(() => {
    eventBus.clear();
  });

  it('delivers events to specific listeners', () => {
    const received: Array<{ event: EventType; data: unknown }> = [];
    eventBus.on('vote.cast', (event, data) => {
      received.push({ event, data });
    });

    eventBus.emit('vote.cast', { proposalId: 1 });
    eventBus.emit('clock.advanced', { height: 2 });

    expect(received).toEqual([{ event: 'vote.cast', data: { proposalId: 1 } }]);
  });

  it('delivers all events to wildcard listeners', () => {
    const received: EventType[] = [];
    eventBus.on('*', (event) => {
      received.push(event);
    });

    eventBus.emit('stake.committed', {});
    eventBus.emit('proposal.created', {});
    eventBus.emit('proposal.executed', {});

    expect(received).toEqual(['stake.committed', 'proposal.created', 'proposal.executed']);
  });

  it('unsubscribes correctly', () => {
    const received: unknown[] = [];
    const unsub = eventBus.on('proposal.executed', (_e, data) => {
      received.push(data);
    });
    const unsubAll = eventBus.on('*', (_e, data) => {
      received.push(`*${String(data)}`);
    });

    eventBus.emit('proposal.executed', 'first');
    unsub();
    unsubAll();
    eventBus.emit('proposal.executed', 'second');

    expect(received).toEqual(['first', '*first']);
  });

  it('clear() removes all listeners', () => {
    const received: unknown[] = [];
    eventBus.on('stake.committed', (_e, data) => received.push(data));
    eventBus.on('*', (_e, data) => received.push(data));

    eventBus.clear();
    eventBus.emit('stake.committed', 'test');

    expect(received).toHaveLength(0);
  });

  it('counts listener errors without affecting other listeners', () => {
    const received: unknown[] = [];

    eventBus.on('participant.registered', () => {
      throw new Error('boom');
    });
    eventBus.on('participant.registered', (_e, data) => {
      received.push(data);
    });

    eventBus.emit('participant.registered', 'value');

    expect(received).toEqual(['value']);
    expect(eventBus.failedDeliveries()).toBe(1);

    eventBus.clear();
    expect(eventBus.failedDeliveries()).toBe(0);
  });
});
