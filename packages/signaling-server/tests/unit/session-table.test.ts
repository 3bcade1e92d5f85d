/**
 * Session Table Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { SessionTable, counterpartOf, isParticipant } from '../../src/session/session-table.js';
import { FakeParticipant } from '../harness/fakes.js';

describe('SessionTable', () => {
  let table: SessionTable;
  const alice = new FakeParticipant('alice');
  const bob = new FakeParticipant('bob');
  const carol = new FakeParticipant('carol');

  beforeEach(() => {
    table = new SessionTable();
  });

  it('should report empty for unknown ids', () => {
    expect(table.phaseOf(0x1n, 0)).toBe('empty');
    expect(table.get(0x1n)).toBeUndefined();
  });

  it('should walk a session through waiting, paired and closing', () => {
    const waiting = table.createWaiting(0x1n, alice, 100);
    expect(table.phaseOf(0x1n, 100)).toBe('waiting');

    const paired = table.pair(waiting, bob, 200);
    expect(paired.participants).toEqual([alice, bob]);
    expect(paired.createdAt).toBe(100);
    expect(table.phaseOf(0x1n, 200)).toBe('paired');

    const closing = table.beginClosing(paired, 300);
    expect(closing.closingSince).toBe(300);
    expect(table.phaseOf(0x1n, 300)).toBe('closing');
  });

  it('should remember removed ids as closed until the marker expires', () => {
    table.createWaiting(0x1n, alice, 0);

    expect(table.remove(0x1n, 1000)?.phase).toBe('waiting');
    expect(table.phaseOf(0x1n, 999)).toBe('closed');
    expect(table.phaseOf(0x1n, 1000)).toBe('empty');
    expect(table.remove(0x1n, 2000)).toBeUndefined();
  });

  it('should clear the closed marker when the id is used again', () => {
    table.createWaiting(0x1n, alice, 0);
    table.remove(0x1n, 1000);

    table.createWaiting(0x1n, carol, 10);

    expect(table.isRecentlyClosed(0x1n, 10)).toBe(false);
  });

  it('should purge expired closed markers', () => {
    table.createWaiting(0x1n, alice, 0);
    table.createWaiting(0x2n, bob, 0);
    table.remove(0x1n, 100);
    table.remove(0x2n, 500);

    expect(table.purgeClosed(200)).toBe(1);
    expect(table.stats(200)).toEqual({ total: 0, waiting: 0, paired: 0, closing: 0, recentlyClosed: 1 });
  });

  it('should count sessions by phase', () => {
    table.pair(table.createWaiting(0x1n, alice, 0), bob, 0);
    table.createWaiting(0x2n, carol, 0);

    expect(table.stats(0)).toEqual({ total: 2, waiting: 1, paired: 1, closing: 0, recentlyClosed: 0 });
  });

  it('should find the counterpart of either participant', () => {
    const pair = [alice, bob] as const;

    expect(counterpartOf(pair, alice)).toBe(bob);
    expect(counterpartOf(pair, bob)).toBe(alice);
    expect(counterpartOf(pair, carol)).toBeUndefined();
  });

  it('should check participation in any phase', () => {
    const waiting = table.createWaiting(0x1n, alice, 0);
    expect(isParticipant(waiting, alice)).toBe(true);
    expect(isParticipant(waiting, bob)).toBe(false);

    const paired = table.pair(waiting, bob, 0);
    expect(isParticipant(paired, bob)).toBe(true);
    expect(isParticipant(paired, carol)).toBe(false);
  });
});
