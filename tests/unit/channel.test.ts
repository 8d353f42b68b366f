/**
 * Tests for channel.ts
 */

import { describe, it, expect } from 'vitest';
import { Channel } from '../../src/channel.js';
import { ChannelClosedError } from '../../src/types.js';

// Let pending promise callbacks run
const flush = () => new Promise<void>(resolve => setImmediate(resolve));

describe('Channel', () => {
  describe('constructor', () => {
    it('rejects negative capacity', () => {
      expect(() => new Channel<number>(-1)).toThrow(RangeError);
    });

    it('rejects fractional capacity', () => {
      expect(() => new Channel<number>(1.5)).toThrow(RangeError);
    });
  });

  describe('buffering', () => {
    it('delivers values in FIFO order', async () => {
      const channel = new Channel<number>(3);
      await channel.send(1);
      await channel.send(2);
      await channel.send(3);

      expect(await channel.receive()).toBe(1);
      expect(await channel.receive()).toBe(2);
      expect(await channel.receive()).toBe(3);
    });

    it('reports buffered size', () => {
      const channel = new Channel<string>(2);
      channel.trySend('a');
      expect(channel.size).toBe(1);
      expect(channel.capacity).toBe(2);
    });

    it('trySend returns false when full', () => {
      const channel = new Channel<string>(1);
      expect(channel.trySend('a')).toBe(true);
      expect(channel.trySend('b')).toBe(false);
      expect(channel.size).toBe(1);
    });

    it('tryReceive returns undefined when empty', () => {
      const channel = new Channel<string>(1);
      expect(channel.tryReceive()).toBeUndefined();
    });
  });

  describe('backpressure', () => {
    it('suspends send while full and resumes when a slot opens', async () => {
      const channel = new Channel<string>(1);
      await channel.send('a');

      let sent = false;
      const pending = channel.send('b').then(() => { sent = true; });
      await flush();
      expect(sent).toBe(false);

      expect(await channel.receive()).toBe('a');
      await pending;
      expect(sent).toBe(true);
      expect(channel.size).toBe(1);
      expect(await channel.receive()).toBe('b');
    });

    it('suspends receive until a value arrives', async () => {
      const channel = new Channel<string>(1);
      const received = channel.receive();

      channel.trySend('late');
      expect(await received).toBe('late');
      expect(channel.size).toBe(0);
    });

    it('capacity 0 hands values directly to a receiver', async () => {
      const channel = new Channel<string>(0);
      expect(channel.trySend('nobody listening')).toBe(false);

      const sending = channel.send('hello');
      expect(channel.size).toBe(0);
      expect(await channel.receive()).toBe('hello');
      await expect(sending).resolves.toBeUndefined();
    });
  });

  describe('close', () => {
    it('keeps buffered values receivable, then yields undefined', async () => {
      const channel = new Channel<string>(2);
      channel.trySend('a');
      channel.close();

      expect(channel.closed).toBe(true);
      expect(await channel.receive()).toBe('a');
      expect(await channel.receive()).toBeUndefined();
    });

    it('rejects sends after close', async () => {
      const channel = new Channel<string>(2);
      channel.close();

      await expect(channel.send('a')).rejects.toBeInstanceOf(ChannelClosedError);
      expect(channel.trySend('a')).toBe(false);
    });

    it('rejects senders suspended on a full channel', async () => {
      const channel = new Channel<string>(1);
      channel.trySend('a');
      const blocked = channel.send('b');

      channel.close();

      await expect(blocked).rejects.toBeInstanceOf(ChannelClosedError);
      expect(await channel.receive()).toBe('a');
      expect(await channel.receive()).toBeUndefined();
    });

    it('resolves waiting receivers with undefined', async () => {
      const channel = new Channel<string>(1);
      const waiting = channel.receive();

      channel.close();

      expect(await waiting).toBeUndefined();
    });

    it('is idempotent', () => {
      const channel = new Channel<string>(1);
      channel.close();
      expect(() => channel.close()).not.toThrow();
    });
  });

  describe('async iteration', () => {
    it('yields every value until closed and drained', async () => {
      const channel = new Channel<number>(4);
      channel.trySend(1);
      channel.trySend(2);

      const seen: number[] = [];
      const consumer = (async () => {
        for await (const value of channel) {
          seen.push(value);
        }
      })();

      await channel.send(3);
      channel.close();
      await consumer;

      expect(seen).toEqual([1, 2, 3]);
    });
  });
});
