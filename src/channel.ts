/**
 * Channel - Bounded async FIFO conduit
 *
 * Senders suspend while the buffer is full, receivers suspend while it is
 * empty. Capacity 0 is a rendezvous: a send completes only when a receiver
 * takes the value.
 *
 * Closing keeps buffered values receivable, rejects pending senders and
 * resolves pending receivers with undefined. `undefined` is the end-of-stream
 * marker, so channels never carry undefined as a value.
 *
 * @remarks Unit test all changes - see tests/unit/channel.test.ts
 */

import { ChannelClosedError } from './types.js';

interface PendingSend<T> {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

type PendingReceive<T> = (value: T | undefined) => void;

export class Channel<T> {
  private buffer: T[] = [];
  private senders: PendingSend<T>[] = [];
  private receivers: PendingReceive<T>[] = [];
  private isClosed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Channel capacity must be a non-negative integer, got ${capacity}`);
    }
  }

  /**
   * Number of buffered values (pending senders not included)
   */
  get size(): number {
    return this.buffer.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Deliver a value, suspending while the channel is full.
   * @throws ChannelClosedError if the channel is or becomes closed first
   */
  send(value: T): Promise<void> {
    if (this.isClosed) {
      return Promise.reject(new ChannelClosedError());
    }
    if (this.trySend(value)) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
    });
  }

  /**
   * Deliver a value without suspending. Returns false when full or closed.
   */
  trySend(value: T): boolean {
    if (this.isClosed) return false;

    // Receivers only wait on an empty buffer, so hand off directly
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(value);
      return true;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return true;
    }
    return false;
  }

  /**
   * Take the next value, suspending while empty.
   * Resolves undefined once the channel is closed and drained.
   */
  receive(): Promise<T | undefined> {
    if (this.buffer.length > 0 || this.senders.length > 0) {
      return Promise.resolve(this.tryReceive());
    }
    if (this.isClosed) {
      return Promise.resolve(undefined);
    }
    return new Promise<T | undefined>((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Take the next value if one is ready
   */
  tryReceive(): T | undefined {
    if (this.buffer.length > 0) {
      const value = this.buffer.shift();
      // A slot opened up - admit the oldest suspended sender
      const sender = this.senders.shift();
      if (sender) {
        this.buffer.push(sender.value);
        sender.resolve();
      }
      return value;
    }

    // Rendezvous with a suspended sender
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return sender.value;
    }
    return undefined;
  }

  /**
   * Close the channel. Idempotent.
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    const senders = this.senders;
    this.senders = [];
    for (const sender of senders) {
      sender.reject(new ChannelClosedError());
    }

    const receivers = this.receivers;
    this.receivers = [];
    for (const receiver of receivers) {
      receiver(undefined);
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const value = await this.receive();
      if (value === undefined) return;
      yield value;
    }
  }
}
