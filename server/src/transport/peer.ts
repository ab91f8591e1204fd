/**
 * Peer connections
 *
 * A PeerConnection is the byte stream a session talks to. Transports feed
 * received bytes into BufferedPeer, which serves exact-length reads that can
 * be cancelled through an AbortSignal.
 */
import { EventEmitter } from 'events';
import { BufferLimitExceededError } from '@war/protocol';
import { PeerClosedError } from '../types/errors.js';
import { newId } from '../utils/ids.js';
import { logWarn } from '../logger.js';

export interface PeerConnection {
  /** Connection ID used for logging */
  readonly id: string;

  readonly remoteAddress: string;

  /** False once the connection has closed (locally or remotely) */
  readonly isOpen: boolean;

  /**
   * Resolve with exactly `length` bytes. Rejects with the signal's reason on
   * abort, or PeerClosedError if the stream ends first.
   */
  readExact(length: number, signal?: AbortSignal): Promise<Uint8Array>;

  /** Resolves once the bytes have been handed to the transport */
  write(bytes: Uint8Array): Promise<void>;

  close(): void;

  onClose(listener: () => void): void;
}

/**
 * Unread bytes a peer may hold before it is failed and closed. A well-behaved
 * client never has more than its opening WantGame and 26 PlayCards in flight.
 */
export const DEFAULT_MAX_BUFFERED_BYTES = 1024;

export interface BufferedPeerOptions {
  id?: string;
  maxBufferedBytes?: number;
}

interface PendingRead {
  length: number;
  resolve: (bytes: Uint8Array) => void;
  reject: (reason: unknown) => void;
  detach: () => void;
}

export abstract class BufferedPeer implements PeerConnection {
  readonly id: string;
  readonly remoteAddress: string;
  readonly maxBufferedBytes: number;

  private buffer: Buffer = Buffer.alloc(0);
  private pending: PendingRead | null = null;
  private ended = false;
  private closed = false;
  private failure: Error | null = null;
  private readonly events = new EventEmitter();

  protected constructor(remoteAddress: string, options: BufferedPeerOptions = {}) {
    this.id = options.id ?? newId('peer');
    this.remoteAddress = remoteAddress;
    this.maxBufferedBytes = options.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;
  }

  /** Bytes received but not yet read */
  get bufferedBytes(): number {
    return this.buffer.length;
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  readExact(length: number, signal?: AbortSignal): Promise<Uint8Array> {
    if (this.pending) {
      return Promise.reject(new Error(`Concurrent read on peer ${this.id}`));
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }
    if (this.buffer.length >= length) {
      return Promise.resolve(this.take(length));
    }
    const unreadable = this.unreadableReason();
    if (unreadable) {
      return Promise.reject(unreadable);
    }

    return new Promise<Uint8Array>((resolve, reject) => {
      const onAbort = (): void => {
        this.pending = null;
        reject(signal?.reason);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.pending = {
        length,
        resolve,
        reject,
        detach: () => signal?.removeEventListener('abort', onAbort),
      };
    });
  }

  async write(bytes: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new PeerClosedError(`Cannot write to closed peer ${this.id}`);
    }
    await this.send(bytes);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.terminate();
    this.handleClosed();
  }

  onClose(listener: () => void): void {
    if (this.closed) {
      listener();
      return;
    }
    this.events.once('close', listener);
  }

  /** Hand the transport the bytes to write */
  protected abstract send(bytes: Uint8Array): Promise<void>;

  /** Tear down the underlying transport */
  protected abstract terminate(): void;

  protected handleData(chunk: Uint8Array): void {
    if (this.closed) {
      return;
    }
    if (this.buffer.length + chunk.length > this.maxBufferedBytes) {
      logWarn(`[Peer] ${this.remoteAddress} sent more than ${this.maxBufferedBytes} unread bytes`, { peerId: this.id });
      this.buffer = Buffer.alloc(0);
      this.handleError(new BufferLimitExceededError(this.maxBufferedBytes));
      this.close();
      return;
    }
    this.buffer = Buffer.concat([this.buffer, chunk]);
    this.settle();
  }

  /** The remote side will send nothing more; writes may still succeed */
  protected handleEnd(): void {
    this.ended = true;
    this.settle();
  }

  protected handleError(err: Error): void {
    this.failure ??= err;
    this.settle();
  }

  protected handleClosed(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.settle();
    this.events.emit('close');
  }

  private unreadableReason(): Error | null {
    if (this.failure) return this.failure;
    if (this.closed) return new PeerClosedError(`Peer ${this.id} closed`);
    if (this.ended) return new PeerClosedError(`Peer ${this.id} ended the stream`);
    return null;
  }

  private settle(): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    if (this.buffer.length >= pending.length) {
      this.pending = null;
      pending.detach();
      pending.resolve(this.take(pending.length));
      return;
    }
    const unreadable = this.unreadableReason();
    if (unreadable) {
      this.pending = null;
      pending.detach();
      pending.reject(unreadable);
    }
  }

  private take(length: number): Uint8Array {
    const bytes = new Uint8Array(this.buffer.subarray(0, length));
    this.buffer = this.buffer.subarray(length);
    return bytes;
  }
}
