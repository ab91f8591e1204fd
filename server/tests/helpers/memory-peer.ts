/**
 * In-process peer for session and lobby tests.
 *
 * Bytes "from the client" are pushed in by the test; everything the server
 * writes is recorded and can be decoded back into messages.
 */
import { decodeFrame, encodeMessage, type Message } from '@war/protocol';
import { BufferedPeer, type BufferedPeerOptions } from '../../src/transport/peer.js';

export class MemoryPeer extends BufferedPeer {
  readonly written: Uint8Array[] = [];
  terminated = false;

  /** Called synchronously for every server write */
  onWrite: ((bytes: Uint8Array) => void) | null = null;

  /** When set, writes reject with this error */
  writeFailure: Error | null = null;

  constructor(remoteAddress = '127.0.0.1', options: BufferedPeerOptions = {}) {
    super(remoteAddress, options);
  }

  pushBytes(bytes: ArrayLike<number>): void {
    this.handleData(Uint8Array.from(bytes));
  }

  pushMessage(message: Message): void {
    this.handleData(encodeMessage(message));
  }

  /** Client half-closed its side */
  endStream(): void {
    this.handleEnd();
  }

  fail(err: Error): void {
    this.handleError(err);
  }

  /** Client dropped the connection */
  disconnect(): void {
    this.handleClosed();
  }

  writtenMessages(): Message[] {
    return this.written.map((bytes) => decodeFrame(bytes));
  }

  protected send(bytes: Uint8Array): Promise<void> {
    if (this.writeFailure) {
      return Promise.reject(this.writeFailure);
    }
    this.written.push(bytes);
    this.onWrite?.(bytes);
    return Promise.resolve();
  }

  protected terminate(): void {
    this.terminated = true;
  }
}
