/**
 * TCP transport: one stream per player.
 */
import type { Duplex } from 'stream';
import { BufferedPeer, type BufferedPeerOptions } from './peer.js';

export class SocketPeer extends BufferedPeer {
  private readonly stream: Duplex;

  constructor(stream: Duplex, remoteAddress = 'unknown', options: BufferedPeerOptions = {}) {
    super(remoteAddress, options);
    this.stream = stream;

    stream.on('data', (chunk: Buffer) => this.handleData(chunk));
    stream.on('end', () => this.handleEnd());
    stream.on('error', (err: Error) => this.handleError(err));
    stream.on('close', () => this.handleClosed());
  }

  protected send(bytes: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.write(bytes, (err?: Error | null) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  protected terminate(): void {
    // Flush what was written, then release the socket
    this.stream.end(() => this.stream.destroy());
  }
}
