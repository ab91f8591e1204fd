/**
 * WebSocket transport.
 *
 * Each WebSocket message carries bytes of the same stream a TCP player would
 * send. Frame boundaries carry no meaning: one frame may hold part of a
 * message or several messages.
 */
import type { RawData, WebSocket } from 'ws';
import { BufferedPeer, type BufferedPeerOptions } from './peer.js';

const NORMAL_CLOSURE = 1000;

function toBytes(data: RawData): Uint8Array {
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  if (data instanceof ArrayBuffer) {
    return new Uint8Array(data);
  }
  return data;
}

export class WebSocketPeer extends BufferedPeer {
  private readonly ws: WebSocket;

  constructor(ws: WebSocket, remoteAddress = 'unknown', options: BufferedPeerOptions = {}) {
    super(remoteAddress, options);
    this.ws = ws;

    ws.on('message', (data: RawData) => this.handleData(toBytes(data)));
    ws.on('error', (err: Error) => this.handleError(err));
    ws.on('close', () => this.handleClosed());
  }

  protected send(bytes: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      this.ws.send(bytes, { binary: true }, (err?: Error) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  protected terminate(): void {
    this.ws.close(NORMAL_CLOSURE);
  }
}
