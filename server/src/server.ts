/**
 * War server: TCP listener (and optional WebSocket listener) feeding the lobby
 */
import { createServer, type AddressInfo, type Server } from 'net';
import { WebSocketServer, type WebSocket } from 'ws';
import type { IncomingMessage } from 'http';
import type { ServerConfig } from './config/index.js';
import { cryptoRandom, SeededRandom, type RandomSource } from './game/random.js';
import { ConnectionLimiter, Lobby, normalizeIp, type SessionOutcome } from './session/index.js';
import { SocketPeer, WebSocketPeer, type PeerConnection } from './transport/index.js';
import { trackConnection } from './metrics/index.js';
import { logError, logInfo, logWarn } from './logger.js';

export interface ListeningAddresses {
  tcp: AddressInfo;
  ws?: AddressInfo;
}

export interface WarServerOptions {
  /** Overrides the source picked from config (crypto, or seeded when shuffleSeed is set) */
  rng?: RandomSource;
  onSessionEnd?: (outcome: SessionOutcome) => void;
}

export function formatAddress(address: AddressInfo): string {
  return address.family === 'IPv6' ? `[${address.address}]:${address.port}` : `${address.address}:${address.port}`;
}

function addressOf(server: { address(): AddressInfo | string | null }): AddressInfo {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error(`Listener has no network address (${String(address)})`);
  }
  return address;
}

export class WarServer {
  readonly lobby: Lobby;
  readonly limiter: ConnectionLimiter;

  private readonly config: ServerConfig;
  private tcpServer: Server | null = null;
  private wsServer: WebSocketServer | null = null;

  constructor(config: ServerConfig, options: WarServerOptions = {}) {
    this.config = config;
    const rng =
      options.rng ?? (config.shuffleSeed !== undefined ? new SeededRandom(config.shuffleSeed) : cryptoRandom);
    if (options.rng === undefined && config.shuffleSeed !== undefined) {
      logWarn(`[Server] Using seeded shuffles (seed ${config.shuffleSeed}); deals are reproducible`);
    }

    this.limiter = new ConnectionLimiter({
      maxConnectionsPerIp: config.maxConnectionsPerIp,
      // Every session holds two connections, plus one peer waiting in the lobby
      maxTotalConnections: config.maxActiveSessions * 2 + 1,
    });
    this.lobby = new Lobby({
      rng,
      readTimeoutMs: config.readTimeoutMs,
      maxActiveSessions: config.maxActiveSessions,
      onSessionEnd: options.onSessionEnd,
    });
  }

  /**
   * Apply connection limits and hand the peer to the lobby.
   * @returns false if the peer was turned away (and closed)
   */
  accept(peer: PeerConnection): boolean {
    const verdict = this.limiter.canConnect(peer.remoteAddress);
    if (!verdict.allowed) {
      logWarn(`[Server] Rejecting ${peer.remoteAddress}: ${verdict.reason}`, { peerId: peer.id, code: verdict.code });
      trackConnection(false);
      peer.close();
      return false;
    }

    this.limiter.register(peer.remoteAddress, peer.id);
    peer.onClose(() => this.limiter.unregister(peer.remoteAddress, peer.id));
    trackConnection(true);

    return this.lobby.admit(peer) !== 'rejected';
  }

  async start(): Promise<ListeningAddresses> {
    const tcpServer = createServer((socket) => {
      this.accept(new SocketPeer(socket, normalizeIp(socket.remoteAddress)));
    });
    tcpServer.on('error', (err) => logError('[Server] TCP listener error', err));
    await new Promise<void>((resolve, reject) => {
      tcpServer.once('error', reject);
      tcpServer.listen(this.config.port, this.config.host, () => {
        tcpServer.off('error', reject);
        resolve();
      });
    });
    this.tcpServer = tcpServer;

    const addresses: ListeningAddresses = { tcp: addressOf(tcpServer) };
    logInfo(`[Server] Listening on ${formatAddress(addresses.tcp)} (tcp)`);

    if (this.config.wsPort !== undefined) {
      addresses.ws = await this.startWebSocket(this.config.wsPort);
      logInfo(`[Server] Listening on ${formatAddress(addresses.ws)} (websocket)`);
    }

    return addresses;
  }

  /**
   * Stop accepting connections and wait for running games to end.
   */
  async stop(): Promise<void> {
    const closing: Promise<void>[] = [this.lobby.drain()];

    const tcpServer = this.tcpServer;
    if (tcpServer) {
      closing.push(
        new Promise<void>((resolve) => {
          tcpServer.close(() => resolve());
        })
      );
    }

    const wsServer = this.wsServer;
    if (wsServer) {
      closing.push(
        new Promise<void>((resolve) => {
          wsServer.close(() => resolve());
        })
      );
    }

    this.tcpServer = null;
    this.wsServer = null;
    await Promise.all(closing);
    logInfo('[Server] Stopped');
  }

  private async startWebSocket(port: number): Promise<AddressInfo> {
    const wsServer = new WebSocketServer({ port, host: this.config.host });
    wsServer.on('connection', (ws: WebSocket, req: IncomingMessage) => {
      this.accept(new WebSocketPeer(ws, normalizeIp(req.socket.remoteAddress)));
    });

    await new Promise<void>((resolve, reject) => {
      wsServer.once('error', reject);
      wsServer.once('listening', () => {
        wsServer.off('error', reject);
        resolve();
      });
    });
    wsServer.on('error', (err: Error) => logError('[Server] WebSocket listener error', err));
    this.wsServer = wsServer;

    return addressOf(wsServer);
  }
}
