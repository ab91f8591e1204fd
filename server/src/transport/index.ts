export {
  BufferedPeer,
  DEFAULT_MAX_BUFFERED_BYTES,
  type BufferedPeerOptions,
  type PeerConnection,
} from './peer.js';
export { SocketPeer } from './socket.js';
export { WebSocketPeer } from './websocket.js';
export { readMessage, writeMessage } from './messages.js';
