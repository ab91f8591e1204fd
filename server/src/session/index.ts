export {
  GameSession,
  DEFAULT_READ_TIMEOUT_MS,
  type GameSessionOptions,
  type SessionOutcome,
  type SessionState,
  type SessionStatus,
} from './game-session.js';
export { Lobby, type LobbyOptions, type AdmitResult } from './lobby.js';
export { ConnectionLimiter, normalizeIp, type ConnectionLimiterConfig, type LimitCheckResult } from './limiter.js';
