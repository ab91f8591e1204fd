import { randomBytes } from 'node:crypto';

/**
 * Unguessable identifier for log correlation, e.g. `game_m2k9x1qa_3f9c0a7e`.
 */
export function newId(prefix: string, bytes = 4): string {
  return `${prefix}_${Date.now().toString(36)}_${randomBytes(bytes).toString('hex')}`;
}
