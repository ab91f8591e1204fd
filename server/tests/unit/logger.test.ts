import { describe, it, expect, afterEach, vi } from 'vitest';
import { logDebug, logInfo, logWarn, setLogLevel } from '../../src/logger.js';

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    setLogLevel('debug');
  });

  it('renders a trailing correlation context as key=value pairs', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    setLogLevel('debug');

    logWarn('[Session] Aborted', { sessionId: 'game_1', seat: 'playerTwo', code: undefined });

    expect(warn).toHaveBeenCalledWith('[Session] Aborted', 'sessionId=game_1 seat=playerTwo');
  });

  it('passes other arguments through', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel('debug');

    logInfo('[Server] Metrics', { sessions_started: 2 });

    expect(log).toHaveBeenCalledWith('[Server] Metrics', { sessions_started: 2 });
  });

  it('drops messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel('warn');

    logDebug('hidden');
    logInfo('hidden');

    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
  });
});
