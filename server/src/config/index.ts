/**
 * Server configuration
 *
 * Read from WAR_* environment variables, with optional positional
 * `<host> <port>` arguments taking precedence.
 */
import { isIP } from 'net';
import { z } from 'zod';

const portSchema = z.coerce.number().int().min(0).max(65535);

const hostSchema = z
  .string()
  .refine((value) => value === 'localhost' || isIP(value) !== 0, {
    message: 'Must be an IPv4/IPv6 address or "localhost"',
  });

export const configSchema = z.object({
  host: hostSchema.default('0.0.0.0'),
  /** 0 asks the OS to pick a port */
  port: portSchema.default(9020),
  /** WebSocket listener port; the listener is off when unset */
  wsPort: portSchema.optional(),
  readTimeoutMs: z.coerce.number().int().positive().default(30_000),
  maxConnectionsPerIp: z.coerce.number().int().positive().default(8),
  maxActiveSessions: z.coerce.number().int().positive().default(500),
  /** Reproducible shuffles; refused in production */
  shuffleSeed: z.coerce.number().int().optional(),
  production: z.boolean().default(false),
});

export type ServerConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const ENV_FIELDS = [
  'host',
  'port',
  'wsPort',
  'readTimeoutMs',
  'maxConnectionsPerIp',
  'maxActiveSessions',
  'shuffleSeed',
] as const;

type EnvField = typeof ENV_FIELDS[number];

const ENV_KEYS = {
  host: 'WAR_HOST',
  port: 'WAR_PORT',
  wsPort: 'WAR_WS_PORT',
  readTimeoutMs: 'WAR_READ_TIMEOUT_MS',
  maxConnectionsPerIp: 'WAR_MAX_CONNECTIONS_PER_IP',
  maxActiveSessions: 'WAR_MAX_SESSIONS',
  shuffleSeed: 'WAR_SHUFFLE_SEED',
} as const satisfies Record<EnvField, string>;

/**
 * Build the server configuration.
 *
 * @throws ConfigError listing every invalid value
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: readonly string[] = process.argv.slice(2)
): ServerConfig {
  if (argv.length > 2) {
    throw new ConfigError([`Unexpected arguments: ${argv.slice(2).join(' ')} (usage: war-server [host] [port])`]);
  }

  const raw: Partial<Record<EnvField, string>> = {};
  for (const field of ENV_FIELDS) {
    const value = env[ENV_KEYS[field]]?.trim();
    // Empty variables count as unset
    if (value) {
      raw[field] = value;
    }
  }

  const [hostArg, portArg] = argv;
  if (hostArg) raw.host = hostArg;
  if (portArg) raw.port = portArg;

  const result = configSchema.safeParse({ ...raw, production: env.NODE_ENV === 'production' });
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => {
        const field = ENV_FIELDS.find((name) => name === issue.path[0]);
        const source = field ? ENV_KEYS[field] : issue.path.join('.');
        return `${source}: ${issue.message}`;
      })
    );
  }
  return result.data;
}

export interface ConfigValidationError {
  key: string;
  value: string;
  reason: string;
}

/**
 * Settings that parse fine but must not reach a production deployment.
 */
export function validateProductionConfig(config: ServerConfig): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];

  if (!config.production) {
    return errors;
  }

  if (config.shuffleSeed !== undefined) {
    errors.push({
      key: ENV_KEYS.shuffleSeed,
      value: '[REDACTED]',
      reason: 'A fixed shuffle seed makes every deal predictable. Unset it in production.',
    });
  }

  if (config.wsPort !== undefined && config.wsPort !== 0 && config.wsPort === config.port) {
    errors.push({
      key: ENV_KEYS.wsPort,
      value: String(config.wsPort),
      reason: `WebSocket port must differ from the TCP port (${config.port}).`,
    });
  }

  return errors;
}

/**
 * @throws Error with every production validation failure
 */
export function validateProductionConfigOrThrow(config: ServerConfig): void {
  const errors = validateProductionConfig(config);

  if (errors.length > 0) {
    const errorMessages = errors
      .map((err, idx) => `${idx + 1}. ${err.key}: ${err.reason}\n   Value: ${err.value}`)
      .join('\n\n');

    throw new Error(
      `Configuration validation failed (${errors.length} error${errors.length === 1 ? '' : 's'}):\n\n${errorMessages}`,
    );
  }
}
