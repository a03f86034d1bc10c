import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

export interface OscTarget {
  host: string;
  port: number;
}

const port = z.coerce.number().int().min(0).max(65535);

const commaList = z
  .string()
  .default('')
  .transform((value) =>
    value
      .split(',')
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
  );

const oscTargets = commaList.pipe(
  z.array(
    z.string().transform((entry, ctx): OscTarget => {
      const separator = entry.lastIndexOf(':');
      const host = entry.slice(0, separator);
      const targetPort = Number(entry.slice(separator + 1));
      if (separator <= 0 || !Number.isInteger(targetPort) || targetPort < 1 || targetPort > 65535) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${entry}' is not a host:port pair` });
        return z.NEVER;
      }
      return { host, port: targetPort };
    })
  )
);

const envSchema = z.object({
  SERVICE_NAME: z.string().min(1).default('oscquery'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: port.default(5678),
  OSC_HOST: z.string().min(1).default('0.0.0.0'),
  OSC_PORT: port.default(5679),
  OSC_SEND_TARGETS: oscTargets,
  NAMESPACE_FILE: z.string().min(1).optional(),
  WS_HEARTBEAT_MS: z.coerce.number().int().positive().default(30_000),
  NOTIFY_QUEUE_LIMIT: z.coerce.number().int().positive().default(1024),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(600),
  ALLOWED_ORIGINS: z.string().default('*'),
  // Read by the logger at import; only validated here
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  LOG_DIR: z.string().min(1).optional(),
});

export interface ServerConfig {
  serviceName: string;
  http: { host: string; port: number };
  osc: { host: string; port: number; targets: OscTarget[] };
  namespaceFile?: string;
  websocket: { heartbeatMs: number };
  notifier: { queueLimit: number };
  rateLimit: { windowMs: number; max: number };
  allowedOrigins: string[] | '*';
}

/** Build the server configuration from environment variables. Throws a ConfigError listing every bad variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<ServerConfig> {
  // Empty strings in .env mean "unset"
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid environment configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  const origins = e.ALLOWED_ORIGINS.split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

  const config: ServerConfig = {
    serviceName: e.SERVICE_NAME,
    http: { host: e.HOST, port: e.PORT },
    osc: { host: e.OSC_HOST, port: e.OSC_PORT, targets: e.OSC_SEND_TARGETS },
    ...(e.NAMESPACE_FILE !== undefined ? { namespaceFile: e.NAMESPACE_FILE } : {}),
    websocket: { heartbeatMs: e.WS_HEARTBEAT_MS },
    notifier: { queueLimit: e.NOTIFY_QUEUE_LIMIT },
    rateLimit: { windowMs: 60_000, max: e.RATE_LIMIT_MAX },
    allowedOrigins: origins.length === 0 || origins.includes('*') ? '*' : origins,
  };
  return Object.freeze(config);
}
