/**
 * Connection settings.
 *
 * Every field is optional; `resolveSettings` fills defaults and validates.
 * Non-serialisable options (TLS material, transport factory) sit beside the
 * schema rather than in it.
 */

import type { ConnectionOptions as TlsConnectionOptions } from 'node:tls';
import { z } from 'zod';
import { DEFAULT_MAX_PAYLOAD } from '@wisp/protocol';
import { UsageError } from '@wisp/utils';
import type { TransportFactory } from './transports/types.js';

export const DEFAULT_PORT = 4222;

export const ConnectionSettingsSchema = z
  .object({
    host: z.string().min(1).default('127.0.0.1'),
    port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
    /** `nats://`, `tls://`, `ws://` or `wss://` URL. Overrides host/port. */
    url: z.string().url().optional(),
    username: z.string().min(1).optional(),
    password: z.string().optional(),
    token: z.string().min(1).optional(),
    /** Require TLS even when the broker does not advertise it. */
    tls: z.boolean().default(false),
    /** Client name sent in CONNECT. */
    name: z.string().optional(),
    /** Whether the broker should deliver this connection's own publishes back to it. */
    echo: z.boolean().default(true),
    connectionTimeoutMs: z.number().int().positive().default(2000),
    authGracePeriodMs: z.number().int().nonnegative().default(250),
    /** 0 disables keepalive pings. */
    pingIntervalMs: z.number().int().nonnegative().default(60_000),
    pingTimeoutMs: z.number().int().positive().default(5000),
    requestTimeoutMs: z.number().int().positive().default(1000),
    /** Used until the broker's INFO advertises its own limit. */
    maxPayload: z.number().int().positive().default(DEFAULT_MAX_PAYLOAD),
    reconnect: z.boolean().default(true),
    maxReconnectAttempts: z.number().int().nonnegative().default(10),
    reconnectDelayMs: z.number().int().nonnegative().default(100),
    reconnectMaxDelayMs: z.number().int().nonnegative().default(5000),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  })
  .refine((s) => s.password === undefined || s.username !== undefined, {
    message: 'password requires username',
    path: ['password'],
  })
  .refine((s) => s.token === undefined || s.username === undefined, {
    message: 'token and username are mutually exclusive',
    path: ['token'],
  });

interface ExtraSettings {
  /** Certificates, CA and verification options for the TLS upgrade. */
  tlsOptions?: TlsConnectionOptions;
  /** Override how transports are built (tests, custom sockets). */
  transportFactory?: TransportFactory;
}

export type ConnectionSettings = z.input<typeof ConnectionSettingsSchema> & ExtraSettings;
export type ResolvedSettings = z.output<typeof ConnectionSettingsSchema> & ExtraSettings;

function applyUrl(settings: ResolvedSettings): ResolvedSettings {
  if (!settings.url) return settings;
  const url = new URL(settings.url);
  switch (url.protocol) {
    case 'ws:':
    case 'wss:':
      return settings;
    case 'nats:':
    case 'tls:':
      return {
        ...settings,
        host: url.hostname || settings.host,
        port: url.port ? Number(url.port) : DEFAULT_PORT,
        tls: settings.tls || url.protocol === 'tls:',
        username: settings.username ?? (url.username ? decodeURIComponent(url.username) : undefined),
        password: settings.password ?? (url.password ? decodeURIComponent(url.password) : undefined),
      };
    default:
      throw new UsageError(`Invalid setting url: unsupported scheme ${url.protocol}`);
  }
}

/**
 * Validate settings and fill defaults.
 * @throws UsageError naming the first offending field
 */
export function resolveSettings(input: ConnectionSettings = {}): ResolvedSettings {
  const { tlsOptions, transportFactory, ...plain } = input;
  const parsed = ConnectionSettingsSchema.safeParse(plain);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new UsageError(`Invalid setting ${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  return applyUrl({ ...parsed.data, tlsOptions, transportFactory });
}

function parseBoolean(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Read settings from environment variables:
 * WISP_URL, WISP_HOST, WISP_PORT, WISP_USER, WISP_PASSWORD, WISP_TOKEN, WISP_TLS.
 * Unset variables are left out so defaults (or explicit settings) apply.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): ConnectionSettings {
  const settings: ConnectionSettings = {};
  if (env.WISP_URL) settings.url = env.WISP_URL;
  if (env.WISP_HOST) settings.host = env.WISP_HOST;
  if (env.WISP_PORT) {
    const port = Number(env.WISP_PORT);
    if (!Number.isInteger(port)) {
      throw new UsageError(`Invalid setting WISP_PORT: ${env.WISP_PORT}`);
    }
    settings.port = port;
  }
  if (env.WISP_USER) settings.username = env.WISP_USER;
  if (env.WISP_PASSWORD) settings.password = env.WISP_PASSWORD;
  if (env.WISP_TOKEN) settings.token = env.WISP_TOKEN;
  if (env.WISP_TLS) settings.tls = parseBoolean(env.WISP_TLS);
  return settings;
}
