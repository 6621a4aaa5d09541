/**
 * Wire protocol types.
 *
 * Outbound commands (client -> broker):
 *   CONNECT {json}
 *   PUB <subject> [reply-to] <#bytes>\r\n<payload>\r\n
 *   SUB <subject> [queue-group] <sid>
 *   UNSUB <sid> [max-messages]
 *   PING / PONG
 *
 * Inbound frames (broker -> client):
 *   INFO {json}
 *   MSG <subject> <sid> [reply-to] <#bytes>\r\n<payload>\r\n
 *   PING / PONG / +OK / -ERR <description>
 */

import { z } from 'zod';

export const PROTOCOL_VERSION = 1;

export const DEFAULT_MAX_PAYLOAD = 1024 * 1024; // 1 MiB
export const DEFAULT_MAX_CONTROL_LINE = 4096;

export const ServerInfoSchema = z
  .object({
    server_id: z.string().optional(),
    server_name: z.string().optional(),
    version: z.string().optional(),
    proto: z.number().int().optional(),
    host: z.string().optional(),
    port: z.number().int().optional(),
    max_payload: z.number().int().positive().default(DEFAULT_MAX_PAYLOAD),
    auth_required: z.boolean().default(false),
    tls_required: z.boolean().default(false),
    tls_available: z.boolean().optional(),
    headers: z.boolean().optional(),
    client_id: z.number().int().optional(),
    nonce: z.string().optional(),
    connect_urls: z.array(z.string()).optional(),
  })
  .passthrough();

export type ServerInfo = z.infer<typeof ServerInfoSchema>;

/** Options object carried by the CONNECT command. */
export interface ConnectOptions {
  verbose: boolean;
  pedantic: boolean;
  tls_required: boolean;
  lang: string;
  version: string;
  protocol: number;
  name?: string;
  echo?: boolean;
  user?: string;
  pass?: string;
  auth_token?: string;
}

export type Payload = string | Uint8Array;

export type Command =
  | { op: 'CONNECT'; options: ConnectOptions }
  | { op: 'PUB'; subject: string; replyTo?: string; payload: Payload }
  | { op: 'SUB'; subject: string; queueGroup?: string; sid: number }
  | { op: 'UNSUB'; sid: number; maxMessages?: number }
  | { op: 'PING' }
  | { op: 'PONG' };

export interface MsgFrame {
  kind: 'MSG';
  subject: string;
  sid: number;
  replyTo?: string;
  payload: Uint8Array;
}

export type Frame =
  | { kind: 'INFO'; info: ServerInfo }
  | MsgFrame
  | { kind: 'PING' }
  | { kind: 'PONG' }
  | { kind: 'OK' }
  | { kind: 'ERR'; message: string }
  | { kind: 'PARSE_ERROR'; reason: string; line: string };
