/**
 * Outbound command encoding.
 */

import type { Command, Payload } from './types.js';

export const CRLF = '\r\n';

const textEncoder = new TextEncoder();

const PING_BYTES = textEncoder.encode(`PING${CRLF}`);
const PONG_BYTES = textEncoder.encode(`PONG${CRLF}`);

export function payloadBytes(payload: Payload): Uint8Array {
  return typeof payload === 'string' ? textEncoder.encode(payload) : payload;
}

function concat(head: Uint8Array, body: Uint8Array, tail: Uint8Array): Uint8Array {
  const out = new Uint8Array(head.length + body.length + tail.length);
  out.set(head, 0);
  out.set(body, head.length);
  out.set(tail, head.length + body.length);
  return out;
}

const CRLF_BYTES = textEncoder.encode(CRLF);

/**
 * Encode a command into its wire form, including the trailing CRLF.
 */
export function encodeCommand(command: Command): Uint8Array {
  switch (command.op) {
    case 'PING':
      return PING_BYTES;
    case 'PONG':
      return PONG_BYTES;
    case 'CONNECT':
      return textEncoder.encode(`CONNECT ${JSON.stringify(command.options)}${CRLF}`);
    case 'SUB': {
      const queue = command.queueGroup ? ` ${command.queueGroup}` : '';
      return textEncoder.encode(`SUB ${command.subject}${queue} ${command.sid}${CRLF}`);
    }
    case 'UNSUB': {
      const max = command.maxMessages !== undefined ? ` ${command.maxMessages}` : '';
      return textEncoder.encode(`UNSUB ${command.sid}${max}${CRLF}`);
    }
    case 'PUB': {
      const body = payloadBytes(command.payload);
      const reply = command.replyTo ? ` ${command.replyTo}` : '';
      const head = textEncoder.encode(`PUB ${command.subject}${reply} ${body.length}${CRLF}`);
      return concat(head, body, CRLF_BYTES);
    }
  }
}
