/**
 * Inbound frame decoding.
 *
 * `decodeFrame` is a pure function over a byte view: it either returns one
 * frame and the number of bytes it consumed, or reports that more data is
 * needed (consuming nothing). Malformed input never throws; it becomes a
 * PARSE_ERROR frame so the session can report it and carry on.
 *
 * `ProtocolParser` wraps it with a reusable buffer so the session can push
 * socket chunks of any size and get back whole frames.
 */

import {
  DEFAULT_MAX_CONTROL_LINE,
  DEFAULT_MAX_PAYLOAD,
  ServerInfoSchema,
  type Frame,
} from './types.js';

const CR = 0x0d;
const LF = 0x0a;

const textDecoder = new TextDecoder();

export interface DecodeOptions {
  /** Largest MSG payload accepted, in bytes. */
  maxPayload?: number;
  /** Longest control line accepted, in bytes, excluding CRLF. */
  maxControlLine?: number;
}

export type DecodeResult =
  | { status: 'frame'; frame: Frame; consumed: number }
  | { status: 'need_more_data'; consumed: 0 };

const NEED_MORE_DATA: DecodeResult = { status: 'need_more_data', consumed: 0 };

const DIGITS = /^\d+$/;
const SIGNED_INTEGER = /^-?\d+$/;

function findCrlf(buf: Uint8Array): number {
  let idx = buf.indexOf(CR);
  while (idx !== -1 && idx + 1 < buf.length) {
    if (buf[idx + 1] === LF) return idx;
    idx = buf.indexOf(CR, idx + 1);
  }
  return -1;
}

function parseError(reason: string, line: string, consumed: number): DecodeResult {
  return {
    status: 'frame',
    frame: { kind: 'PARSE_ERROR', reason, line: line.slice(0, 120) },
    consumed,
  };
}

function frame(value: Frame, consumed: number): DecodeResult {
  return { status: 'frame', frame: value, consumed };
}

function stripQuotes(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length >= 2 && trimmed.startsWith("'") && trimmed.endsWith("'")) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

/**
 * Decode at most one frame from the start of `buf`.
 */
export function decodeFrame(buf: Uint8Array, options: DecodeOptions = {}): DecodeResult {
  const maxPayload = options.maxPayload ?? DEFAULT_MAX_PAYLOAD;
  const maxControlLine = options.maxControlLine ?? DEFAULT_MAX_CONTROL_LINE;

  const lineEnd = findCrlf(buf);
  if (lineEnd === -1) {
    if (buf.length > maxControlLine + 1) {
      const preview = textDecoder.decode(buf.subarray(0, 120));
      return parseError(`Control line exceeds ${maxControlLine} bytes`, preview, buf.length);
    }
    return NEED_MORE_DATA;
  }

  const lineConsumed = lineEnd + 2;
  const line = textDecoder.decode(buf.subarray(0, lineEnd));

  if (lineEnd > maxControlLine) {
    return parseError(`Control line exceeds ${maxControlLine} bytes`, line, lineConsumed);
  }

  const match = /^[ \t]*(\S+)[ \t]*(.*)$/.exec(line);
  if (!match) {
    return parseError('Empty control line', line, lineConsumed);
  }
  const op = match[1].toUpperCase();
  const rest = match[2];

  switch (op) {
    case 'PING':
      return frame({ kind: 'PING' }, lineConsumed);
    case 'PONG':
      return frame({ kind: 'PONG' }, lineConsumed);
    case '+OK':
      return frame({ kind: 'OK' }, lineConsumed);
    case '-ERR':
      return frame({ kind: 'ERR', message: stripQuotes(rest) }, lineConsumed);
    case 'INFO':
      return decodeInfo(rest, line, lineConsumed);
    case 'MSG':
      return decodeMsg(buf, rest, line, lineConsumed, maxPayload);
    default:
      return parseError(`Unknown protocol operation: ${match[1]}`, line, lineConsumed);
  }
}

function decodeInfo(json: string, line: string, consumed: number): DecodeResult {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    return parseError(`Invalid INFO payload: ${err instanceof Error ? err.message : String(err)}`, line, consumed);
  }
  const parsed = ServerInfoSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return parseError(`Invalid INFO field ${issue.path.join('.')}: ${issue.message}`, line, consumed);
  }
  return frame({ kind: 'INFO', info: parsed.data }, consumed);
}

function decodeMsg(
  buf: Uint8Array,
  args: string,
  line: string,
  lineConsumed: number,
  maxPayload: number,
): DecodeResult {
  const parts = args.split(/[ \t]+/).filter((p) => p.length > 0);
  if (parts.length !== 3 && parts.length !== 4) {
    return parseError(`MSG expects 3 or 4 arguments, got ${parts.length}`, line, lineConsumed);
  }

  const [subject, sidToken] = parts;
  const replyTo = parts.length === 4 ? parts[2] : undefined;
  const sizeToken = parts[parts.length - 1];

  if (!DIGITS.test(sidToken)) {
    return parseError(`Invalid subscription id: ${sidToken}`, line, lineConsumed);
  }
  if (!SIGNED_INTEGER.test(sizeToken)) {
    return parseError(`Invalid payload size: ${sizeToken}`, line, lineConsumed);
  }
  const size = Number(sizeToken);
  if (size < 0) {
    return parseError(`Negative payload size: ${size}`, line, lineConsumed);
  }

  // A well-formed size consumes its payload, rejected or not.
  const total = lineConsumed + size + 2;
  if (buf.length < total) {
    return NEED_MORE_DATA;
  }
  if (size > maxPayload) {
    return parseError(`Payload size ${size} exceeds maximum ${maxPayload}`, line, total);
  }
  if (buf[lineConsumed + size] !== CR || buf[lineConsumed + size + 1] !== LF) {
    return parseError('Payload not terminated by CRLF', line, total);
  }

  return frame(
    {
      kind: 'MSG',
      subject,
      sid: Number(sidToken),
      replyTo,
      // slice copies: the parser buffer is reused for later reads
      payload: buf.slice(lineConsumed, lineConsumed + size),
    },
    total,
  );
}

const INITIAL_CAPACITY = 64 * 1024;

/**
 * Buffered, resumable parser. Bytes that do not yet form a whole frame are
 * kept for the next `push`.
 */
export class ProtocolParser {
  private buffer: Uint8Array;
  private head = 0;
  private tail = 0;
  private options: Required<DecodeOptions>;

  constructor(options: DecodeOptions = {}) {
    this.options = {
      maxPayload: options.maxPayload ?? DEFAULT_MAX_PAYLOAD,
      maxControlLine: options.maxControlLine ?? DEFAULT_MAX_CONTROL_LINE,
    };
    this.buffer = new Uint8Array(INITIAL_CAPACITY);
  }

  /**
   * Get current unread bytes in buffer.
   */
  get pendingBytes(): number {
    return this.tail - this.head;
  }

  get maxPayload(): number {
    return this.options.maxPayload;
  }

  /** Applies to frames decoded from now on, including already buffered bytes. */
  setMaxPayload(maxPayload: number): void {
    this.options = { ...this.options, maxPayload };
  }

  /**
   * Push data into the parser and extract complete frames.
   */
  push(data: Uint8Array): Frame[] {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.tail);
    this.tail += data.length;
    return this.extractFrames();
  }

  private extractFrames(): Frame[] {
    const frames: Frame[] = [];

    while (this.pendingBytes > 0) {
      const result = decodeFrame(this.buffer.subarray(this.head, this.tail), this.options);
      if (result.status === 'need_more_data') break;
      this.head += result.consumed;
      frames.push(result.frame);
    }

    if (this.head === this.tail) {
      this.head = 0;
      this.tail = 0;
    } else if (this.head > this.buffer.length / 2) {
      this.compact();
    }

    return frames;
  }

  private ensureCapacity(incoming: number): void {
    if (this.tail + incoming <= this.buffer.length) return;
    this.compact();
    if (this.tail + incoming <= this.buffer.length) return;

    let capacity = this.buffer.length * 2;
    while (capacity < this.tail + incoming) capacity *= 2;
    const grown = new Uint8Array(capacity);
    grown.set(this.buffer.subarray(0, this.tail), 0);
    this.buffer = grown;
  }

  private compact(): void {
    if (this.head === 0) return;
    const pending = this.pendingBytes;
    if (pending > 0) {
      this.buffer.copyWithin(0, this.head, this.tail);
    }
    this.tail = pending;
    this.head = 0;
  }

  /**
   * Reset the parser state.
   */
  reset(): void {
    this.head = 0;
    this.tail = 0;
  }
}
