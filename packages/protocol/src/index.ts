export {
  PROTOCOL_VERSION,
  DEFAULT_MAX_PAYLOAD,
  DEFAULT_MAX_CONTROL_LINE,
  ServerInfoSchema,
  type ServerInfo,
  type ConnectOptions,
  type Payload,
  type Command,
  type Frame,
  type MsgFrame,
} from './types.js';

export { encodeCommand, payloadBytes, CRLF } from './encoder.js';

export {
  decodeFrame,
  ProtocolParser,
  type DecodeOptions,
  type DecodeResult,
} from './parser.js';
