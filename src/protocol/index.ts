/**
 * Protocol layer exports for cgp-cli
 */

export {
  tokenize,
  positionAt,
  fromInt64,
  type Token,
  type TokenType,
  type Punctuation
} from './tokenizer.js';

export {
  parseResponse,
  parseValues,
  parseValue,
  getStatusCode
} from './parser.js';

export {
  findFirst,
  payloadOf,
  toText,
  toPlain,
  toRecord,
  toList,
  projectText,
  projectDictionary,
  projectTextDictionary,
  projectArray,
  projectInteger,
  type Projector
} from './projectors.js';

export { CliProtocol, isIoError, type SubmissionOptions } from './cli-protocol.js';
