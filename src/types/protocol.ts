/**
 * Protocol types for cgp-cli
 */

import type { CliValue } from './value.js';

/**
 * Status codes the server places at the start of a response line
 */
export const ResponseCode = {
  OK: 200,
  OKDataProvided: 201,
  OKPleaseProvideData: 300,
  DomainAlreadyExists: 500,
  InsufficientAccessRights: 510,
  UnknownDomain: 512,
  UnknownUser: 513,
  AccountAlreadyExists: 520,
  GroupAlreadyExists: 523,
  ForwarderAlreadyExists: 524,
  MailboxAlreadyExists: 532,
  UnknownForwarder: 553,
  AccountInUse: 555
} as const;

export type ResponseCode = (typeof ResponseCode)[keyof typeof ResponseCode];

/**
 * Parsed response line
 */
export interface ParsedResponse {
  /** Leading status code, or -1 when the first object is not a plain decimal atom */
  statusCode: number;
  /** Top-level objects in line order, status code included */
  root: readonly CliValue[];
  /** Raw response line */
  raw: string;
}

/**
 * Diagnostic snapshot of the most recent request/response pair.
 * A session keeps exactly one and replaces it on every call.
 */
export interface SubmissionRecord {
  sentAt: Date;
  receivedAt?: Date;
  serverAddress: string;
  domainName?: string;
  commandType: string;
  /** Request line as written, without the trailing CRLF */
  request: string;
  /** Response line, or the error detail when the exchange failed */
  response?: string;
}

/**
 * Session lifecycle states
 */
export type SessionState =
  | 'disconnected'
  | 'connected'
  | 'authenticated'
  | 'ready'
  | 'closed'
  | 'faulted';

/**
 * Level a submission is reported at
 */
export type SubmissionLevel = 'info' | 'error';
