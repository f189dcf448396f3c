/**
 * CLI Command Builder
 *
 * Builds CLI/PWD request lines. Arguments are encoded with the string codec;
 * the caller sends the line as-is.
 *
 * @packageDocumentation
 */

import { createHash } from 'crypto';
import { encodeObject, encodeString, type EncodableValue } from '../encoding/cli-string.js';

/**
 * Computes the APOP digest: lowercase hex MD5 of the greeting's session id
 * followed by the cleartext password
 *
 * @param sessionId - Token from the server greeting, e.g. `<50.1733950486@mail.example.com>`
 * @param password - Cleartext password
 */
export function buildApopDigest(sessionId: string, password: string): string {
  return createHash('md5').update(sessionId + password, 'utf8').digest('hex');
}

/**
 * Domain part of an email address, lower-cased, or undefined without '@'
 */
export function domainOfAddress(address: string): string | undefined {
  const at = address.lastIndexOf('@');
  return at === -1 ? undefined : address.slice(at + 1).toLowerCase();
}

/**
 * CommandBuilder provides static methods to construct CLI commands
 */
export class CommandBuilder {
  /**
   * Builds a USER command (plaintext login, first step)
   */
  static user(user: string): string {
    return `USER ${encodeString(user)}`;
  }

  /**
   * Builds a PASS command (plaintext login, second step)
   */
  static pass(password: string): string {
    return `PASS ${encodeString(password)}`;
  }

  /**
   * Builds an APOP command from a precomputed digest
   */
  static apop(user: string, digest: string): string {
    return `APOP ${encodeString(user)} ${encodeString(digest)}`;
  }

  /**
   * Switches the session to inline responses
   */
  static inline(): string {
    return 'INLINE';
  }

  static quit(): string {
    return 'QUIT';
  }

  /**
   * Builds a ListAccounts command
   *
   * @param domain - Domain whose accounts are listed
   */
  static listAccounts(domain: string): string {
    return `ListAccounts ${encodeString(domain)}`;
  }

  static getAccountEffectiveSettings(address: string): string {
    return `GetAccountEffectiveSettings ${encodeString(address)}`;
  }

  static getDomainEffectiveSettings(domain: string): string {
    return `GetDomainEffectiveSettings ${encodeString(domain)}`;
  }

  static getDomainSettings(domain: string): string {
    return `GetDomainSettings ${encodeString(domain)}`;
  }

  /**
   * Builds a RenameDomain command
   *
   * @param domain - Current domain name
   * @param newName - New domain name
   */
  static renameDomain(domain: string, newName: string): string {
    return `RenameDomain ${encodeString(domain)} into ${encodeString(newName)}`;
  }

  /**
   * Builds an UpdateDomainSettings command
   *
   * @param domain - Domain to update
   * @param settings - Settings to change; values may be nested
   */
  static updateDomainSettings(domain: string, settings: Record<string, EncodableValue>): string {
    return `UpdateDomainSettings ${encodeString(domain)} ${encodeObject(settings)}`;
  }

  static getAccountRules(address: string): string {
    return `GetAccountRules ${encodeString(address)}`;
  }

  /**
   * Builds a GetAccountInfo command for a single key
   *
   * @param address - Account address
   * @param key - Info key, e.g. 'StorageUsed'
   */
  static getAccountInfo(address: string, key: string): string {
    return `GetAccountInfo ${encodeString(address)} Key ${encodeString(key)}`;
  }
}
