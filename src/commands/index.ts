/**
 * Command layer exports for cgp-cli
 */

export { CommandBuilder, buildApopDigest, domainOfAddress } from './builder.js';
