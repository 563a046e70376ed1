/**
 * Credential Stores
 *
 * Pluggable persistence for credential records.
 */

export type { CredentialStore, CredentialRecord } from '../types.js';
export { MemoryCredentialStore } from './memory.js';
