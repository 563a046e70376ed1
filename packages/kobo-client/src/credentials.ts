/**
 * Credential state for one device/user pair.
 */

import type { CredentialRecord, CredentialStore } from './types.js';

/**
 * Create an empty record, as held before the first device registration.
 */
export function emptyCredentials(email = ''): CredentialRecord {
  return {
    deviceId: '',
    userId: '',
    userKey: '',
    email,
    accessToken: '',
    refreshToken: '',
  };
}

/**
 * Mutable credential state shared by the authentication flows and every
 * authorized request.
 *
 * The record passed in is mutated in place, so a caller holding it (for
 * instance a settings file loader) sees the refreshed tokens.
 */
export class CredentialState {
  readonly record: CredentialRecord;
  private readonly store?: CredentialStore;

  constructor(record: CredentialRecord, store?: CredentialStore) {
    this.record = record;
    this.store = store;
  }

  /**
   * Whether both tokens are set.
   */
  isAuthenticated(): boolean {
    return this.record.accessToken.length > 0 && this.record.refreshToken.length > 0;
  }

  get authorizationHeader(): string {
    return `Bearer ${this.record.accessToken}`;
  }

  /**
   * Hand the current record to the store. Callers invoke this only after a
   * mutation succeeded.
   */
  async persist(): Promise<void> {
    if (this.store) {
      await this.store.save(this.record);
    }
  }
}
