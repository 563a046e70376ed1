/**
 * Memory Credential Store
 *
 * In-memory credential persistence for testing and ephemeral sessions.
 * Records are lost when the process ends.
 */

import type { CredentialRecord, CredentialStore } from '../types.js';

/**
 * In-memory credential store keyed by email.
 *
 * @example
 * ```ts
 * const store = new MemoryCredentialStore();
 * const client = new KoboClient(credentials, { store });
 * ```
 */
export class MemoryCredentialStore implements CredentialStore {
  private records = new Map<string, CredentialRecord>();
  private saves = 0;

  async save(record: CredentialRecord): Promise<void> {
    // Copy to prevent external mutation
    this.records.set(record.email, { ...record });
    this.saves++;
  }

  /**
   * Get a copy of the record stored for an email.
   */
  load(email: string): CredentialRecord | undefined {
    const record = this.records.get(email);
    return record ? { ...record } : undefined;
  }

  /**
   * Number of save calls (for testing).
   */
  get saveCount(): number {
    return this.saves;
  }
}
