import type { AppliedMigration, RecordAppliedParams } from '../types/migration';
import type { MigrationStateStore } from '../interfaces/migration-state-store';
import { MigrationStateConflictError } from '../types/errors';

/**
 * In-memory migration ledger. For testing and dry runs.
 */
export class MemoryMigrationStateStore implements MigrationStateStore {
  private records = new Map<number, AppliedMigration>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async listApplied(): Promise<AppliedMigration[]> {
    return [...this.records.values()]
      .sort((a, b) => a.version - b.version)
      .map(r => structuredClone(r));
  }

  async getLastApplied(): Promise<AppliedMigration | null> {
    const applied = await this.listApplied();
    return applied[applied.length - 1] ?? null;
  }

  async hasApplied(version: number): Promise<boolean> {
    return this.records.has(version);
  }

  async recordApplied(params: RecordAppliedParams): Promise<void> {
    const existing = this.records.get(params.version);
    if (existing) {
      if (existing.checksum !== params.checksum) {
        throw new MigrationStateConflictError(params.version, existing.checksum, params.checksum);
      }
      return;
    }

    this.records.set(params.version, {
      version: params.version,
      name: params.name,
      checksum: params.checksum,
      appliedAt: this.now(),
      success: params.success,
      ...(params.error !== undefined ? { error: params.error } : {}),
    });
  }

  // === Test helpers ===

  clear(): void {
    this.records.clear();
  }

  count(): number {
    return this.records.size;
  }
}
