import { ConflictError } from "../errors.js";
import { readList, writeList, WriteLock } from "../persistence/jsonFile.js";
import type { EnvironmentFilter, EnvironmentRecord } from "./types.js";

export interface EnvironmentScanFilter extends EnvironmentFilter {
  includeDeleted?: boolean;
}

/**
 * Authoritative record store for environments. `put` is a conditional write:
 * it succeeds only when the stored version equals `expectedVersion` (0 for a
 * record that must not exist yet) and returns the record with its new version.
 */
export interface EnvironmentStore {
  get(id: string): Promise<EnvironmentRecord | null>;
  put(record: EnvironmentRecord, expectedVersion: number): Promise<EnvironmentRecord>;
  scan(filter?: EnvironmentScanFilter): Promise<EnvironmentRecord[]>;
}

export function matchesFilter(record: EnvironmentRecord, filter: EnvironmentScanFilter): boolean {
  if (!filter.includeDeleted && record.deletedAt) return false;
  if (filter.ownerId && record.ownerId !== filter.ownerId) return false;
  if (filter.status && record.status !== filter.status) return false;
  return true;
}

export class FileEnvironmentStore implements EnvironmentStore {
  private readonly lock = new WriteLock();

  constructor(private readonly filePath: string) {}

  private readAll(): Promise<EnvironmentRecord[]> {
    return readList<EnvironmentRecord>(this.filePath, "environments");
  }

  async get(id: string): Promise<EnvironmentRecord | null> {
    const records = await this.readAll();
    const found = records.find((row) => row.id === id);
    return found ? structuredClone(found) : null;
  }

  put(record: EnvironmentRecord, expectedVersion: number): Promise<EnvironmentRecord> {
    return this.lock.run(async () => {
      const records = await this.readAll();
      const idx = records.findIndex((row) => row.id === record.id);
      const storedVersion = idx >= 0 ? records[idx].version : 0;
      if (storedVersion !== expectedVersion) {
        throw new ConflictError(
          `Environment ${record.id} changed concurrently (expected version ${expectedVersion}, found ${storedVersion})`
        );
      }

      const next: EnvironmentRecord = { ...structuredClone(record), version: expectedVersion + 1 };
      if (idx >= 0) {
        records[idx] = next;
      } else {
        records.push(next);
      }
      await writeList(this.filePath, "environments", records);
      return structuredClone(next);
    });
  }

  async scan(filter: EnvironmentScanFilter = {}): Promise<EnvironmentRecord[]> {
    const records = await this.readAll();
    return records.filter((row) => matchesFilter(row, filter)).map((row) => structuredClone(row));
  }
}
