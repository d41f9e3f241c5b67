import { promises as fs } from "node:fs";
import path from "node:path";
import { PersistenceError } from "../errors.js";

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/** A file that was never written reads as an empty list; reading never creates it. */
export async function readList<T>(filePath: string, key: string): Promise<T[]> {
  try {
    const raw = await fs.readFile(filePath, "utf8");
    const parsed = JSON.parse(raw) as Record<string, T[] | undefined>;
    return parsed[key] ?? [];
  } catch (error) {
    if (isMissingFile(error)) return [];
    throw new PersistenceError(`Failed to read ${path.basename(filePath)}`, error);
  }
}

/** Writes through a sibling temp file so readers never see a half-written list. */
export async function writeList<T>(filePath: string, key: string, items: T[]): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tmpPath, JSON.stringify({ [key]: items }, null, 2), "utf8");
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    throw new PersistenceError(`Failed to write ${path.basename(filePath)}`, error);
  }
}

/**
 * Serialises read-modify-write sections against one file within this process.
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(section: () => Promise<T>): Promise<T> {
    const result = this.tail.then(section);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
