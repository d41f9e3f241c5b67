import { nanoid } from "nanoid";
import { ConflictError } from "../errors.js";

/**
 * Per-environment exclusion token. A lease is taken before a workflow is
 * launched and released when that workflow settles.
 */
export class LeaseRegistry {
  private readonly held = new Map<string, string>();

  acquire(id: string): string {
    if (this.held.has(id)) {
      throw new ConflictError(`A lifecycle workflow is already in flight for environment ${id}`);
    }
    const token = nanoid(12);
    this.held.set(id, token);
    return token;
  }

  /** Releasing with a stale token is a no-op. */
  release(id: string, token: string): void {
    if (this.held.get(id) === token) {
      this.held.delete(id);
    }
  }
}
