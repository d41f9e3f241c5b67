import { promises as fs } from "node:fs";
import path from "node:path";
import { PersistenceError, ValidationError } from "../errors.js";

const REF_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*\.kubeconfig$/;

/**
 * Holds cluster-access credentials outside the environment record. Records
 * keep only the opaque reference `save` returns.
 */
export interface CredentialStore {
  save(environmentId: string, kubeconfig: string): Promise<string>;
  load(ref: string): Promise<string | null>;
  remove(ref: string): Promise<void>;
}

export class ClusterCredentialStore implements CredentialStore {
  constructor(private readonly dir: string) {}

  private resolve(ref: string): string {
    if (!REF_PATTERN.test(ref)) {
      throw new ValidationError(`Invalid credential reference: ${ref}`);
    }
    return path.join(this.dir, ref);
  }

  async save(environmentId: string, kubeconfig: string): Promise<string> {
    const ref = `${environmentId}.kubeconfig`;
    const filePath = this.resolve(ref);
    const tmpPath = `${filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(this.dir, { recursive: true, mode: 0o700 });
      await fs.writeFile(tmpPath, kubeconfig, { encoding: "utf8", mode: 0o600 });
      await fs.rename(tmpPath, filePath);
    } catch (error) {
      throw new PersistenceError(`Failed to store credential ${ref}`, error);
    }
    return ref;
  }

  async load(ref: string): Promise<string | null> {
    const filePath = this.resolve(ref);
    try {
      return await fs.readFile(filePath, "utf8");
    } catch (error) {
      if (typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT") return null;
      throw new PersistenceError(`Failed to read credential ${ref}`, error);
    }
  }

  async remove(ref: string): Promise<void> {
    const filePath = this.resolve(ref);
    try {
      await fs.rm(filePath, { force: true });
    } catch (error) {
      throw new PersistenceError(`Failed to remove credential ${ref}`, error);
    }
  }
}
