import { readList, writeList, WriteLock } from "../persistence/jsonFile.js";
import type { Tenant } from "./types.js";

export interface TenantStore {
  list(): Promise<Tenant[]>;
  get(id: string): Promise<Tenant | null>;
  upsert(tenant: Tenant): Promise<Tenant>;
  remove(id: string): Promise<boolean>;
}

export class FileTenantStore implements TenantStore {
  private readonly lock = new WriteLock();

  constructor(private readonly filePath: string) {}

  list(): Promise<Tenant[]> {
    return readList<Tenant>(this.filePath, "tenants");
  }

  async get(id: string): Promise<Tenant | null> {
    const tenants = await this.list();
    return tenants.find((row) => row.id === id) ?? null;
  }

  upsert(tenant: Tenant): Promise<Tenant> {
    return this.lock.run(async () => {
      const tenants = await this.list();
      const next: Tenant = { ...tenant, updatedAt: new Date().toISOString() };
      const idx = tenants.findIndex((row) => row.id === tenant.id);
      if (idx >= 0) {
        tenants[idx] = next;
      } else {
        tenants.push(next);
      }
      await writeList(this.filePath, "tenants", tenants);
      return next;
    });
  }

  remove(id: string): Promise<boolean> {
    return this.lock.run(async () => {
      const tenants = await this.list();
      const remaining = tenants.filter((row) => row.id !== id);
      if (remaining.length === tenants.length) return false;
      await writeList(this.filePath, "tenants", remaining);
      return true;
    });
  }
}
