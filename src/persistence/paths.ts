import path from "node:path";

export function resolveDataRoot(env: NodeJS.ProcessEnv = process.env): string {
  return env.ENVPLANE_DATA_ROOT ? path.resolve(env.ENVPLANE_DATA_ROOT) : path.join(process.cwd(), "data");
}

export function environmentsFile(dataRoot: string): string {
  return path.join(dataRoot, "environments.json");
}

export function tenantsFile(dataRoot: string): string {
  return path.join(dataRoot, "tenants.json");
}

export function credentialsDir(dataRoot: string): string {
  return path.join(dataRoot, "credentials");
}
