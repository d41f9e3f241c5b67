import { z } from "zod";
import { ValidationError } from "../errors.js";
import type { EnvironmentPatch, EnvironmentRecord, EnvironmentRequest } from "./types.js";

const DNS_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const QUANTITY = /^[0-9]+(\.[0-9]+)?(m|k|M|G|T|P|E|Ki|Mi|Gi|Ti|Pi|Ei)?$/;

export function isIPv4Cidr(value: string): boolean {
  const match = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/.exec(value);
  if (!match) return false;
  const octets = match.slice(1, 5).map(Number);
  const prefix = Number(match[5]);
  return octets.every((octet) => octet <= 255) && prefix <= 32;
}

const quantity = z.string().regex(QUANTITY, "must be a Kubernetes quantity such as 2, 500m or 4Gi");
const cidr = z.string().refine(isIPv4Cidr, "must be an IPv4 CIDR such as 10.0.0.0/16");
const dnsLabel = z.string().min(1).max(63).regex(DNS_LABEL, "must be a lowercase DNS label");

export const resourceLimitsSchema = z.object({
  cpu: quantity,
  memory: quantity,
  storage: quantity,
  maxNodeCount: z.number().int().min(1).max(10),
  maxNamespaces: z.number().int().min(1).max(20),
  maxLoadBalancers: z.number().int().min(0).max(5)
});

export const networkPolicySchema = z.object({
  allowIngressFromCIDR: z.array(cidr).default([]),
  allowEgressToCIDR: z.array(cidr).default([]),
  defaultDenyIngress: z.boolean().default(false),
  defaultDenyEgress: z.boolean().default(false),
  allowIntraNamespace: z.boolean().default(false),
  allowCrossNamespace: z.boolean().default(false),
  allowExternalServices: z.array(z.string().min(1)).default([])
});

export const serviceMeshSchema = z.object({
  enabled: z.boolean(),
  mtlsMode: z.enum(["STRICT", "PERMISSIVE", "DISABLE"]).optional(),
  enableTracing: z.boolean().default(false),
  enableMetrics: z.boolean().default(false),
  enableCircuitBreaker: z.boolean().default(false),
  enableOutlierDetection: z.boolean().default(false),
  enableFaultInjection: z.boolean().default(false),
  enableRequestThrottling: z.boolean().default(false),
  enableVirtualServiceRBAC: z.boolean().default(false)
});

export const monitoringSchema = z.object({
  enablePrometheus: z.boolean().default(false),
  enableGrafana: z.boolean().default(false),
  enableAlertManager: z.boolean().default(false),
  scrapeInterval: z.enum(["15s", "30s", "1m", "5m"]).optional(),
  retentionPeriod: z.enum(["1d", "7d", "14d", "30d"]).optional(),
  defaultAlertThreshold: z.string().optional()
});

export const gitOpsSchema = z.object({
  enabled: z.boolean(),
  gitRepository: z.string().url().optional(),
  gitBranch: z.string().min(1).optional(),
  syncInterval: z.enum(["1m", "5m", "10m", "15m", "30m", "1h"]).optional(),
  automatedSync: z.boolean().default(false),
  syncTimeout: z.enum(["1m", "5m", "10m"]).optional(),
  gitCredentialId: z.string().min(1).optional()
});

const requestSchema = z.object({
  name: z.string().min(3).max(63).regex(DNS_LABEL, "must be a lowercase DNS label"),
  description: z.string().max(255).default(""),
  templateId: z.string().min(1, "is required"),
  ownerId: z.string().min(1, "is required"),
  resourceLimits: resourceLimitsSchema,
  networkPolicy: networkPolicySchema.optional(),
  serviceMesh: serviceMeshSchema.optional(),
  monitoring: monitoringSchema.optional(),
  gitOps: gitOpsSchema.optional(),
  namespaces: z.array(dnsLabel).optional(),
  addons: z.array(z.string().min(1)).default([]),
  tags: z.record(z.string()).default({})
});

const patchSchema = z
  .object({
    description: z.string().max(255),
    resourceLimits: resourceLimitsSchema,
    networkPolicy: networkPolicySchema,
    serviceMesh: serviceMeshSchema,
    monitoring: monitoringSchema,
    gitOps: gitOpsSchema,
    namespaces: z.array(dnsLabel),
    addons: z.array(z.string().min(1)),
    tags: z.record(z.string())
  })
  .partial()
  .strict();

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.join(".");
    return where ? `${where}: ${issue.message}` : issue.message;
  });
}

function namespaceIssues(namespaces: string[] | undefined, maxNamespaces: number): string[] {
  if (!namespaces) return [];
  const issues: string[] = [];
  if (namespaces.length > maxNamespaces) {
    issues.push(`namespaces: at most ${maxNamespaces} namespaces allowed, got ${namespaces.length}`);
  }
  if (new Set(namespaces).size !== namespaces.length) {
    issues.push("namespaces: entries must be unique");
  }
  return issues;
}

/** Rejects malformed or out-of-range input before anything is persisted. */
export interface EnvironmentValidator {
  validateRequest(input: unknown): EnvironmentRequest;
  validatePatch(input: unknown, current: EnvironmentRecord): EnvironmentPatch;
}

export class SchemaEnvironmentValidator implements EnvironmentValidator {
  validateRequest(input: unknown): EnvironmentRequest {
    const parsed = requestSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError("Invalid environment request", formatIssues(parsed.error));
    }
    const issues = namespaceIssues(parsed.data.namespaces, parsed.data.resourceLimits.maxNamespaces);
    if (issues.length > 0) {
      throw new ValidationError("Invalid environment request", issues);
    }
    return parsed.data;
  }

  validatePatch(input: unknown, current: EnvironmentRecord): EnvironmentPatch {
    const parsed = patchSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError("Invalid environment patch", formatIssues(parsed.error));
    }
    const patch = parsed.data;
    const limits = patch.resourceLimits ?? current.resourceLimits;
    const issues = namespaceIssues(patch.namespaces ?? current.namespaces, limits.maxNamespaces);
    if (issues.length > 0) {
      throw new ValidationError("Invalid environment patch", issues);
    }
    return patch;
  }
}
