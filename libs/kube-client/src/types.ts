import { z } from 'zod';
import type { HttpTransport, Logger, RetryPolicy } from '@kube-control/http-core';

/**
 * Resource shapes.
 *
 * Only the fields callers commonly read are spelled out; everything else is
 * passed through untouched, so objects survive a read-modify-write cycle.
 * Every field is optional: an empty object is a valid (zero) resource.
 */

// ============================================================================
// Shared metadata
// ============================================================================

export const objectMetaSchema = z
  .object({
    name: z.string().optional(),
    generateName: z.string().optional(),
    namespace: z.string().optional(),
    uid: z.string().optional(),
    resourceVersion: z.string().optional(),
    creationTimestamp: z.string().optional(),
    labels: z.record(z.string()).optional(),
    annotations: z.record(z.string()).optional(),
  })
  .passthrough();

export type ObjectMeta = z.infer<typeof objectMetaSchema>;

// ============================================================================
// Pods
// ============================================================================

export const podStatusSchema = z
  .object({
    phase: z.string().optional(),
    message: z.string().optional(),
    reason: z.string().optional(),
    podIP: z.string().optional(),
    startTime: z.string().optional(),
  })
  .passthrough();

export const podSchema = z
  .object({
    apiVersion: z.string().optional(),
    kind: z.string().optional(),
    metadata: objectMetaSchema.optional(),
    spec: z.record(z.unknown()).optional(),
    status: podStatusSchema.optional(),
  })
  .passthrough();

export type Pod = z.infer<typeof podSchema>;

export const podListSchema = z.object({ items: z.array(podSchema).nullish() }).passthrough();

// ============================================================================
// Jobs
// ============================================================================

export const jobSpecSchema = z
  .object({
    parallelism: z.number().optional(),
    completions: z.number().optional(),
    activeDeadlineSeconds: z.number().optional(),
    backoffLimit: z.number().optional(),
    template: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const jobStatusSchema = z
  .object({
    active: z.number().optional(),
    succeeded: z.number().optional(),
    failed: z.number().optional(),
    startTime: z.string().optional(),
    completionTime: z.string().optional(),
    conditions: z.array(z.record(z.unknown())).optional(),
  })
  .passthrough();

export const jobSchema = z
  .object({
    apiVersion: z.string().optional(),
    kind: z.string().optional(),
    metadata: objectMetaSchema.optional(),
    spec: jobSpecSchema.optional(),
    status: jobStatusSchema.optional(),
  })
  .passthrough();

export type Job = z.infer<typeof jobSchema>;

export const jobListSchema = z.object({ items: z.array(jobSchema).nullish() }).passthrough();

// ============================================================================
// Secrets
// ============================================================================

export const secretSchema = z
  .object({
    apiVersion: z.string().optional(),
    kind: z.string().optional(),
    metadata: objectMetaSchema.optional(),
    type: z.string().optional(),
    data: z.record(z.string()).optional(),
    stringData: z.record(z.string()).optional(),
  })
  .passthrough();

export type Secret = z.infer<typeof secretSchema>;

// ============================================================================
// Client Configuration
// ============================================================================

export interface KubeClientConfig {
  baseUrl: string;
  token: string;
  namespace: string;
  /** If set, every public call is logged with it before dispatch. */
  logger?: Logger;
  /** Return `{}` from every call without touching the network. */
  fake?: boolean;
  transport?: HttpTransport;
  retry?: RetryPolicy;
}

export interface InClusterOptions {
  tokenPath?: string;
  caPath?: string;
  baseUrl?: string;
  logger?: Logger;
  retry?: RetryPolicy;
}
