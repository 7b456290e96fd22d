/**
 * Shared Types
 *
 * Core type definitions used across the registry, resolver, policy and
 * binding modules.
 */

// =============================================================================
// Asset Types
// =============================================================================

/** Asset types registered out of the box. */
export type BuiltinAssetType =
  | "cloudresourcemanager.googleapis.com/Project"
  | "storage.googleapis.com/Bucket"
  | "bigquery.googleapis.com/Dataset"
  | "bigquery.googleapis.com/Table";

/**
 * Describes how to manage IAM on one class of cloud resource.
 *
 * `resourceType` selects how the REST resource path is built; see
 * `buildPolicyTarget` for the surfaces it understands.
 */
export type AssetTypeDescriptor = Readonly<{
  assetType: BuiltinAssetType | string;
  serviceName: string;
  apiVersion: string;
  method: string;
  resourceType: string;
  assetNamePattern: string;
}>;

// =============================================================================
// Binding Requests
// =============================================================================

/** One row of work, built from one CSV record. */
export type BindingRequest = Readonly<{
  userEmail: string;
  projectId: string;
  assetName: string;
  assetType: string;
  role: string;
  /** 1-based line in the source CSV (header is line 1). */
  line?: number;
}>;

// =============================================================================
// Common Configuration
// =============================================================================

export type GcpRetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};
