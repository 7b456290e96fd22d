/**
 * Asset type config schema (TypeBox) and descriptor validation.
 *
 * The on-disk format uses snake_case keys:
 *
 * ```yaml
 * asset_types:
 *   - asset_type: pubsub.googleapis.com/Topic
 *     service_name: pubsub
 *     version: v1
 *     method: setIamPolicy
 *     resource_type: topic
 *     asset_name_pattern: //pubsub\.googleapis\.com/projects/([^/]+)/topics/([^/]+)
 * ```
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import type { AssetTypeDescriptor } from "../types.js";
import { InvalidDescriptorError } from "../errors.js";

// =============================================================================
// Schemas
// =============================================================================

const NonEmpty = (description: string) => Type.String({ minLength: 1, description });

export const AssetTypeEntrySchema = Type.Object({
  asset_type: NonEmpty("Fully-qualified asset type, e.g. storage.googleapis.com/Bucket"),
  service_name: NonEmpty("API service name, e.g. storage"),
  version: NonEmpty("API version, e.g. v1"),
  method: NonEmpty("Policy-setting method, e.g. setIamPolicy"),
  resource_type: NonEmpty("Resource type used to build the API resource path"),
  asset_name_pattern: NonEmpty("Regular expression with capturing groups for the asset name"),
});

export type AssetTypeEntry = Static<typeof AssetTypeEntrySchema>;

/** Top-level shape; entries are validated one by one so errors can name an index. */
export const AssetTypeConfigSchema = Type.Object({
  asset_types: Type.Array(Type.Unknown()),
});

export type AssetTypeConfigFile = { asset_types: AssetTypeEntry[] };

/** Capture groups the built-in REST surfaces read, by resource type. */
export const REQUIRED_CAPTURE_GROUPS: ReadonlyMap<string, number> = new Map([
  ["project", 1],
  ["bucket", 1],
  ["dataset", 2],
]);

// =============================================================================
// Conversion
// =============================================================================

export function entryToDescriptor(entry: AssetTypeEntry): AssetTypeDescriptor {
  return {
    assetType: entry.asset_type,
    serviceName: entry.service_name,
    apiVersion: entry.version,
    method: entry.method,
    resourceType: entry.resource_type,
    assetNamePattern: entry.asset_name_pattern,
  };
}

export function descriptorToEntry(descriptor: AssetTypeDescriptor): AssetTypeEntry {
  return {
    asset_type: descriptor.assetType,
    service_name: descriptor.serviceName,
    version: descriptor.apiVersion,
    method: descriptor.method,
    resource_type: descriptor.resourceType,
    asset_name_pattern: descriptor.assetNamePattern,
  };
}

/** Check an untyped config entry and convert it to a descriptor. */
export function parseAssetTypeEntry(input: unknown, label = "asset type entry"): AssetTypeDescriptor {
  if (!Value.Check(AssetTypeEntrySchema, input)) {
    const first = Value.Errors(AssetTypeEntrySchema, input).First();
    const where = first ? ` at ${first.path || "/"}: ${first.message}` : "";
    throw new InvalidDescriptorError(`Invalid ${label}${where}`);
  }
  return validateDescriptor(entryToDescriptor(input));
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Number of capturing groups in a pattern. Throws a SyntaxError for an
 * invalid expression.
 */
export function countCaptureGroups(pattern: string): number {
  // Compile the form the resolver uses, so a trailing `\` cannot slip through.
  new RegExp(`^(?:${pattern})$`);
  // An empty alternative always matches, so every group shows up in the result.
  const match = new RegExp(`${pattern}|`).exec("");
  return match ? match.length - 1 : 0;
}

/**
 * Check every field is present and the pattern is a valid expression with
 * enough capturing groups. Returns a frozen copy.
 */
export function validateDescriptor(descriptor: AssetTypeDescriptor): AssetTypeDescriptor {
  const fields = [
    ["assetType", descriptor.assetType],
    ["serviceName", descriptor.serviceName],
    ["apiVersion", descriptor.apiVersion],
    ["method", descriptor.method],
    ["resourceType", descriptor.resourceType],
    ["assetNamePattern", descriptor.assetNamePattern],
  ] as const;
  for (const [name, value] of fields) {
    if (typeof value !== "string" || value.trim() === "") {
      throw new InvalidDescriptorError(
        `Asset type ${descriptor.assetType || "(unnamed)"} is missing required field ${name}`,
      );
    }
  }

  let groups: number;
  try {
    groups = countCaptureGroups(descriptor.assetNamePattern);
  } catch (error) {
    throw new InvalidDescriptorError(
      `Asset type ${descriptor.assetType} has an invalid asset_name_pattern: ${
        error instanceof Error ? error.message : String(error)
      }`,
      { cause: error },
    );
  }

  const required = REQUIRED_CAPTURE_GROUPS.get(descriptor.resourceType) ?? 1;
  if (groups < required) {
    throw new InvalidDescriptorError(
      `Asset type ${descriptor.assetType} needs at least ${required} capturing group(s) in asset_name_pattern, found ${groups}`,
    );
  }

  return Object.freeze({
    assetType: descriptor.assetType,
    serviceName: descriptor.serviceName,
    apiVersion: descriptor.apiVersion,
    method: descriptor.method,
    resourceType: descriptor.resourceType,
    assetNamePattern: descriptor.assetNamePattern,
  });
}
