/**
 * Policy targets
 *
 * Maps a descriptor plus resolved identifiers onto the REST resource whose
 * policy is read and written. `resourceType` picks the surface:
 *
 * | resourceType | surface            | read                          | write                        |
 * |--------------|--------------------|-------------------------------|------------------------------|
 * | project      | resource-manager   | POST {url}:getIamPolicy       | POST {url}:{method}          |
 * | bucket       | storage            | GET {url}                     | PUT {url}                    |
 * | dataset      | bigquery-dataset   | GET {url} (access list)       | PATCH {url} + If-Match       |
 * | anything else| iam-resource       | POST {url}:getIamPolicy       | POST {url}:{method}          |
 */

import type { AssetTypeDescriptor } from "../types.js";
import type { ResolvedTarget } from "../resolver/index.js";
import { apiRoot } from "../api.js";

export type PolicySurface = "resource-manager" | "storage" | "bigquery-dataset" | "iam-resource";

export type PolicyTarget = Readonly<{
  assetType: string;
  assetName: string;
  serviceName: string;
  method: string;
  surface: PolicySurface;
  /** Relative resource path for display, e.g. `b/my-bucket`. */
  resource: string;
  /** Base URL the read and write calls are made against. */
  url: string;
}>;

/** Relative resource name of a full asset name (`//service.googleapis.com/<relative>`). */
export function relativeResourceName(assetName: string): string {
  if (!assetName.startsWith("//")) return assetName.replace(/^\/+/, "");
  const slash = assetName.indexOf("/", 2);
  return slash === -1 ? "" : assetName.slice(slash + 1);
}

function encodePath(path: string): string {
  return path.split("/").map(encodeURIComponent).join("/");
}

export function buildPolicyTarget(descriptor: AssetTypeDescriptor, resolved: ResolvedTarget): PolicyTarget {
  const root = apiRoot(descriptor.serviceName, descriptor.apiVersion);
  const ids = resolved.identifiers;
  const base = {
    assetType: descriptor.assetType,
    assetName: resolved.assetName,
    serviceName: descriptor.serviceName,
    method: descriptor.method,
  };

  switch (descriptor.resourceType) {
    case "project": {
      const resource = `projects/${ids[0]}`;
      return { ...base, surface: "resource-manager", resource, url: `${root}/${encodePath(resource)}` };
    }
    case "bucket": {
      const resource = `b/${ids[0]}`;
      return { ...base, surface: "storage", resource, url: `${root}/${encodePath(resource)}/iam` };
    }
    case "dataset": {
      const resource = `projects/${ids[0]}/datasets/${ids[1]}`;
      return { ...base, surface: "bigquery-dataset", resource, url: `${root}/${encodePath(resource)}` };
    }
    default: {
      const resource = relativeResourceName(resolved.assetName);
      return { ...base, surface: "iam-resource", resource, url: `${root}/${encodePath(resource)}` };
    }
  }
}
