import type { AssetTypeDescriptor, BuiltinAssetType } from "../types.js";

/** Asset types every registry starts with, in registration order. */
export const BUILTIN_ASSET_TYPES: readonly (AssetTypeDescriptor & { assetType: BuiltinAssetType })[] = [
  {
    assetType: "cloudresourcemanager.googleapis.com/Project",
    serviceName: "cloudresourcemanager",
    apiVersion: "v1",
    method: "setIamPolicy",
    resourceType: "project",
    assetNamePattern: "//cloudresourcemanager\\.googleapis\\.com/projects/([^/]+)",
  },
  {
    assetType: "storage.googleapis.com/Bucket",
    serviceName: "storage",
    apiVersion: "v1",
    method: "setIamPolicy",
    resourceType: "bucket",
    assetNamePattern: "//storage\\.googleapis\\.com/projects/_/buckets/([^/]+)",
  },
  {
    assetType: "bigquery.googleapis.com/Dataset",
    serviceName: "bigquery",
    apiVersion: "v2",
    method: "patch",
    resourceType: "dataset",
    assetNamePattern: "//bigquery\\.googleapis\\.com/projects/([^/]+)/datasets/([^/]+)",
  },
  {
    assetType: "bigquery.googleapis.com/Table",
    serviceName: "bigquery",
    apiVersion: "v2",
    method: "setIamPolicy",
    resourceType: "table",
    assetNamePattern: "//bigquery\\.googleapis\\.com/projects/([^/]+)/datasets/([^/]+)/tables/([^/]+)",
  },
];
