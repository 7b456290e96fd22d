/**
 * BigQuery dataset access lists
 *
 * Datasets keep grants in an `access` array rather than an IAM policy. These
 * helpers convert between the two so datasets go through the same merge as
 * every other resource.
 */

import type { IamBinding, IamPolicy } from "./index.js";

export type DatasetAccessEntry = Readonly<Record<string, unknown>>;

/** Legacy basic roles the API may return, and the IAM roles they stand for. */
export const LEGACY_DATASET_ROLES: Readonly<Record<string, string>> = {
  READER: "roles/bigquery.dataViewer",
  WRITER: "roles/bigquery.dataEditor",
  OWNER: "roles/bigquery.dataOwner",
};

// Entry field -> principal prefix, in lookup order.
const MEMBER_FIELDS: readonly (readonly [string, string])[] = [
  ["userByEmail", "user:"],
  ["groupByEmail", "group:"],
  ["domain", "domain:"],
  ["specialGroup", "specialGroup:"],
];

function normalizeRole(role: string): string {
  return LEGACY_DATASET_ROLES[role] ?? role;
}

function memberOf(entry: DatasetAccessEntry): string | null {
  for (const [field, prefix] of MEMBER_FIELDS) {
    const value = entry[field];
    if (typeof value === "string" && value) return `${prefix}${value}`;
  }
  const iamMember = entry.iamMember;
  return typeof iamMember === "string" && iamMember ? iamMember : null;
}

function entryFor(role: string, member: string): DatasetAccessEntry {
  const colon = member.indexOf(":");
  const kind = colon === -1 ? "user" : member.slice(0, colon);
  const value = colon === -1 ? member : member.slice(colon + 1);
  switch (kind) {
    case "user":
    case "serviceAccount":
      return { role, userByEmail: value };
    case "group":
      return { role, groupByEmail: value };
    case "domain":
      return { role, domain: value };
    case "specialGroup":
      return { role, specialGroup: value };
    default:
      return { role, iamMember: member };
  }
}

/** Group role/member entries into bindings; everything else is passed through. */
export function accessEntriesToPolicy(access: readonly DatasetAccessEntry[], etag: string): IamPolicy {
  const byRole = new Map<string, string[]>();
  const passthrough: DatasetAccessEntry[] = [];

  for (const entry of access) {
    const role = typeof entry.role === "string" ? normalizeRole(entry.role) : null;
    const member = memberOf(entry);
    if (!role || !member) {
      passthrough.push(entry);
      continue;
    }
    const members = byRole.get(role) ?? [];
    if (!members.includes(member)) members.push(member);
    byRole.set(role, members);
  }

  const bindings: IamBinding[] = [...byRole].map(([role, members]) => ({ role, members }));
  return { version: 1, etag, bindings, ...(passthrough.length > 0 ? { passthrough } : {}) };
}

export function policyToAccessEntries(policy: IamPolicy): DatasetAccessEntry[] {
  const entries: DatasetAccessEntry[] = [];
  for (const binding of policy.bindings) {
    for (const member of binding.members) {
      entries.push(entryFor(binding.role, member));
    }
  }
  return [...entries, ...(policy.passthrough ?? [])];
}
