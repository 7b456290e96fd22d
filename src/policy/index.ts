/**
 * IAM Policy Model
 *
 * Immutable policy snapshots and the additive merge used by both apply and
 * dry-run modes.
 */

// =============================================================================
// Types
// =============================================================================

export type IamCondition = Readonly<{
  title?: string;
  description?: string;
  expression: string;
}>;

export type IamBinding = Readonly<{
  role: string;
  members: readonly string[];
  condition?: IamCondition;
}>;

export type IamPolicy = Readonly<{
  version: number;
  /** Optimistic concurrency token returned with the policy. */
  etag: string;
  bindings: readonly IamBinding[];
  /**
   * Entries that are not role/member grants (BigQuery authorized views,
   * routines and datasets). Carried through unchanged.
   */
  passthrough?: readonly Readonly<Record<string, unknown>>[];
}>;

export type PolicyMergeResult = Readonly<{
  policy: IamPolicy;
  /** False when the member already held the role. */
  changed: boolean;
}>;

// =============================================================================
// Principals
// =============================================================================

const PRINCIPAL_PREFIXES = ["user:", "group:", "serviceAccount:", "domain:"];

/** `user:<email>`, unless the value already names a principal type. */
export function principalFor(userEmail: string): string {
  const trimmed = userEmail.trim();
  if (PRINCIPAL_PREFIXES.some((prefix) => trimmed.startsWith(prefix))) return trimmed;
  return `user:${trimmed}`;
}

// =============================================================================
// Merge
// =============================================================================

/**
 * Grant `role` to `member`. The input is left untouched; the result shares
 * every binding it did not change.
 *
 * Conditional bindings are never extended: the member joins the first
 * unconditional binding for the role, or a new one appended at the end.
 */
export function addMemberToPolicy(policy: IamPolicy, role: string, member: string): PolicyMergeResult {
  const index = policy.bindings.findIndex((b) => b.role === role && !b.condition);

  if (index === -1) {
    return {
      policy: { ...policy, bindings: [...policy.bindings, { role, members: [member] }] },
      changed: true,
    };
  }

  const binding = policy.bindings[index];
  if (binding.members.includes(member)) {
    return { policy, changed: false };
  }

  const bindings = policy.bindings.map((b, i) =>
    i === index ? { ...b, members: [...b.members, member] } : b,
  );
  return { policy: { ...policy, bindings }, changed: true };
}

/** Whether `member` already holds `role` unconditionally. */
export function hasBinding(policy: IamPolicy, role: string, member: string): boolean {
  return policy.bindings.some((b) => b.role === role && !b.condition && b.members.includes(member));
}

/** Deep-freeze a policy snapshot fetched from an API. */
export function freezePolicy(policy: IamPolicy): IamPolicy {
  return Object.freeze({
    ...policy,
    bindings: Object.freeze(
      policy.bindings.map((b) =>
        Object.freeze({
          ...b,
          members: Object.freeze([...b.members]),
          ...(b.condition ? { condition: Object.freeze({ ...b.condition }) } : {}),
        }),
      ),
    ),
    ...(policy.passthrough
      ? { passthrough: Object.freeze(policy.passthrough.map((entry) => Object.freeze({ ...entry }))) }
      : {}),
  });
}
