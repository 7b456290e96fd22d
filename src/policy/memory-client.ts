/**
 * In-memory policy store
 *
 * Lightweight `PolicyClient` for testing and development. Policies are keyed
 * by target resource and carry an etag that changes on every write, so stale
 * writes are rejected the way the real APIs reject them.
 */

import { PolicyConflictError } from "../errors.js";
import { freezePolicy, type IamBinding, type IamPolicy } from "./index.js";
import type { PolicyClient } from "./client.js";
import type { PolicyTarget } from "./targets.js";

export class InMemoryPolicyClient implements PolicyClient {
  private policies = new Map<string, IamPolicy>();
  private revisions = new Map<string, number>();
  /** Resources read, in call order. */
  readonly reads: string[] = [];
  /** Resources written, in call order. */
  readonly writes: string[] = [];

  /** Replace the stored policy of `resource`, bumping its etag. */
  seed(resource: string, bindings: readonly IamBinding[], passthrough?: IamPolicy["passthrough"]): IamPolicy {
    return this.store(resource, { version: 1, etag: "", bindings, ...(passthrough ? { passthrough } : {}) });
  }

  /** Simulate another writer changing the policy behind our back. */
  touch(resource: string): void {
    this.store(resource, this.current(resource));
  }

  /** The stored policy as JSON, for comparing before and after a run. */
  snapshot(resource: string): string {
    return JSON.stringify(this.current(resource));
  }

  current(resource: string): IamPolicy {
    return this.policies.get(resource) ?? this.store(resource, { version: 1, etag: "", bindings: [] });
  }

  async getPolicy(target: PolicyTarget): Promise<IamPolicy> {
    this.reads.push(target.resource);
    return this.current(target.resource);
  }

  async setPolicy(target: PolicyTarget, policy: IamPolicy): Promise<IamPolicy> {
    this.writes.push(target.resource);
    if (policy.etag !== this.current(target.resource).etag) {
      throw new PolicyConflictError(target.resource);
    }
    return this.store(target.resource, policy);
  }

  private store(resource: string, policy: IamPolicy): IamPolicy {
    const revision = (this.revisions.get(resource) ?? 0) + 1;
    this.revisions.set(resource, revision);
    const stored = freezePolicy({ ...policy, etag: `etag-${revision}` });
    this.policies.set(resource, stored);
    return stored;
  }
}
