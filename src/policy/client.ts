/**
 * IAM Policy Client
 *
 * Reads and writes resource policies over the Google Cloud REST APIs.
 * Uses native fetch() through the shared API helpers.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import type { GcpRetryOptions } from "../types.js";
import { gcpRequest, isConcurrencyRejection, GcpApiError } from "../api.js";
import { withGcpRetry, shouldRetryGcpError, formatErrorMessage } from "../retry.js";
import { tracePolicyCall } from "../diagnostics.js";
import { ApiError, BindingError, PolicyConflictError } from "../errors.js";
import { freezePolicy, type IamBinding, type IamPolicy } from "./index.js";
import { accessEntriesToPolicy, policyToAccessEntries } from "./bigquery.js";
import type { PolicyTarget } from "./targets.js";

// =============================================================================
// Types
// =============================================================================

/** Fetches and submits the IAM policy of one resource. */
export interface PolicyClient {
  getPolicy(target: PolicyTarget): Promise<IamPolicy>;
  /**
   * Submit `policy`, guarded by its etag. Rejects with `PolicyConflictError`
   * when the resource's policy changed since that etag was issued.
   */
  setPolicy(target: PolicyTarget, policy: IamPolicy): Promise<IamPolicy>;
}

const ConditionSchema = Type.Object({
  title: Type.Optional(Type.String()),
  description: Type.Optional(Type.String()),
  expression: Type.String(),
});

const PolicyResponseSchema = Type.Object({
  version: Type.Optional(Type.Number()),
  etag: Type.Optional(Type.String()),
  bindings: Type.Optional(
    Type.Array(
      Type.Object({
        role: Type.String(),
        members: Type.Optional(Type.Array(Type.String())),
        condition: Type.Optional(ConditionSchema),
      }),
    ),
  ),
});

type PolicyResponse = Static<typeof PolicyResponseSchema>;

const DatasetResponseSchema = Type.Object({
  etag: Type.Optional(Type.String()),
  access: Type.Optional(Type.Array(Type.Record(Type.String(), Type.Unknown()))),
});

/** Highest policy version; requesting it keeps conditional bindings intact. */
const REQUESTED_POLICY_VERSION = 3;

// =============================================================================
// Wire conversion
// =============================================================================

function fromPolicyResponse(data: PolicyResponse): IamPolicy {
  const bindings: IamBinding[] = (data.bindings ?? []).map((b) => ({
    role: b.role,
    members: b.members ?? [],
    ...(b.condition ? { condition: b.condition } : {}),
  }));
  return freezePolicy({ version: data.version ?? 1, etag: data.etag ?? "", bindings });
}

function toWirePolicy(policy: IamPolicy): Record<string, unknown> {
  return {
    version: policy.version,
    ...(policy.etag ? { etag: policy.etag } : {}),
    bindings: policy.bindings.map((b) => ({
      role: b.role,
      members: [...b.members],
      ...(b.condition ? { condition: { ...b.condition } } : {}),
    })),
  };
}

function parsePolicy(data: unknown, target: PolicyTarget): IamPolicy {
  if (!Value.Check(PolicyResponseSchema, data)) {
    throw new ApiError(`Unexpected IAM policy response for ${target.resource}`);
  }
  return fromPolicyResponse(data);
}

function parseDataset(data: unknown, target: PolicyTarget): IamPolicy {
  if (!Value.Check(DatasetResponseSchema, data)) {
    throw new ApiError(`Unexpected dataset response for ${target.resource}`);
  }
  return freezePolicy(accessEntriesToPolicy(data.access ?? [], data.etag ?? ""));
}

function toApiError(error: unknown, action: string, target: PolicyTarget): BindingError {
  if (error instanceof BindingError) return error;
  return new ApiError(`Failed to ${action} for ${target.resource}: ${formatErrorMessage(error)}`, {
    statusCode: error instanceof GcpApiError ? error.statusCode : undefined,
    code: error instanceof GcpApiError ? error.code : undefined,
    cause: error,
  });
}

// =============================================================================
// GcpPolicyClient
// =============================================================================

export class GcpPolicyClient implements PolicyClient {
  private getAccessToken: () => Promise<string>;
  private retryOptions: GcpRetryOptions;

  constructor(getAccessToken: () => Promise<string>, retryOptions?: GcpRetryOptions) {
    this.getAccessToken = getAccessToken;
    this.retryOptions = retryOptions ?? {};
  }

  async getPolicy(target: PolicyTarget): Promise<IamPolicy> {
    try {
      const token = await this.getAccessToken();
      return await tracePolicyCall(target, "read", () =>
        withGcpRetry(() => this.fetchPolicy(target, token), this.retryOptions),
      );
    } catch (error) {
      throw toApiError(error, "read IAM policy", target);
    }
  }

  async setPolicy(target: PolicyTarget, policy: IamPolicy): Promise<IamPolicy> {
    try {
      const token = await this.getAccessToken();
      return await tracePolicyCall(target, "write", () =>
        withGcpRetry(
          () => this.submitPolicy(target, policy, token),
          this.retryOptions,
          (error) => !isConcurrencyRejection(error) && shouldRetryGcpError(error),
        ),
      );
    } catch (error) {
      if (isConcurrencyRejection(error)) {
        throw new PolicyConflictError(target.resource, { cause: error });
      }
      throw toApiError(error, "update IAM policy", target);
    }
  }

  private async fetchPolicy(target: PolicyTarget, token: string): Promise<IamPolicy> {
    switch (target.surface) {
      case "storage": {
        const url = `${target.url}?optionsRequestedPolicyVersion=${REQUESTED_POLICY_VERSION}`;
        return parsePolicy(await gcpRequest(url, token), target);
      }
      case "bigquery-dataset":
        return parseDataset(await gcpRequest(target.url, token), target);
      case "resource-manager":
      case "iam-resource": {
        const data = await gcpRequest(`${target.url}:getIamPolicy`, token, {
          method: "POST",
          body: { options: { requestedPolicyVersion: REQUESTED_POLICY_VERSION } },
        });
        return parsePolicy(data, target);
      }
    }
  }

  private async submitPolicy(target: PolicyTarget, policy: IamPolicy, token: string): Promise<IamPolicy> {
    switch (target.surface) {
      case "storage": {
        const data = await gcpRequest(target.url, token, { method: "PUT", body: toWirePolicy(policy) });
        return parsePolicy(data, target);
      }
      case "bigquery-dataset": {
        const data = await gcpRequest(target.url, token, {
          method: "PATCH",
          body: { access: policyToAccessEntries(policy) },
          headers: policy.etag ? { "If-Match": policy.etag } : undefined,
        });
        return parseDataset(data, target);
      }
      case "resource-manager":
      case "iam-resource": {
        const data = await gcpRequest(`${target.url}:${target.method}`, token, {
          method: "POST",
          body: { policy: toWirePolicy(policy) },
        });
        return parsePolicy(data, target);
      }
    }
  }
}
