/**
 * Binding Applier
 *
 * Processes one binding request end to end: descriptor lookup, name
 * resolution, policy fetch, additive merge, and (in apply mode) submission.
 */

import type { BindingRequest } from "../types.js";
import type { BindingsLogger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { InvalidInputError, isBindingError, type BindingErrorKind } from "../errors.js";
import type { AssetTypeRegistry } from "../registry/index.js";
import { resolveAssetName } from "../resolver/index.js";
import { addMemberToPolicy, principalFor, type IamPolicy } from "../policy/index.js";
import { buildPolicyTarget } from "../policy/targets.js";
import type { PolicyClient } from "../policy/client.js";

// =============================================================================
// Types
// =============================================================================

export type BindingStatus = "applied" | "simulated" | "failed";

export type BindingSuccess = Readonly<{
  status: "applied" | "simulated";
  request: BindingRequest;
  /** Display path of the resource whose policy was (or would be) written. */
  target: string;
  /** False when the member already held the role. */
  changed: boolean;
  /** The policy submitted, or the one that would have been submitted. */
  policy: IamPolicy;
}>;

export type BindingFailure = Readonly<{
  status: "failed";
  request: BindingRequest;
  error: Readonly<{ kind: BindingErrorKind; message: string }>;
}>;

export type BindingResult = BindingSuccess | BindingFailure;

export type ApplyOptions = {
  dryRun: boolean;
};

export type BindingApplierOptions = {
  registry: AssetTypeRegistry;
  policyClient: PolicyClient;
  logger?: BindingsLogger;
};

// =============================================================================
// BindingApplier
// =============================================================================

const REQUEST_FIELDS = [
  ["userEmail", "user_email"],
  ["projectId", "project_id"],
  ["assetName", "asset_name"],
  ["assetType", "asset_type"],
  ["role", "role"],
] as const;

/** Requests built in code never pass through the CSV reader, so blank fields are caught here. */
function validateRequest(request: BindingRequest): void {
  const blank = REQUEST_FIELDS.filter(([field]) => {
    const value: unknown = request[field];
    return typeof value !== "string" || value.trim() === "";
  }).map(([, column]) => column);
  if (blank.length > 0) {
    throw new InvalidInputError(`Empty value for ${blank.join(", ")}`, { line: request.line });
  }
}

export class BindingApplier {
  private registry: AssetTypeRegistry;
  private policyClient: PolicyClient;
  private logger: BindingsLogger;

  constructor(options: BindingApplierOptions) {
    this.registry = options.registry;
    this.policyClient = options.policyClient;
    this.logger = options.logger ?? silentLogger;
  }

  /** Never rejects: every failure is returned as a `failed` result. */
  async apply(request: BindingRequest, options: ApplyOptions): Promise<BindingResult> {
    try {
      return Object.freeze(await this.applyOrThrow(request, options));
    } catch (error) {
      // Anything that is not an engine error came from the API client.
      const failure: BindingFailure["error"] = isBindingError(error)
        ? { kind: error.kind, message: error.message }
        : { kind: "ApiError", message: error instanceof Error ? error.message : String(error) };
      this.logger.debug(`${request.assetName}: ${failure.kind}: ${failure.message}`);
      const result: BindingFailure = { status: "failed", request, error: Object.freeze(failure) };
      return Object.freeze(result);
    }
  }

  private async applyOrThrow(request: BindingRequest, options: ApplyOptions): Promise<BindingSuccess> {
    validateRequest(request);
    const descriptor = this.registry.lookup(request.assetType);
    const resolved = resolveAssetName(descriptor, request.assetName);
    const target = buildPolicyTarget(descriptor, resolved);

    const current = await this.policyClient.getPolicy(target);
    const member = principalFor(request.userEmail);
    const { policy, changed } = addMemberToPolicy(current, request.role, member);

    if (!changed) {
      this.logger.debug(`${member} already holds ${request.role} on ${target.resource}`);
    } else if (options.dryRun) {
      this.logger.debug(`Would grant ${request.role} to ${member} on ${target.resource}`);
    } else {
      await this.policyClient.setPolicy(target, policy);
      this.logger.debug(`Granted ${request.role} to ${member} on ${target.resource}`);
    }

    return {
      status: options.dryRun ? "simulated" : "applied",
      request,
      target: target.resource,
      changed,
      policy,
    };
  }
}
