/**
 * Public API for embedding the binding engine.
 */

export type { AssetTypeDescriptor, BindingRequest, BuiltinAssetType, GcpRetryOptions } from "./types.js";
export {
  BindingError,
  InvalidDescriptorError,
  ConfigParseError,
  InvalidInputError,
  UnknownAssetTypeError,
  AssetNameMismatchError,
  PolicyConflictError,
  ApiError,
  isBindingError,
  type BindingErrorKind,
} from "./errors.js";
export { createConsoleLogger, silentLogger, type BindingsLogger } from "./logger.js";

export {
  AssetTypeRegistry,
  configFormatFor,
  BUILTIN_ASSET_TYPES,
  type ConfigFormat,
  type AssetTypeRegistryOptions,
} from "./registry/index.js";
export { matchAssetName, resolveAssetName, type ResolvedTarget } from "./resolver/index.js";
export {
  addMemberToPolicy,
  hasBinding,
  principalFor,
  type IamBinding,
  type IamCondition,
  type IamPolicy,
  type PolicyMergeResult,
} from "./policy/index.js";
export { buildPolicyTarget, type PolicyTarget, type PolicySurface } from "./policy/targets.js";
export { GcpPolicyClient, type PolicyClient } from "./policy/client.js";
export {
  BindingApplier,
  type BindingResult,
  type BindingSuccess,
  type BindingFailure,
  type BindingStatus,
} from "./bindings/applier.js";
export { processBatch, summarizeResults, type AggregateReport, type BatchOptions } from "./bindings/batch.js";
export { parseBindingCsv, readBindingCsv, REQUIRED_COLUMNS } from "./csv/index.js";
export { createCredentialsManager, GcpCredentialsManager } from "./credentials/index.js";
export {
  onPolicyCall,
  enablePolicyTracing,
  disablePolicyTracing,
  type PolicyCallEvent,
  type PolicyOperation,
} from "./diagnostics.js";
export { runCli } from "./cli/program.js";
