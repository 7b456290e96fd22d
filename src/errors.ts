/**
 * Binding engine errors.
 *
 * Every error the engine raises carries a `kind` so that row results and the
 * final report can name the failure without inspecting class hierarchies.
 * `InvalidDescriptor`, `ConfigParseError` and `InvalidInput` are setup errors;
 * the rest are recorded per row.
 */

export type BindingErrorKind =
  | "InvalidDescriptor"
  | "ConfigParseError"
  | "InvalidInput"
  | "UnknownAssetType"
  | "AssetNameMismatch"
  | "PolicyConflict"
  | "ApiError";

export class BindingError extends Error {
  public readonly kind: BindingErrorKind;

  constructor(kind: BindingErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "BindingError";
    this.kind = kind;
  }
}

export class InvalidDescriptorError extends BindingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("InvalidDescriptor", message, options);
    this.name = "InvalidDescriptorError";
  }
}

export class ConfigParseError extends BindingError {
  public readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("ConfigParseError", message, options);
    this.name = "ConfigParseError";
    this.path = path;
  }
}

export class InvalidInputError extends BindingError {
  public readonly line?: number;

  constructor(message: string, options?: { line?: number; cause?: unknown }) {
    super("InvalidInput", message, options);
    this.name = "InvalidInputError";
    this.line = options?.line;
  }
}

export class UnknownAssetTypeError extends BindingError {
  public readonly assetType: string;

  constructor(assetType: string) {
    super("UnknownAssetType", `Unknown asset type: ${assetType}`);
    this.name = "UnknownAssetTypeError";
    this.assetType = assetType;
  }
}

export class AssetNameMismatchError extends BindingError {
  public readonly assetName: string;
  public readonly pattern: string;

  constructor(assetName: string, pattern: string) {
    super("AssetNameMismatch", `Asset name '${assetName}' does not match pattern '${pattern}'`);
    this.name = "AssetNameMismatchError";
    this.assetName = assetName;
    this.pattern = pattern;
  }
}

export class PolicyConflictError extends BindingError {
  public readonly resource: string;

  constructor(resource: string, options?: { cause?: unknown }) {
    super(
      "PolicyConflict",
      `IAM policy of ${resource} changed since it was read; re-run to apply against the current policy`,
      options,
    );
    this.name = "PolicyConflictError";
    this.resource = resource;
  }
}

export class ApiError extends BindingError {
  public readonly statusCode?: number;
  public readonly code?: string;

  constructor(
    message: string,
    options?: { statusCode?: number; code?: string; cause?: unknown },
  ) {
    super("ApiError", message, options);
    this.name = "ApiError";
    this.statusCode = options?.statusCode;
    this.code = options?.code;
  }
}

export function isBindingError(error: unknown): error is BindingError {
  return error instanceof BindingError;
}
