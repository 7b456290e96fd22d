/**
 * Asset Type Registry
 *
 * Single source of truth mapping asset-type keys to descriptors. Populated
 * from the built-in defaults at construction and optionally merged with a
 * JSON or YAML config file; read-only while a batch runs.
 */

import { readFile, writeFile } from "node:fs/promises";
import { extname } from "node:path";

import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { Value } from "@sinclair/typebox/value";

import type { AssetTypeDescriptor } from "../types.js";
import type { BindingsLogger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { ConfigParseError, InvalidDescriptorError, UnknownAssetTypeError } from "../errors.js";
import { BUILTIN_ASSET_TYPES } from "./defaults.js";
import {
  AssetTypeConfigSchema,
  descriptorToEntry,
  parseAssetTypeEntry,
  validateDescriptor,
  type AssetTypeConfigFile,
} from "./schema.js";

export type ConfigFormat = "json" | "yaml";

export type AssetTypeRegistryOptions = {
  /** Register the built-in asset types (default true). */
  builtins?: boolean;
  logger?: BindingsLogger;
};

/** Pick the config format from a file extension. */
export function configFormatFor(path: string): ConfigFormat | null {
  switch (extname(path).toLowerCase()) {
    case ".json":
      return "json";
    case ".yaml":
    case ".yml":
      return "yaml";
    default:
      return null;
  }
}

export class AssetTypeRegistry {
  private descriptors = new Map<string, AssetTypeDescriptor>();
  private logger: BindingsLogger;

  constructor(options: AssetTypeRegistryOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    if (options.builtins ?? true) {
      for (const descriptor of BUILTIN_ASSET_TYPES) {
        this.register(descriptor);
      }
    }
  }

  /** Insert or overwrite a descriptor by its asset type. */
  register(descriptor: AssetTypeDescriptor): void {
    const valid = validateDescriptor(descriptor);
    const replaced = this.descriptors.has(valid.assetType);
    this.descriptors.set(valid.assetType, valid);
    this.logger.debug(`${replaced ? "Replaced" : "Registered"} asset type ${valid.assetType}`);
  }

  /** Validate every descriptor first, then register them all; nothing is registered on failure. */
  registerAll(descriptors: readonly AssetTypeDescriptor[]): void {
    const valid = descriptors.map((d) => validateDescriptor(d));
    for (const descriptor of valid) {
      this.register(descriptor);
    }
  }

  lookup(assetType: string): AssetTypeDescriptor {
    const descriptor = this.descriptors.get(assetType);
    if (!descriptor) throw new UnknownAssetTypeError(assetType);
    return descriptor;
  }

  has(assetType: string): boolean {
    return this.descriptors.has(assetType);
  }

  unregister(assetType: string): void {
    if (!this.descriptors.delete(assetType)) throw new UnknownAssetTypeError(assetType);
    this.logger.debug(`Removed asset type ${assetType}`);
  }

  /** Registered asset types in registration order. */
  listAssetTypes(): string[] {
    return [...this.descriptors.keys()];
  }

  list(): AssetTypeDescriptor[] {
    return [...this.descriptors.values()];
  }

  /** The registry contents in config-file shape. */
  toConfig(): AssetTypeConfigFile {
    return { asset_types: this.list().map(descriptorToEntry) };
  }

  /**
   * Parse config text and merge its descriptors into the registry. The
   * whole document is validated before anything is registered.
   *
   * @returns The number of descriptors registered.
   */
  mergeConfig(text: string, format: ConfigFormat, source = "<config>"): number {
    let document: unknown;
    try {
      document = format === "json" ? JSON.parse(text) : parseYaml(text);
    } catch (error) {
      throw new ConfigParseError(
        source,
        `Could not parse ${format.toUpperCase()} config ${source}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    if (!Value.Check(AssetTypeConfigSchema, document)) {
      throw new ConfigParseError(source, `Config ${source} must be an object with an asset_types list`);
    }

    const descriptors = document.asset_types.map((entry, index) => {
      try {
        return parseAssetTypeEntry(entry, `asset_types[${index}]`);
      } catch (error) {
        if (error instanceof InvalidDescriptorError) {
          throw new InvalidDescriptorError(`${source}: ${error.message}`, { cause: error });
        }
        throw error;
      }
    });

    this.registerAll(descriptors);
    return descriptors.length;
  }

  /** Merge descriptors from a `.json`, `.yaml` or `.yml` file. */
  async loadFromConfig(path: string): Promise<number> {
    const format = configFormatFor(path);
    if (!format) {
      throw new ConfigParseError(path, `Unsupported config file format: ${path} (use .json, .yaml or .yml)`);
    }

    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (error) {
      throw new ConfigParseError(
        path,
        `Could not read config file ${path}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }

    const count = this.mergeConfig(text, format, path);
    this.logger.info(`Loaded ${count} asset type(s) from ${path}`);
    return count;
  }

  /** Render the registry in the given format. */
  serialize(format: ConfigFormat): string {
    const config = this.toConfig();
    return format === "json" ? `${JSON.stringify(config, null, 2)}\n` : stringifyYaml(config);
  }

  /** Write every registered descriptor to a `.json`, `.yaml` or `.yml` file. */
  async exportToConfig(path: string): Promise<void> {
    const format = configFormatFor(path);
    if (!format) {
      throw new ConfigParseError(path, `Unsupported config file format: ${path} (use .json, .yaml or .yml)`);
    }
    await writeFile(path, this.serialize(format), "utf-8");
    this.logger.info(`Exported ${this.descriptors.size} asset type(s) to ${path}`);
  }
}

export { BUILTIN_ASSET_TYPES } from "./defaults.js";
export {
  AssetTypeEntrySchema,
  AssetTypeConfigSchema,
  countCaptureGroups,
  validateDescriptor,
  parseAssetTypeEntry,
  type AssetTypeEntry,
  type AssetTypeConfigFile,
} from "./schema.js";
