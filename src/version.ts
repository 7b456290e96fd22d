import { createRequire } from "node:module";

import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

const PackageJsonSchema = Type.Object({ version: Type.String() });

function readVersionFromPackageJson(): string | null {
  const require = createRequire(import.meta.url);
  const pkg: unknown = require("../package.json");
  return Value.Check(PackageJsonSchema, pkg) ? pkg.version : null;
}

// Single source of truth for the current version: package.json, which sits
// one level above both src/ and dist/.
export const VERSION = readVersionFromPackageJson() ?? "0.0.0";
