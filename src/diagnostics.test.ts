import { describe, it, expect, vi, afterEach } from "vitest";

import {
  enablePolicyTracing,
  onPolicyCall,
  resetPolicyTracingForTest,
  tracePolicyCall,
  type PolicyCallEvent,
} from "./diagnostics.js";
import { ApiError } from "./errors.js";
import { BUILTIN_ASSET_TYPES } from "./registry/index.js";
import { resolveAssetName } from "./resolver/index.js";
import { buildPolicyTarget } from "./policy/targets.js";

const [, BUCKET, DATASET] = BUILTIN_ASSET_TYPES;
const bucket = buildPolicyTarget(BUCKET, resolveAssetName(BUCKET, "//storage.googleapis.com/projects/_/buckets/b1"));
const dataset = buildPolicyTarget(
  DATASET,
  resolveAssetName(DATASET, "//bigquery.googleapis.com/projects/proj1/datasets/sales"),
);

afterEach(() => {
  resetPolicyTracingForTest();
  vi.restoreAllMocks();
});

describe("tracePolicyCall", () => {
  it("reports nothing while disabled", async () => {
    const events: PolicyCallEvent[] = [];
    onPolicyCall((e) => events.push(e));

    await expect(tracePolicyCall(bucket, "read", async () => "ok")).resolves.toBe("ok");
    expect(events).toEqual([]);
  });

  it("names the surface, method and resource of each call", async () => {
    const events: PolicyCallEvent[] = [];
    onPolicyCall((e) => events.push(e));
    enablePolicyTracing();

    await tracePolicyCall(dataset, "read", async () => "ok");
    await expect(
      tracePolicyCall(dataset, "write", async () => {
        throw new ApiError("Precondition failed", { statusCode: 412 });
      }),
    ).rejects.toThrow("Precondition failed");

    expect(events).toMatchObject([
      {
        seq: 1,
        ok: true,
        operation: "read",
        surface: "bigquery-dataset",
        method: "get",
        resource: "projects/proj1/datasets/sales",
      },
      {
        seq: 2,
        ok: false,
        operation: "write",
        method: "patch",
        statusCode: 412,
        error: "Precondition failed",
      },
    ]);
  });

  it("returns the result when a listener throws", async () => {
    const warning = vi.spyOn(process, "emitWarning").mockImplementation(() => undefined);
    onPolicyCall(() => {
      throw new Error("listener broke");
    });
    enablePolicyTracing();

    await expect(tracePolicyCall(bucket, "write", async () => "written")).resolves.toBe("written");
    expect(warning).toHaveBeenCalledWith("Policy trace listener failed: listener broke");
  });

  it("stops delivering after unsubscribe", async () => {
    const events: PolicyCallEvent[] = [];
    const unsubscribe = onPolicyCall((e) => events.push(e));
    enablePolicyTracing();
    unsubscribe();

    await tracePolicyCall(bucket, "read", async () => 1);
    expect(events).toEqual([]);
  });
});
