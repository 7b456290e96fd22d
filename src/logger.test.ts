import { describe, it, expect } from "vitest";

import { createConsoleLogger } from "./logger.js";

function sink() {
  const chunks: string[] = [];
  return { chunks, write: (chunk: string | Uint8Array) => chunks.push(String(chunk)) > 0 };
}

describe("createConsoleLogger", () => {
  it("writes info to stdout and problems to stderr", () => {
    const stdout = sink();
    const stderr = sink();
    const logger = createConsoleLogger({ stdout, stderr, color: false });

    logger.info("granted");
    logger.warn("skipped");
    logger.error("failed");
    logger.debug("hidden");

    expect(stdout.chunks).toEqual(["granted\n"]);
    expect(stderr.chunks).toEqual(["skipped\n", "failed\n"]);
  });

  it("prints debug output when verbose", () => {
    const stderr = sink();
    const logger = createConsoleLogger({ stdout: sink(), stderr, color: false, verbose: true });

    logger.debug("GET b/b1");

    expect(stderr.chunks).toEqual(["GET b/b1\n"]);
  });

  it("colours stderr output on request", () => {
    const stderr = sink();
    const logger = createConsoleLogger({ stdout: sink(), stderr, color: true });

    logger.error("failed");

    expect(stderr.chunks).toEqual(["\x1b[31mfailed\x1b[0m\n"]);
  });
});
