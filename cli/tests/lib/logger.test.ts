import { describe, it, expect, afterEach } from "vitest";
import { logger } from "../../src/lib/logger.js";

afterEach(() => {
  if (logger.isCapturing()) logger.flush();
  logger.setVerbose(false);
});

describe("logger capture", () => {
  it("collects prefixed lines without colour codes", () => {
    logger.capture();
    logger.info("Fetching package");
    logger.success("Installed");
    logger.warn("Resource is large");
    logger.error("Manifest invalid");
    logger.blank();
    expect(logger.flush()).toEqual([
      "info Fetching package",
      "✓ Installed",
      "warn Resource is large",
      "error Manifest invalid",
      "",
    ]);
    expect(logger.isCapturing()).toBe(false);
  });

  it("starts empty on every capture", () => {
    logger.capture();
    logger.dim("first");
    logger.flush();
    logger.capture();
    logger.bold("second");
    expect(logger.flush()).toEqual(["second"]);
  });
});

describe("logger debug", () => {
  it("is silent unless verbose", () => {
    logger.setVerbose(false);
    logger.capture();
    logger.debug("hidden");
    logger.setVerbose(true);
    logger.debug("shown");
    expect(logger.flush()).toEqual(["debug shown"]);
    expect(logger.isVerbose()).toBe(true);
  });
});

describe("logger table", () => {
  it("upper-cases headers and pads every column", () => {
    logger.capture();
    logger.table(["kind", "name"], [["instruction", "style"], ["hook", "lint"]]);
    expect(logger.flush()).toEqual([
      "  KIND         NAME ",
      "  instruction  style",
      "  hook         lint ",
    ]);
  });
});
