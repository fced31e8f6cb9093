import { afterEach, describe, expect, it, vi } from "vitest";
import { resolveLogLevel } from "./logger";

afterEach(() => {
  vi.unstubAllEnvs();
  vi.resetModules();
});

describe("resolveLogLevel", () => {
  it("uses a known configured level", () => {
    expect(resolveLogLevel({ LOG_LEVEL: "warn", NODE_ENV: "production" })).toBe(
      "warn",
    );
  });

  it("falls back to the NODE_ENV default for unknown levels", () => {
    expect(
      resolveLogLevel({ LOG_LEVEL: "verbose", NODE_ENV: "production" }),
    ).toBe("info");
    expect(resolveLogLevel({ LOG_LEVEL: "verbose", NODE_ENV: "test" })).toBe(
      "debug",
    );
  });

  it("defaults to debug outside production", () => {
    expect(resolveLogLevel({})).toBe("debug");
  });
});

describe("library import", () => {
  it("loads with an unknown LOG_LEVEL", async () => {
    vi.stubEnv("LOG_LEVEL", "verbose");
    vi.stubEnv("NODE_ENV", "production");
    vi.resetModules();

    const { logger } = await import("./logger");
    const library = await import("../../index");

    expect(logger.level).toBe("info");
    expect(typeof library.FimfictionClient.fromToken).toBe("function");
  });
});
