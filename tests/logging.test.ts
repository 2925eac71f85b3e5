import { describe, it, expect } from "vitest";
import { logLevelFromEnv } from "../src/logging.js";

describe("logLevelFromEnv", () => {
  it("accepts every logtape level, trace included", () => {
    expect(logLevelFromEnv({ LOG_LEVEL: "trace" })).toBe("trace");
    expect(logLevelFromEnv({ LOG_LEVEL: " Warning " })).toBe("warning");
    expect(logLevelFromEnv({ LOG_LEVEL: "fatal" })).toBe("fatal");
  });

  it("ignores an unrecognised level and falls back to DEBUG", () => {
    expect(logLevelFromEnv({ LOG_LEVEL: "verbose" })).toBeUndefined();
    expect(logLevelFromEnv({ DEBUG: "true" })).toBe("debug");
    expect(logLevelFromEnv({ DEBUG: "0" })).toBeUndefined();
    expect(logLevelFromEnv({})).toBeUndefined();
  });
});
