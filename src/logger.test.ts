import { describe, expect, it } from "vitest";
import { isLogLevel, resolveLogTransport } from "./logger";

describe("resolveLogTransport", () => {
  it("uses pino-pretty by default", () => {
    expect(resolveLogTransport({ NO_COLOR: "1" })).toEqual({
      target: "pino-pretty",
      options: { colorize: false, ignore: "pid,hostname" },
    });
  });

  it("disables colors in daemon mode", () => {
    expect(resolveLogTransport({ HARBORMASTER_DAEMON: "true" })?.options).toEqual({
      colorize: false,
      ignore: "pid,hostname",
    });
  });

  it("emits raw JSON when requested", () => {
    expect(resolveLogTransport({ HARBORMASTER_LOG_FORMAT: "JSON" })).toBeUndefined();
  });
});

describe("isLogLevel", () => {
  it("accepts pino levels only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
