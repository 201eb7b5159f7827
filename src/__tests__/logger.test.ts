import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AuthError } from "~/utils/errors";
import { Logger, logger } from "~/utils/logger";

function loggedEntries(spy: { mock: { calls: unknown[][] } }): Record<string, unknown>[] {
  return spy.mock.calls.map((call) => JSON.parse(String(call[0])));
}

// Tests for development mode logging
describe("Logger - Development Mode", () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    // Set development mode before importing
    process.env.NODE_ENV = "development";
    vi.resetModules();
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    vi.resetModules();
    process.env.NODE_ENV = "test";
  });

  it("should log debug messages in development mode", async () => {
    const { logger: devLogger } = await import("~/utils/logger");
    const context = { uid: "dev-user" };

    devLogger.debug("Debug message", context);

    expect(consoleLogSpy).toHaveBeenCalledWith("[DEBUG]", "Debug message", context);
  });

  it("should log without context in development mode", async () => {
    const { logger: devLogger } = await import("~/utils/logger");

    devLogger.info("Info only");

    expect(consoleLogSpy).toHaveBeenCalledWith("[INFO]", "Info only", "");
  });

  it("should include the error stack in development mode", async () => {
    const { logger: devLogger } = await import("~/utils/logger");

    devLogger.error("Dev error", new TypeError("Type issue"));

    const [prefix, message, context] = consoleLogSpy.mock.calls[0] ?? [];
    expect(prefix).toBe("[ERROR]");
    expect(message).toBe("Dev error");
    expect(context).toMatchObject({
      error: {
        name: "TypeError",
        message: "Type issue",
        stack: expect.stringContaining("TypeError: Type issue"),
      },
    });
  });

  it("should prefix every level", async () => {
    const { logger: devLogger } = await import("~/utils/logger");

    devLogger.info("info msg");
    devLogger.warn("warn msg");
    devLogger.error("error msg");

    expect(consoleLogSpy.mock.calls.map((call) => call[0])).toEqual([
      "[INFO]",
      "[WARN]",
      "[ERROR]",
    ]);
  });
});

// Tests for production mode logging
describe("Logger", () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-05-01T12:00:00.000Z"));
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    vi.useRealTimers();
  });

  it("should write one JSON object per entry", () => {
    logger.info("Verified token", { component: "auth", uid: "user-1" });

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    expect(consoleLogSpy).toHaveBeenCalledWith(
      '{"timestamp":"2024-05-01T12:00:00.000Z","level":"info","message":"Verified token","component":"auth","uid":"user-1"}',
    );
  });

  it("should log warnings", () => {
    logger.warn("Serving stale keys");

    expect(loggedEntries(consoleLogSpy)).toEqual([
      { timestamp: "2024-05-01T12:00:00.000Z", level: "warn", message: "Serving stale keys" },
    ]);
  });

  it("should drop debug output outside development", () => {
    logger.debug("noisy", { detail: 1 });

    expect(consoleLogSpy).not.toHaveBeenCalled();
  });

  it("should log errors without their stack", () => {
    logger.error("signBlob failed", new Error("denied"), { component: "iam-signer" });

    expect(loggedEntries(consoleLogSpy)).toEqual([
      {
        timestamp: "2024-05-01T12:00:00.000Z",
        level: "error",
        message: "signBlob failed",
        component: "iam-signer",
        error: { message: "denied", name: "Error" },
      },
    ]);
  });

  it("should log non-Error values as they are", () => {
    logger.error("odd failure", { status: 500 });

    expect(loggedEntries(consoleLogSpy)[0]).toMatchObject({ error: { status: 500 } });
  });

  it("should add the SDK code, category and cause of an AuthError", () => {
    const error = new AuthError({
      category: "UNAVAILABLE",
      code: "CERTIFICATE_FETCH_FAILED",
      message: "failed to fetch public keys",
      cause: new Error("socket hang up"),
    });

    logger.error("Refresh failed", error);

    expect(loggedEntries(consoleLogSpy)[0]?.error).toEqual({
      name: "AuthError",
      message: "failed to fetch public keys",
      code: "CERTIFICATE_FETCH_FAILED",
      category: "UNAVAILABLE",
      cause: "socket hang up",
    });
  });

  describe("LOG_LEVEL", () => {
    afterEach(() => {
      delete process.env.LOG_LEVEL;
    });

    it("should drop entries below the configured level", () => {
      process.env.LOG_LEVEL = "WARN";
      const quiet = new Logger();

      quiet.info("skipped");
      quiet.warn("kept");

      expect(loggedEntries(consoleLogSpy).map((entry) => entry.message)).toEqual(["kept"]);
    });

    it("should enable debug output", () => {
      process.env.LOG_LEVEL = "debug";

      new Logger({ component: "key-source" }).debug("Refreshing");

      expect(loggedEntries(consoleLogSpy)).toEqual([
        {
          timestamp: "2024-05-01T12:00:00.000Z",
          level: "debug",
          message: "Refreshing",
          component: "key-source",
        },
      ]);
    });

    it("should ignore an unknown level", () => {
      process.env.LOG_LEVEL = "toString";

      new Logger().info("still logged");

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe("withContext", () => {
    it("should add its context to every entry", () => {
      const log = logger.withContext({ component: "http-key-source" });

      log.info("Fetched keys", { count: 2 });
      log.warn("Refresh failed");

      expect(loggedEntries(consoleLogSpy)).toEqual([
        {
          timestamp: "2024-05-01T12:00:00.000Z",
          level: "info",
          message: "Fetched keys",
          component: "http-key-source",
          count: 2,
        },
        {
          timestamp: "2024-05-01T12:00:00.000Z",
          level: "warn",
          message: "Refresh failed",
          component: "http-key-source",
        },
      ]);
    });

    it("should let per-call context override the bound one", () => {
      const log = logger.withContext({ component: "auth", projectId: "p1" });

      log.info("Override", { projectId: "p2" });

      expect(loggedEntries(consoleLogSpy)[0]).toMatchObject({
        component: "auth",
        projectId: "p2",
      });
    });

    it("should pass errors through", () => {
      const log = logger.withContext({ component: "iam-signer" });

      log.error("Failed", new RangeError("out of range"), { attempt: 1 });

      expect(loggedEntries(consoleLogSpy)[0]).toMatchObject({
        level: "error",
        component: "iam-signer",
        attempt: 1,
        error: { name: "RangeError", message: "out of range" },
      });
    });

    it("should nest bound contexts", () => {
      logger.withContext({ component: "auth" }).withContext({ tenantId: "t1" }).info("Nested");

      expect(loggedEntries(consoleLogSpy)[0]).toMatchObject({
        component: "auth",
        tenantId: "t1",
      });
    });

    it("should drop debug output outside development", () => {
      logger.withContext({ component: "token-generator" }).debug("Minted");

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });
});
