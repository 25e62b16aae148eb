import { describe, it, expect } from "vitest";
import { AuthSession } from "../../../src/session/auth-session.js";
import {
  ConfigError,
  ExhaustedRetriesError,
  ThrottledError,
  TransientLoginError,
  VehicleServiceError,
} from "../../../src/errors.js";
import {
  FakeVehicleServiceClient,
  captureLogger,
  recordingSleep,
  silentLogger,
  testCredentials,
} from "../../utils/test-helpers.js";

const FIXED_NOW = new Date("2026-03-01T08:30:00.000Z");

function makeSession(client: FakeVehicleServiceClient, maxAttempts: number, retryDelayMs = 1000) {
  const { sleep, delays } = recordingSleep();
  const session = new AuthSession(client, testCredentials, {
    maxAttempts,
    retryDelayMs,
    sleep,
    now: () => FIXED_NOW,
    logger: silentLogger(),
  });
  return { session, delays };
}

describe("AuthSession", () => {
  describe("login success", () => {
    it.each([1, 3, 5])("should succeed with exactly one call when maxAttempts is %i", async (maxAttempts) => {
      const client = new FakeVehicleServiceClient([true]);
      const { session, delays } = makeSession(client, maxAttempts);

      const outcome = await session.login();

      expect(outcome).toEqual({ status: "success", authenticatedAt: FIXED_NOW, attempts: 1 });
      expect(client.loginCalls).toBe(1);
      expect(delays).toEqual([]);
      expect(session.state).toBe("authenticated");
      expect(session.authenticatedAt).toBe(FIXED_NOW);
    });

    it("should pass the credentials to the service", async () => {
      const client = new FakeVehicleServiceClient([true]);
      const { session } = makeSession(client, 3);

      await session.login();

      expect(client.loginArgs).toEqual([{ identity: "driver@example.com", secret: "test-password", region: "DE" }]);
    });

    it("should succeed after N-1 generic faults with N-1 delays", async () => {
      const client = new FakeVehicleServiceClient([new Error("socket hang up"), new Error("502 Bad Gateway"), false, true]);
      const { session, delays } = makeSession(client, 4, 2500);

      const outcome = await session.login();

      expect(outcome.status).toBe("success");
      expect(client.loginCalls).toBe(4);
      expect(delays).toEqual([2500, 2500, 2500]);
      expect(session.attemptsMade).toBe(4);
    });

    it("should not call the service again once authenticated", async () => {
      const client = new FakeVehicleServiceClient([true]);
      const { session } = makeSession(client, 3);

      await session.login();
      const second = await session.login();

      expect(second.status).toBe("success");
      expect(client.loginCalls).toBe(1);
    });
  });

  describe("throttling", () => {
    it("should stop after one attempt when the first fault is throttled", async () => {
      const client = new FakeVehicleServiceClient([new Error("Login failed: error=login.error.throttled"), true]);
      const { session, delays } = makeSession(client, 5);

      const outcome = await session.login();

      expect(outcome.status).toBe("throttled");
      if (outcome.status !== "throttled") return;
      expect(outcome.message).toBe("Login failed: error=login.error.throttled");
      expect(outcome.error).toBeInstanceOf(ThrottledError);
      expect(outcome.error.retryable).toBe(false);
      expect(client.loginCalls).toBe(1);
      expect(delays).toEqual([]);
      expect(session.state).toBe("throttled");
    });

    it("should treat a structured throttled service error as throttling", async () => {
      const client = new FakeVehicleServiceClient([new VehicleServiceError("Too many requests", "throttled", 429)]);
      const { session } = makeSession(client, 3);

      const outcome = await session.login();

      expect(outcome.status).toBe("throttled");
      expect(client.loginCalls).toBe(1);
    });

    it("should classify a mixed message as throttling", async () => {
      const client = new FakeVehicleServiceClient([
        new VehicleServiceError("Vehicle service error 500: internal error, account THROTTLED", "transient", 500),
      ]);
      const { session } = makeSession(client, 3);

      const outcome = await session.login();

      expect(outcome.status).toBe("throttled");
      expect(client.loginCalls).toBe(1);
    });

    it("should throttle on a later attempt and stop there", async () => {
      const client = new FakeVehicleServiceClient([new Error("timeout"), new Error("Throttled"), true]);
      const { session, delays } = makeSession(client, 5);

      const outcome = await session.login();

      expect(outcome.status).toBe("throttled");
      expect(client.loginCalls).toBe(2);
      expect(delays).toEqual([1000]);
    });

    it("should stay throttled on later login calls without calling the service", async () => {
      const client = new FakeVehicleServiceClient([new Error("throttled"), true]);
      const { session } = makeSession(client, 3);

      const first = await session.login();
      const second = await session.login();

      expect(second).toBe(first);
      expect(client.loginCalls).toBe(1);
      expect(session.state).toBe("throttled");
    });
  });

  describe("exhausted retries", () => {
    it("should return exhausted after exactly N generic faults", async () => {
      const client = new FakeVehicleServiceClient([new Error("boom 1"), new Error("boom 2"), new Error("boom 3"), true]);
      const { session, delays } = makeSession(client, 3);

      const outcome = await session.login();

      expect(outcome.status).toBe("exhausted");
      if (outcome.status !== "exhausted") return;
      expect(outcome.error).toBeInstanceOf(ExhaustedRetriesError);
      expect(outcome.error.attempts).toBe(3);
      expect(outcome.error.message).toBe("Login failed after 3 attempts: boom 3");
      expect(outcome.error.cause).toBeInstanceOf(TransientLoginError);
      expect(client.loginCalls).toBe(3);
      expect(delays).toEqual([1000, 1000]);
      expect(session.state).toBe("failed");
      expect(session.attemptsMade).toBe(3);
    });

    it("should treat a false login flag as a retryable failure", async () => {
      const client = new FakeVehicleServiceClient([false]);
      const { session } = makeSession(client, 2);

      const outcome = await session.login();

      expect(outcome.status).toBe("exhausted");
      if (outcome.status !== "exhausted") return;
      expect(outcome.error.message).toBe("Login failed after 2 attempts: Login rejected by vehicle service");
      expect(client.loginCalls).toBe(2);
    });

    it("should not delay when maxAttempts is 1", async () => {
      const client = new FakeVehicleServiceClient([new Error("connection reset")]);
      const { session, delays } = makeSession(client, 1);

      const outcome = await session.login();

      expect(outcome.status).toBe("exhausted");
      if (outcome.status !== "exhausted") return;
      expect(outcome.error.message).toBe("Login failed after 1 attempt: connection reset");
      expect(delays).toEqual([]);
    });
  });

  describe("cancellation", () => {
    it("should reject before the first attempt when already aborted", async () => {
      const client = new FakeVehicleServiceClient([true]);
      const { session } = makeSession(client, 3);
      const controller = new AbortController();
      controller.abort();

      await expect(session.login({ signal: controller.signal })).rejects.toMatchObject({ name: "AbortError" });
      expect(client.loginCalls).toBe(0);
      expect(session.state).toBe("idle");
    });

    it("should not swallow an abort raised inside a failed attempt", async () => {
      const controller = new AbortController();
      const client = new FakeVehicleServiceClient([true]);
      client.attemptLogin = async () => {
        client.loginCalls++;
        controller.abort();
        throw new Error("socket hang up");
      };
      const { session, delays } = makeSession(client, 3);

      await expect(session.login({ signal: controller.signal })).rejects.toMatchObject({ name: "AbortError" });
      expect(client.loginCalls).toBe(1);
      expect(delays).toEqual([]);
    });

    it("should stop when aborted during the retry delay", async () => {
      const controller = new AbortController();
      const client = new FakeVehicleServiceClient([new Error("timeout"), true]);
      const session = new AuthSession(client, testCredentials, {
        maxAttempts: 3,
        retryDelayMs: 1000,
        logger: silentLogger(),
        sleep: async (_ms, signal) => {
          controller.abort();
          signal?.throwIfAborted();
        },
      });

      await expect(session.login({ signal: controller.signal })).rejects.toMatchObject({ name: "AbortError" });
      expect(client.loginCalls).toBe(1);
    });
  });

  describe("logging", () => {
    it("should log retried failures at attemptLogLevel and the final failure at error", async () => {
      const { logger, lines } = captureLogger();
      const client = new FakeVehicleServiceClient([new Error("a"), new Error("b")]);
      const session = new AuthSession(client, testCredentials, {
        maxAttempts: 2,
        retryDelayMs: 2000,
        logger,
        sleep: recordingSleep().sleep,
        attemptLogLevel: "info",
      });

      await session.login();

      const visible = lines.filter((line) => line.level >= 30).map((line) => [line.level, line.msg]);
      expect(visible).toEqual([
        [30, "Login to vehicle service failed, trying again in 2 seconds"],
        [
          50,
          "Failed to log in to the vehicle service. Check your username, password and country. You may need to open the vehicle app, or log in via a web browser, to accept updated terms and conditions.",
        ],
      ]);
    });

    it("should default retried failures to warn", async () => {
      const { logger, lines } = captureLogger();
      const client = new FakeVehicleServiceClient([new Error("a"), true]);
      const session = new AuthSession(client, testCredentials, {
        maxAttempts: 2,
        retryDelayMs: 0,
        logger,
        sleep: recordingSleep().sleep,
      });

      await session.login();

      expect(lines.filter((line) => line.level >= 30).map((line) => line.level)).toEqual([40]);
    });
  });

  describe("configuration", () => {
    it.each([0, -1, 1.5])("should reject maxAttempts of %s", (maxAttempts) => {
      const client = new FakeVehicleServiceClient();
      expect(() => new AuthSession(client, testCredentials, { maxAttempts, logger: silentLogger() })).toThrow(ConfigError);
    });

    it("should reject a negative retry delay", () => {
      const client = new FakeVehicleServiceClient();
      expect(() => new AuthSession(client, testCredentials, { retryDelayMs: -5, logger: silentLogger() })).toThrow(
        "retryDelayMs must be a non-negative number, got -5"
      );
    });

    it("should default to three attempts and a ten second delay", () => {
      const session = new AuthSession(new FakeVehicleServiceClient(), testCredentials, { logger: silentLogger() });
      expect(session.maxAttempts).toBe(3);
      expect(session.retryDelayMs).toBe(10_000);
      expect(session.state).toBe("idle");
    });
  });
});
