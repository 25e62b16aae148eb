import { describe, it, expect, vi } from "vitest";
import { CommandGate, type Dispatch } from "../../../src/commands/command-gate.js";
import { ActionFailedError, PreconditionNotMetError, ValidationFailedError } from "../../../src/errors.js";
import { credentialsWithoutPin, silentLogger, testCredentials } from "../../utils/test-helpers.js";

function gateWith(credentials = testCredentials) {
  return new CommandGate({ credentials, logger: silentLogger() });
}

function dispatchReturning(result: Awaited<ReturnType<Dispatch>>) {
  return vi.fn<Dispatch>().mockResolvedValue(result);
}

describe("CommandGate", () => {
  describe("S-PIN precondition", () => {
    it.each(["lock", "unlock", "preheater-start", "preheater-stop"] as const)(
      "should refuse %s without an S-PIN and never dispatch",
      async (action) => {
        const gate = gateWith(credentialsWithoutPin);
        const dispatch = dispatchReturning(true);

        const run = gate.execute({ vehicleId: "WVWZZZ1KZAW000001", action, params: {} }, dispatch);

        await expect(run).rejects.toBeInstanceOf(PreconditionNotMetError);
        await expect(run).rejects.toThrow(`S-PIN required for ${action}`);
        expect(dispatch).not.toHaveBeenCalled();
      }
    );

    it("should allow actions without the PIN requirement when no S-PIN is set", async () => {
      const gate = gateWith(credentialsWithoutPin);
      const dispatch = dispatchReturning(true);

      const outcome = await gate.execute({ vehicleId: "VIN1", action: "climate-stop", params: {} }, dispatch);

      expect(outcome).toEqual({ status: "succeeded", action: "climate-stop" });
    });

    it("should honor a per-request PIN requirement", () => {
      const gate = gateWith(credentialsWithoutPin);

      expect(() => gate.check({ vehicleId: "VIN1", action: "refresh-data", params: {}, requiresPin: true })).toThrow(
        "S-PIN required for refresh-data"
      );
    });

    it("should keep the catalog requirement when a request opts out", async () => {
      const gate = gateWith(credentialsWithoutPin);
      const dispatch = dispatchReturning(true);

      await expect(
        gate.execute({ vehicleId: "VIN1", action: "lock", params: {}, requiresPin: false }, dispatch)
      ).rejects.toThrow(PreconditionNotMetError);
      expect(dispatch).not.toHaveBeenCalled();
    });

    it("should tell the dispatcher when the S-PIN is required", async () => {
      const gate = gateWith();
      const dispatch = dispatchReturning(true);

      await gate.execute({ vehicleId: "VIN1", action: "refresh-data", params: {}, requiresPin: true }, dispatch);
      await gate.execute({ vehicleId: "VIN1", action: "unlock", params: {}, requiresPin: false }, dispatch);
      await gate.execute({ vehicleId: "VIN1", action: "climate-stop", params: {} }, dispatch);

      expect(dispatch.mock.calls).toEqual([
        [{}, true],
        [{}, true],
        [{}, false],
      ]);
    });

    it("should report the missing requirement on the error", () => {
      const gate = gateWith(credentialsWithoutPin);

      try {
        gate.check({ vehicleId: "VIN1", action: "lock", params: {} });
        expect.unreachable("check should have thrown");
      } catch (err) {
        expect(err).toBeInstanceOf(PreconditionNotMetError);
        if (!(err instanceof PreconditionNotMetError)) return;
        expect(err.requirement).toBe("spin");
        expect(err.code).toBe("PRECONDITION_NOT_MET");
      }
    });
  });

  describe("parameter validation", () => {
    it.each([19, 101, 0])("should reject a charge target of %i", (target) => {
      const gate = gateWith();

      try {
        gate.check({ vehicleId: "VIN1", action: "set-charge-target", params: { target } });
        expect.unreachable("check should have thrown");
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationFailedError);
        if (!(err instanceof ValidationFailedError)) return;
        expect(err.issues).toEqual([{ field: "target", message: "Target charge must be between 20% and 100%" }]);
        expect(err.message).toBe(
          "Invalid parameters for set-charge-target: target: Target charge must be between 20% and 100%"
        );
      }
    });

    it.each([
      [20, 20],
      [100, 100],
      ["20", 20],
      ["85", 85],
    ])("should accept a charge target of %j", async (target, expected) => {
      const gate = gateWith();
      const dispatch = dispatchReturning(true);

      const outcome = await gate.execute(
        { vehicleId: "VIN1", action: "set-charge-target", params: { target } },
        dispatch
      );

      expect(outcome.status).toBe("succeeded");
      expect(dispatch).toHaveBeenCalledWith({ target: expected }, false);
    });

    it("should reject a non-numeric charge target", () => {
      const gate = gateWith();

      expect(() => gate.check({ vehicleId: "VIN1", action: "set-charge-target", params: { target: "full" } })).toThrow(
        "Invalid parameters for set-charge-target: target: Target charge must be a number"
      );
    });

    it("should reject an unknown charging mode without dispatching", async () => {
      const gate = gateWith();
      const dispatch = dispatchReturning(true);

      await expect(
        gate.execute({ vehicleId: "VIN1", action: "set-charging-mode", params: { mode: "eco" } }, dispatch)
      ).rejects.toThrow("Invalid parameters for set-charging-mode: mode: Mode must be 'manual' or 'timer'");
      expect(dispatch).not.toHaveBeenCalled();
    });

    it("should accept the timer charging mode", () => {
      const gate = gateWith();

      expect(gate.check({ vehicleId: "VIN1", action: "set-charging-mode", params: { mode: "timer" } })).toEqual({
        mode: "timer",
      });
    });

    it("should reject parameters an action does not take", () => {
      const gate = gateWith();

      try {
        gate.check({ vehicleId: "VIN1", action: "lock", params: { force: true } });
        expect.unreachable("check should have thrown");
      } catch (err) {
        expect(err).toBeInstanceOf(ValidationFailedError);
        if (!(err instanceof ValidationFailedError)) return;
        expect(err.issues).toEqual([{ field: "(params)", message: "Unrecognized key(s) in object: 'force'" }]);
      }
    });

    it("should apply climate defaults", () => {
      const gate = gateWith();

      expect(gate.check({ vehicleId: "VIN1", action: "climate-start", params: {} })).toEqual({
        tempC: 21,
        glassHeating: false,
        seatFL: false,
        seatFR: false,
        seatRL: false,
        seatRR: false,
        climatisationAtUnlock: false,
      });
    });

    it("should default the pre-heater duration to 30 minutes", () => {
      const gate = gateWith();

      expect(gate.check({ vehicleId: "VIN1", action: "preheater-start", params: {} })).toEqual({ duration: 30 });
    });

    it("should throw for an unknown action name", () => {
      const gate = gateWith();

      expect(() => gate.definition("teleport")).toThrow("Unknown action: teleport");
    });
  });

  describe("result classification", () => {
    it("should succeed on a true signal", async () => {
      const gate = gateWith();

      const outcome = await gate.execute({ vehicleId: "VIN1", action: "lock", params: {} }, dispatchReturning(true));

      expect(outcome).toEqual({ status: "succeeded", action: "lock" });
    });

    it("should fail with the catalog message on a false signal", async () => {
      const gate = gateWith();

      const outcome = await gate.execute(
        { vehicleId: "VIN1", action: "climate-start", params: {} },
        dispatchReturning(false)
      );

      expect(outcome.status).toBe("failed");
      if (outcome.status !== "failed") return;
      expect(outcome.error).toBeInstanceOf(ActionFailedError);
      expect(outcome.error.message).toBe("Failed to start climate control");
      expect(outcome.error.action).toBe("climate-start");
    });

    it("should report disabled for the refresh action", async () => {
      const gate = gateWith();

      const outcome = await gate.execute(
        { vehicleId: "VIN1", action: "refresh-data", params: {} },
        dispatchReturning("disabled")
      );

      expect(outcome).toEqual({ status: "disabled", action: "refresh-data" });
    });

    it("should treat disabled as a failure for other actions", async () => {
      const gate = gateWith();

      const outcome = await gate.execute({ vehicleId: "VIN1", action: "lock", params: {} }, dispatchReturning("disabled"));

      expect(outcome.status).toBe("failed");
      if (outcome.status !== "failed") return;
      expect(outcome.error.message).toBe("Failed to lock vehicle: service reported the action as disabled");
    });

    it("should turn a dispatch error into a failed outcome carrying the cause", async () => {
      const gate = gateWith();
      const cause = new Error("connection reset");
      const dispatch = vi.fn<Dispatch>().mockRejectedValue(cause);

      const outcome = await gate.execute({ vehicleId: "VIN1", action: "unlock", params: {} }, dispatch);

      expect(outcome.status).toBe("failed");
      if (outcome.status !== "failed") return;
      expect(outcome.error.message).toBe("Failed to unlock vehicle: connection reset");
      expect(outcome.error.cause).toBe(cause);
    });

    it("should give the same outcome when run twice", async () => {
      const gate = gateWith();
      const dispatch = dispatchReturning(true);
      const request = { vehicleId: "VIN1", action: "window-heating-start", params: {} } as const;

      const first = await gate.execute(request, dispatch);
      const second = await gate.execute(request, dispatch);

      expect(first).toEqual(second);
      expect(dispatch).toHaveBeenCalledTimes(2);
    });
  });
});
