import { describe, expect, it, vi } from "vitest";

import { RollbackFailedError } from "@/domains/swap/errors";
import type { Logger } from "@/lib/logger/logger";

import { runAtomically } from "./compensation";

const createMockLogger = (): Logger => {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(() => logger),
  };
  return logger;
};

describe("runAtomically", () => {
  it("should return the work's result without running any undo", async () => {
    const undo = vi.fn().mockResolvedValue(undefined);

    const result = await runAtomically(async (scope) => {
      scope.record("step", undo);
      return 42;
    }, createMockLogger());

    expect(result).toBe(42);
    expect(undo).not.toHaveBeenCalled();
  });

  it("should undo recorded steps newest first and re-throw the failure", async () => {
    const order: string[] = [];
    const failure = new Error("settlement refused");

    const run = runAtomically(async (scope) => {
      scope.record("first", async () => {
        order.push("first");
      });
      scope.record("second", async () => {
        order.push("second");
      });
      throw failure;
    }, createMockLogger());

    await expect(run).rejects.toBe(failure);
    expect(order).toEqual(["second", "first"]);
  });

  it("should re-throw untouched when nothing was recorded", async () => {
    const logger = createMockLogger();

    await expect(
      runAtomically(async () => {
        throw new Error("boom");
      }, logger),
    ).rejects.toThrow("boom");

    expect(logger.info).not.toHaveBeenCalled();
    expect(logger.error).not.toHaveBeenCalled();
  });

  it("should keep undoing after an undo fails and report all failures", async () => {
    const logger = createMockLogger();
    const failure = new Error("settlement refused");
    const undoError = new Error("ledger offline");
    const first = vi.fn().mockResolvedValue(undefined);

    let caught: unknown;
    try {
      await runAtomically(async (scope) => {
        scope.record("first", first);
        scope.record("second", () => Promise.reject(undoError));
        throw failure;
      }, logger);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(RollbackFailedError);
    expect(caught).toHaveProperty("failure", failure);
    expect(caught).toHaveProperty("rollbackErrors", [{ step: "second", error: undoError }]);
    expect(caught).toHaveProperty("message", "Rollback failed at second");
    expect(first).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith("Compensation failed", undoError, { step: "second" });
  });
});
