/**
 * Compensating-transaction envelope.
 *
 * Steps register an undo as soon as their effect is in place. When the work
 * fails, the undos run newest first and the original failure is re-thrown.
 * An undo that fails does not stop the others; the envelope then throws
 * RollbackFailedError with every undo failure attached, since balances may no
 * longer match the before-state.
 */

import { RollbackFailedError } from "@/domains/swap/errors";
import { type Logger, toError } from "@/lib/logger/logger";

import type { CompensationAction, CompensationScope } from "./types";

interface RecordedStep {
  step: string;
  undo: CompensationAction;
}

export const runAtomically = async <T>(
  work: (scope: CompensationScope) => Promise<T>,
  logger: Logger,
): Promise<T> => {
  const steps: RecordedStep[] = [];
  const scope: CompensationScope = {
    record: (step, undo) => {
      steps.push({ step, undo });
    },
  };

  try {
    return await work(scope);
  } catch (failure) {
    const rollbackErrors: { step: string; error: unknown }[] = [];

    for (const { step, undo } of [...steps].reverse()) {
      try {
        await undo();
        logger.info("Compensation applied", { step });
      } catch (error) {
        logger.error("Compensation failed", toError(error), { step });
        rollbackErrors.push({ step, error });
      }
    }

    if (rollbackErrors.length > 0) {
      const rollbackFailure = new RollbackFailedError(failure, rollbackErrors);
      logger.error("Rollback incomplete, balances may differ from before", rollbackFailure, {
        failedSteps: rollbackErrors.map((item) => item.step),
      });
      throw rollbackFailure;
    }

    throw failure;
  }
};
