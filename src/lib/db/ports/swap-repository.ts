import type { SwapErrorCode } from "@/domains/swap/errors";
import type { SwapExecution, SwapStatus } from "@/domains/swap/state";
import type { AssetId, PartyId } from "@/domains/swap/types";

/** One invocation as recorded in the swap journal. */
export interface SwapJournalEntry {
  id: string;
  caller: PartyId;
  inputAsset: AssetId;
  outputAsset: AssetId;
  amountIn: bigint;
  minimumAmountOut: bigint;
  submittedAtSec: bigint;
  status: SwapStatus;
  amountOut: bigint | null;
  errorCode: SwapErrorCode | null;
  errorMessage: string | null;
  reference: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type SwapJournalUpdate = Pick<
  SwapJournalEntry,
  "status" | "amountOut" | "errorCode" | "errorMessage" | "reference" | "updatedAt"
>;

/**
 * Audit trail of swap invocations. Written as a swap is accepted and again
 * when it finishes; nothing in execution reads it back.
 */
export interface SwapRepository {
  create(entry: SwapJournalEntry): Promise<SwapJournalEntry>;
  update(id: string, updates: SwapJournalUpdate): Promise<SwapJournalEntry>;
  findById(id: string): Promise<SwapJournalEntry | null>;
  /** Cheap round trip used by health checks. */
  ping(): Promise<void>;
}

export const toJournalEntry = (execution: SwapExecution): SwapJournalEntry => {
  const { request, outcome } = execution;
  return {
    id: request.id,
    caller: request.caller,
    inputAsset: request.inputAsset,
    outputAsset: request.outputAsset,
    amountIn: request.amountIn,
    minimumAmountOut: request.minimumAmountOut,
    submittedAtSec: request.submittedAtSec,
    status: execution.status,
    amountOut: outcome?.amountOut ?? null,
    errorCode: execution.errorCode,
    errorMessage: execution.errorMessage,
    reference: outcome?.reference ?? null,
    createdAt: execution.createdAt,
    updatedAt: execution.updatedAt,
  };
};

export const toJournalUpdate = (execution: SwapExecution): SwapJournalUpdate => {
  const { status, amountOut, errorCode, errorMessage, reference, updatedAt } =
    toJournalEntry(execution);
  return { status, amountOut, errorCode, errorMessage, reference, updatedAt };
};
