import { eq, sql } from "drizzle-orm";
import { isAddress } from "viem";

import { isSwapErrorCode } from "@/domains/swap/errors";
import { isSwapStatus } from "@/domains/swap/state";

import type { Database } from "../../client";
import type {
  SwapJournalEntry,
  SwapJournalUpdate,
  SwapRepository,
} from "../../ports/swap-repository";
import { swapExecutions } from "../../schema";

type SwapExecutionRow = typeof swapExecutions.$inferSelect;

const toAmount = (value: string | null): bigint | null => (value === null ? null : BigInt(value));

export const mapRowToEntry = (row: SwapExecutionRow): SwapJournalEntry => {
  const { caller, inputAsset, outputAsset, status, errorCode } = row;

  if (!isAddress(caller, { strict: false })) {
    throw new Error(`Invalid caller: ${caller}`);
  }
  if (!isAddress(inputAsset, { strict: false }) || !isAddress(outputAsset, { strict: false })) {
    throw new Error(`Invalid route: ${inputAsset} -> ${outputAsset}`);
  }
  if (!isSwapStatus(status)) {
    throw new Error(`Invalid swap status: ${status}`);
  }
  if (errorCode !== null && !isSwapErrorCode(errorCode)) {
    throw new Error(`Invalid swap error code: ${errorCode}`);
  }

  return {
    id: row.id,
    caller,
    inputAsset,
    outputAsset,
    amountIn: BigInt(row.amountIn),
    minimumAmountOut: BigInt(row.minimumAmountOut),
    submittedAtSec: row.submittedAtSec,
    status,
    amountOut: toAmount(row.amountOut),
    errorCode,
    errorMessage: row.errorMessage,
    reference: row.reference,
    createdAt: row.createdAt ?? new Date(),
    updatedAt: row.updatedAt ?? new Date(),
  };
};

export const mapEntryToRow = (entry: SwapJournalEntry): typeof swapExecutions.$inferInsert => ({
  id: entry.id,
  caller: entry.caller,
  inputAsset: entry.inputAsset,
  outputAsset: entry.outputAsset,
  amountIn: entry.amountIn.toString(),
  minimumAmountOut: entry.minimumAmountOut.toString(),
  submittedAtSec: entry.submittedAtSec,
  status: entry.status,
  amountOut: entry.amountOut?.toString() ?? null,
  errorCode: entry.errorCode,
  errorMessage: entry.errorMessage,
  reference: entry.reference,
  createdAt: entry.createdAt,
  updatedAt: entry.updatedAt,
});

const mapUpdateToRow = (updates: SwapJournalUpdate): Partial<typeof swapExecutions.$inferInsert> => ({
  status: updates.status,
  amountOut: updates.amountOut?.toString() ?? null,
  errorCode: updates.errorCode,
  errorMessage: updates.errorMessage,
  reference: updates.reference,
  updatedAt: updates.updatedAt,
});

export const createPostgresSwapRepository = (db: Database): SwapRepository => ({
  create: async (entry) => {
    const [inserted] = await db.insert(swapExecutions).values(mapEntryToRow(entry)).returning();
    if (!inserted) {
      throw new Error(`Failed to record swap ${entry.id}`);
    }
    return mapRowToEntry(inserted);
  },

  update: async (id, updates) => {
    const [updated] = await db
      .update(swapExecutions)
      .set(mapUpdateToRow(updates))
      .where(eq(swapExecutions.id, id))
      .returning();
    if (!updated) {
      throw new Error(`Swap ${id} not found`);
    }
    return mapRowToEntry(updated);
  },

  findById: async (id) => {
    const [row] = await db
      .select()
      .from(swapExecutions)
      .where(eq(swapExecutions.id, id))
      .limit(1);
    return row ? mapRowToEntry(row) : null;
  },

  ping: async () => {
    await db.execute(sql`SELECT 1`);
  },
});
