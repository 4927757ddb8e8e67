import { bigint, index, numeric, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

// Token amounts are uint256; numeric(78, 0) holds every value.
const amount = (name: string) => numeric(name, { precision: 78, scale: 0 });

export const swapExecutions = pgTable(
  "swap_executions",
  {
    id: uuid("id").primaryKey(),
    caller: text("caller").notNull(),
    inputAsset: text("input_asset").notNull(),
    outputAsset: text("output_asset").notNull(),
    amountIn: amount("amount_in").notNull(),
    minimumAmountOut: amount("minimum_amount_out").notNull(),
    submittedAtSec: bigint("submitted_at_sec", { mode: "bigint" }).notNull(),
    status: text("status").notNull(), // 'PENDING' | 'SETTLED' | 'ABORTED'
    amountOut: amount("amount_out"),
    errorCode: text("error_code"),
    errorMessage: text("error_message"),
    reference: text("reference"),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow(),
  },
  (table) => ({
    callerIdx: index("idx_swap_executions_caller").on(table.caller),
    statusIdx: index("idx_swap_executions_status").on(table.status),
  }),
);
