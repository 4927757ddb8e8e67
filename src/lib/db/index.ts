export { createDatabase } from "./client";
export type { Database, DatabaseInstance } from "./client";
export { swapExecutions } from "./schema";
export { toJournalEntry, toJournalUpdate } from "./ports/swap-repository";
export type {
  SwapJournalEntry,
  SwapJournalUpdate,
  SwapRepository,
} from "./ports/swap-repository";
export { createInMemorySwapRepository } from "./adapters/memory/swap-repository";
export { createPostgresSwapRepository } from "./adapters/postgres/swap-repository";
