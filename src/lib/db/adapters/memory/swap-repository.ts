import type {
  SwapJournalEntry,
  SwapJournalUpdate,
  SwapRepository,
} from "../../ports/swap-repository";

/** Journal kept in process memory, used when no database is configured. */
export const createInMemorySwapRepository = (): SwapRepository => {
  const entries = new Map<string, SwapJournalEntry>();

  return {
    create: async (entry) => {
      if (entries.has(entry.id)) {
        throw new Error(`Swap ${entry.id} already recorded`);
      }
      entries.set(entry.id, { ...entry });
      return { ...entry };
    },

    update: async (id, updates: SwapJournalUpdate) => {
      const existing = entries.get(id);
      if (!existing) {
        throw new Error(`Swap ${id} not found`);
      }
      const updated = { ...existing, ...updates };
      entries.set(id, updated);
      return { ...updated };
    },

    findById: async (id) => {
      const entry = entries.get(id);
      return entry ? { ...entry } : null;
    },

    ping: async () => {},
  };
};
