import { describe, expect, it } from "vitest";

import type { SwapJournalEntry } from "../../ports/swap-repository";
import { createInMemorySwapRepository } from "./swap-repository";

const pending: SwapJournalEntry = {
  id: "4f1c2d3e-0000-4000-8000-000000000001",
  caller: "0x1000000000000000000000000000000000000001",
  inputAsset: "0x2000000000000000000000000000000000000002",
  outputAsset: "0x3000000000000000000000000000000000000003",
  amountIn: 1000n,
  minimumAmountOut: 985n,
  submittedAtSec: 1_700_000_000n,
  status: "PENDING",
  amountOut: null,
  errorCode: null,
  errorMessage: null,
  reference: null,
  createdAt: new Date("2024-01-01T00:00:00Z"),
  updatedAt: new Date("2024-01-01T00:00:00Z"),
};

describe("createInMemorySwapRepository", () => {
  it("should return what was created", async () => {
    const repository = createInMemorySwapRepository();

    await repository.create(pending);

    expect(await repository.findById(pending.id)).toEqual(pending);
  });

  it("should refuse to record the same swap twice", async () => {
    const repository = createInMemorySwapRepository();
    await repository.create(pending);

    await expect(repository.create(pending)).rejects.toThrow(`Swap ${pending.id} already recorded`);
  });

  it("should apply the terminal update", async () => {
    const repository = createInMemorySwapRepository();
    await repository.create(pending);
    const updatedAt = new Date("2024-01-01T00:00:05Z");

    const updated = await repository.update(pending.id, {
      status: "SETTLED",
      amountOut: 990n,
      errorCode: null,
      errorMessage: null,
      reference: null,
      updatedAt,
    });

    expect(updated).toEqual({ ...pending, status: "SETTLED", amountOut: 990n, updatedAt });
    expect(await repository.findById(pending.id)).toEqual(updated);
  });

  it("should fail to update an unknown swap", async () => {
    const repository = createInMemorySwapRepository();

    await expect(
      repository.update("missing", {
        status: "ABORTED",
        amountOut: null,
        errorCode: "EXPIRED",
        errorMessage: "Swap expired at 1",
        reference: null,
        updatedAt: new Date(),
      }),
    ).rejects.toThrow("Swap missing not found");
  });

  it("should not leak internal state through returned entries", async () => {
    const repository = createInMemorySwapRepository();
    const created = await repository.create(pending);

    created.status = "ABORTED";

    expect((await repository.findById(pending.id))?.status).toBe("PENDING");
  });

  it("should return null for an unknown id", async () => {
    expect(await createInMemorySwapRepository().findById("missing")).toBeNull();
  });
});
