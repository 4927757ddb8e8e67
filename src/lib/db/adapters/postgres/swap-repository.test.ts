import { describe, expect, it, vi } from "vitest";

import type { Database } from "../../client";
import type { SwapJournalEntry } from "../../ports/swap-repository";
import { createPostgresSwapRepository, mapEntryToRow, mapRowToEntry } from "./swap-repository";

const settled: SwapJournalEntry = {
  id: "4f1c2d3e-0000-4000-8000-000000000001",
  caller: "0x1000000000000000000000000000000000000001",
  inputAsset: "0x2000000000000000000000000000000000000002",
  outputAsset: "0x3000000000000000000000000000000000000003",
  amountIn: 1000n,
  minimumAmountOut: 985n,
  submittedAtSec: 1_700_000_000n,
  status: "SETTLED",
  amountOut: 990n,
  errorCode: null,
  errorMessage: null,
  reference: "0xabc",
  createdAt: new Date("2024-01-01T00:00:00Z"),
  updatedAt: new Date("2024-01-01T00:00:05Z"),
};

const row = {
  id: settled.id,
  caller: settled.caller,
  inputAsset: settled.inputAsset,
  outputAsset: settled.outputAsset,
  amountIn: "1000",
  minimumAmountOut: "985",
  submittedAtSec: 1_700_000_000n,
  status: "SETTLED",
  amountOut: "990",
  errorCode: null,
  errorMessage: null,
  reference: "0xabc",
  createdAt: settled.createdAt,
  updatedAt: settled.updatedAt,
};

describe("swap journal row mapping", () => {
  it("should store amounts as decimal strings", () => {
    expect(mapEntryToRow(settled)).toEqual(row);
  });

  it("should read a stored row back into an entry", () => {
    expect(mapRowToEntry(row)).toEqual(settled);
  });

  it("should keep amounts beyond 64 bits exact", () => {
    const large = 2n ** 200n + 1n;

    const entry = mapRowToEntry({ ...row, amountIn: large.toString() });

    expect(entry.amountIn).toBe(large);
  });

  it("should reject an unknown status", () => {
    expect(() => mapRowToEntry({ ...row, status: "FILLED" })).toThrow(
      "Invalid swap status: FILLED",
    );
  });

  it("should reject an unknown error code", () => {
    expect(() => mapRowToEntry({ ...row, status: "ABORTED", errorCode: "TIMEOUT" })).toThrow(
      "Invalid swap error code: TIMEOUT",
    );
  });

  it("should reject a malformed caller", () => {
    expect(() => mapRowToEntry({ ...row, caller: "alice" })).toThrow("Invalid caller: alice");
  });
});

describe("createPostgresSwapRepository", () => {
  it("should ping with a trivial query", async () => {
    const execute = vi.fn().mockResolvedValue(undefined);
    const repository = createPostgresSwapRepository({ execute } as unknown as Database);

    await repository.ping();

    expect(execute).toHaveBeenCalledTimes(1);
  });

  it("should surface a failing ping", async () => {
    const execute = vi.fn().mockRejectedValue(new Error("Connection failed"));
    const repository = createPostgresSwapRepository({ execute } as unknown as Database);

    await expect(repository.ping()).rejects.toThrow("Connection failed");
  });

  it("should insert the mapped row and return the stored entry", async () => {
    const returning = vi.fn().mockResolvedValue([row]);
    const values = vi.fn().mockReturnValue({ returning });
    const insert = vi.fn().mockReturnValue({ values });
    const repository = createPostgresSwapRepository({ insert } as unknown as Database);

    expect(await repository.create(settled)).toEqual(settled);
    expect(values).toHaveBeenCalledWith(row);
  });

  it("should report an update that matched nothing", async () => {
    const returning = vi.fn().mockResolvedValue([]);
    const where = vi.fn().mockReturnValue({ returning });
    const set = vi.fn().mockReturnValue({ where });
    const update = vi.fn().mockReturnValue({ set });
    const repository = createPostgresSwapRepository({ update } as unknown as Database);

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
});
