import { BaseError, ContractFunctionRevertedError, HttpRequestError } from "viem";
import { describe, expect, it } from "vitest";

import { describeError, getRevertDetails, isTransportError, revertMatches } from "./errors";

const revert = (message: string): BaseError =>
  new BaseError("Contract call failed", {
    cause: new ContractFunctionRevertedError({
      abi: [],
      functionName: "swapExactTokensForTokens",
      message,
    }),
  });

describe("getRevertDetails", () => {
  it("extracts the require reason from a wrapped revert", () => {
    expect(getRevertDetails(revert("UniswapV2Router: EXPIRED"))).toEqual({
      reason: "UniswapV2Router: EXPIRED",
    });
  });

  it("returns null for errors that are not reverts", () => {
    expect(getRevertDetails(new Error("plain"))).toBeNull();
    expect(getRevertDetails(new BaseError("no cause"))).toBeNull();
  });
});

describe("revertMatches", () => {
  it("matches needles against reason and error name, ignoring case", () => {
    expect(
      revertMatches({ reason: "UniswapV2Router: INSUFFICIENT_OUTPUT_AMOUNT" }, [
        "insufficient_output",
      ]),
    ).toBe(true);
    expect(revertMatches({ errorName: "ERC20InsufficientAllowance" }, ["allowance"])).toBe(true);
    expect(revertMatches({ reason: "UniswapV2Router: EXPIRED" }, ["allowance"])).toBe(false);
  });
});

describe("isTransportError", () => {
  it("detects an HTTP failure anywhere in the cause chain", () => {
    const error = new BaseError("Request failed", {
      cause: new HttpRequestError({ url: "http://127.0.0.1:8545", status: 502 }),
    });
    expect(isTransportError(error)).toBe(true);
  });

  it("does not treat reverts as transport failures", () => {
    expect(isTransportError(revert("UniswapV2Router: EXPIRED"))).toBe(false);
    expect(isTransportError(new Error("plain"))).toBe(false);
  });
});

describe("describeError", () => {
  it("uses viem's short message when available", () => {
    expect(describeError(new BaseError("Short message"))).toBe("Short message");
    expect(describeError(new Error("plain"))).toBe("plain");
    expect(describeError("text")).toBe("text");
  });
});
