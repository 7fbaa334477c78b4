/**
 * Tests for ViemL1BlockSource with a mocked viem client.
 */

import { describe, it, expect, vi } from "vitest";
import {
  ViemL1BlockSource,
  createViemL1BlockSource,
  type BlockReader,
} from "../../src/l1/viem-source.js";

function makeClient(block: Awaited<ReturnType<BlockReader["getBlock"]>>) {
  return { getBlock: vi.fn().mockResolvedValue(block) };
}

const block12 = {
  hash: "0x12aa",
  number: 12n,
  parentHash: "0x11aa",
  timestamp: 1_700_000_144n,
} as const;

describe("ViemL1BlockSource", () => {
  it("maps a viem block to an L1 reference", async () => {
    const client = makeClient(block12);
    const source = new ViemL1BlockSource(client);

    const ref = await source.l1BlockRefByNumber(12);

    expect(ref).toEqual({
      hash: "0x12aa",
      number: 12,
      parentHash: "0x11aa",
      timestamp: 1_700_000_144,
    });
    expect(client.getBlock).toHaveBeenCalledWith({ blockNumber: 12n });
  });

  it("rejects a pending block", async () => {
    const source = new ViemL1BlockSource(makeClient({ ...block12, hash: null }));

    await expect(source.l1BlockRefByNumber(12)).rejects.toThrow(
      "ViemL1BlockSource: block 12 is still pending",
    );
  });

  it("rejects a block at the wrong height", async () => {
    const source = new ViemL1BlockSource(makeClient({ ...block12, number: 13n }));

    await expect(source.l1BlockRefByNumber(12)).rejects.toThrow(
      "ViemL1BlockSource: asked for block 12, RPC returned 13",
    );
  });

  it("rejects a block whose timestamp is not a safe integer", async () => {
    const source = new ViemL1BlockSource(makeClient({ ...block12, timestamp: 2n ** 60n }));

    await expect(source.l1BlockRefByNumber(12)).rejects.toThrow(
      "ViemL1BlockSource: block 12 has fields outside the safe integer range",
    );
  });

  it("propagates RPC errors", async () => {
    const client = { getBlock: vi.fn().mockRejectedValue(new Error("HTTP 503")) };
    const source = new ViemL1BlockSource(client);

    await expect(source.l1BlockRefByNumber(12)).rejects.toThrow("HTTP 503");
  });

  it("does not call the RPC when already aborted", async () => {
    const client = makeClient(block12);
    const source = new ViemL1BlockSource(client);
    const controller = new AbortController();
    controller.abort(new Error("shutting down"));

    await expect(source.l1BlockRefByNumber(12, controller.signal)).rejects.toThrow(
      "shutting down",
    );
    expect(client.getBlock).not.toHaveBeenCalled();
  });

  it("rejects as soon as the signal aborts mid-request", async () => {
    const client = { getBlock: vi.fn(() => new Promise<typeof block12>(() => {})) };
    const source = new ViemL1BlockSource(client);
    const controller = new AbortController();

    const pending = source.l1BlockRefByNumber(12, controller.signal);
    controller.abort(new Error("deadline exceeded"));

    await expect(pending).rejects.toThrow("deadline exceeded");
  });

  it("uses a generic reason when the abort reason is not an Error", async () => {
    const client = { getBlock: vi.fn(() => new Promise<typeof block12>(() => {})) };
    const source = new ViemL1BlockSource(client);
    const controller = new AbortController();

    const pending = source.l1BlockRefByNumber(12, controller.signal);
    controller.abort("stop");

    await expect(pending).rejects.toThrow("L1 block lookup aborted");
  });

  it("resolves normally with a signal that never aborts", async () => {
    const source = new ViemL1BlockSource(makeClient(block12));
    const controller = new AbortController();

    await expect(source.l1BlockRefByNumber(12, controller.signal)).resolves.toMatchObject({
      number: 12,
    });
  });
});

describe("createViemL1BlockSource", () => {
  it("builds a source without touching the network", () => {
    const source = createViemL1BlockSource({ rpcUrl: "http://127.0.0.1:8545" });

    expect(source).toBeInstanceOf(ViemL1BlockSource);
  });
});
