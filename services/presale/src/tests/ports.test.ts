/**
 * Port Adapter Tests
 */

import { describe, it, expect } from "vitest";
import { AdminIdentityPolicy, PrincipalSetPolicy, isPrivilegedAction } from "../ports/authorization.js";
import { ManualClock, SystemClock } from "../ports/clock.js";
import { InMemoryStateStore, cloneEngineState } from "../ports/state-store.js";
import { InMemoryTokenLedger } from "../ports/token-ledger.js";
import type { EngineState, PresaleState } from "../types.js";

const presale: PresaleState = {
  isActive: true,
  endTime: undefined,
  launchTime: undefined,
  admin: "admin",
  liquidityLocked: false,
  liquidityLockEndTime: undefined,
};

describe("InMemoryTokenLedger", () => {
  it("should apply a batch in order", async () => {
    const ledger = new InMemoryTokenLedger();

    await ledger.execute([
      { kind: "mint", asset: "tok", to: "a", amount: 100n },
      { kind: "transfer", asset: "tok", from: "a", to: "b", amount: 60n },
      { kind: "burn", asset: "tok", holder: "b", amount: 10n },
    ]);

    expect(await ledger.balanceOf({ owner: "a", asset: "tok" })).toBe(40n);
    expect(await ledger.balanceOf({ owner: "b", asset: "tok" })).toBe(50n);
    expect(ledger.totalSupply("tok")).toBe(90n);
  });

  it("should leave every balance untouched when any instruction fails", async () => {
    const ledger = new InMemoryTokenLedger();
    await ledger.execute([{ kind: "mint", asset: "tok", to: "a", amount: 100n }]);

    await expect(
      ledger.execute([
        { kind: "transfer", asset: "tok", from: "a", to: "b", amount: 50n },
        { kind: "transfer", asset: "tok", from: "a", to: "c", amount: 51n },
      ])
    ).rejects.toMatchObject({ code: "LedgerRejected", details: { instructionIndex: 1 } });

    expect(await ledger.balanceOf({ owner: "a", asset: "tok" })).toBe(100n);
    expect(await ledger.balanceOf({ owner: "b", asset: "tok" })).toBe(0n);
  });

  it("should leave supply untouched when a burn is rejected", async () => {
    const ledger = new InMemoryTokenLedger();
    await ledger.execute([{ kind: "mint", asset: "tok", to: "a", amount: 10n }]);

    await expect(
      ledger.execute([{ kind: "burn", asset: "tok", holder: "a", amount: 11n }])
    ).rejects.toMatchObject({ code: "LedgerRejected", details: { instructionIndex: 0 } });

    expect(ledger.totalSupply("tok")).toBe(10n);
    await ledger.execute([{ kind: "burn", asset: "tok", holder: "a", amount: 10n }]);
    expect(ledger.totalSupply("tok")).toBe(0n);
  });

  it("should keep assets separate", async () => {
    const ledger = new InMemoryTokenLedger();
    await ledger.execute([{ kind: "mint", asset: "native", to: "a", amount: 5n }]);

    expect(await ledger.balanceOf({ owner: "a", asset: "tok" })).toBe(0n);
  });

  it("should treat a transfer to the same holding as a no-op", async () => {
    const ledger = new InMemoryTokenLedger();
    await ledger.execute([{ kind: "mint", asset: "tok", to: "a", amount: 5n }]);

    await ledger.execute([{ kind: "transfer", asset: "tok", from: "a", to: "a", amount: 5n }]);

    expect(await ledger.balanceOf({ owner: "a", asset: "tok" })).toBe(5n);
  });
});

describe("clocks", () => {
  it("should refuse to move a manual clock backwards", () => {
    const clock = new ManualClock(100);
    clock.advance(5);

    expect(clock.now()).toBe(105);
    expect(() => clock.set(104)).toThrow("ManualClock cannot move backwards (104 < 105)");
  });

  it("should report system time in whole seconds", () => {
    const clock = new SystemClock();
    const now = clock.now();

    expect(Number.isInteger(now)).toBe(true);
    expect(clock.now()).toBeGreaterThanOrEqual(now);
  });
});

describe("InMemoryStateStore", () => {
  it("should hand out copies that do not alias committed state", async () => {
    const store = new InMemoryStateStore();
    const draft = await store.read();
    draft.stakes.set("a", { amount: 5n, startTime: 1, lastClaimTime: 1 });

    expect((await store.read()).stakes.size).toBe(0);

    await store.commit(draft);
    const account = draft.stakes.get("a");
    if (account) account.amount = 99n;

    expect((await store.read()).stakes.get("a")?.amount).toBe(5n);
    expect(store.getVersion()).toBe(1);
  });

  it("should deep copy nested records", () => {
    const state: EngineState = {
      presale: { ...presale },
      stages: [{ stage: 1, price: 1n, tokensSold: 1n, totalRaised: 1n }],
      stakes: new Map(),
    };

    const copy = cloneEngineState(state);
    copy.stages?.splice(0, 1);
    if (copy.presale) copy.presale.isActive = false;

    expect(state.stages).toHaveLength(1);
    expect(state.presale?.isActive).toBe(true);
  });
});

describe("authorization policies", () => {
  it("should admit only the recorded admin by default", () => {
    const policy = new AdminIdentityPolicy();

    expect(policy.authorize("admin", "burnTokens", presale)).toEqual({ allowed: true });
    expect(policy.authorize("bob", "burnTokens", presale)).toEqual({
      allowed: false,
      reason: "Caller is not the presale admin",
    });
  });

  it("should scope per-action principals", () => {
    const policy = new PrincipalSetPolicy({
      principals: ["ops"],
      perAction: { withdrawFunds: ["finance"] },
    });

    expect(policy.authorize("ops", "endPresale", presale).allowed).toBe(true);
    expect(policy.authorize("finance", "withdrawFunds", presale).allowed).toBe(true);
    expect(policy.authorize("finance", "burnTokens", presale).allowed).toBe(false);
    expect(policy.authorize("admin", "burnTokens", presale).allowed).toBe(false);
  });

  it("should recognise privileged action names", () => {
    expect(isPrivilegedAction("withdrawFunds")).toBe(true);
    expect(isPrivilegedAction("stake")).toBe(false);
  });
});
