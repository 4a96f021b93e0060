import { beforeEach, describe, expect, it } from "vitest";
import type { User } from "@shared/schema";
import { MemStorage } from "../memStorage";
import { parseUsd } from "../lib/money";
import { InsufficientBalanceError } from "../lib/errors";
import {
  dailyWalkCap,
  listWalkLevels,
  submitSteps,
  upgradeCost,
  upgradeWalkLevel,
} from "../services/walkService";

const T0 = new Date("2026-03-01T12:00:00.000Z");
const NEXT_DAY = new Date("2026-03-02T00:00:01.000Z");

async function reload(store: MemStorage, chatId: number): Promise<User> {
  const user = await store.getUser(chatId);
  if (!user) throw new Error(`user ${chatId} missing`);
  return user;
}

describe("walk & earn", () => {
  let store: MemStorage;

  beforeEach(async () => {
    store = new MemStorage();
    await store.createUser({ chatId: 9, username: "walker" }, T0);
  });

  it("earns the level rate per step", async () => {
    const result = await submitSteps(store, await reload(store, 9), 300, T0);

    expect(result).toEqual({
      earned_usd: "0.3000",
      balance_usd: "0.3000",
      balance_ngn: "300.00",
      total_steps: 300,
      cap_reached: false,
    });
    expect(await reload(store, 9)).toMatchObject({ stepsCreditedOn: "2026-03-01", stepsUsdToday: "0.3000" });
  });

  it("stops at the daily cap", async () => {
    await submitSteps(store, await reload(store, 9), 300, T0);
    const capped = await submitSteps(store, await reload(store, 9), 800, T0);
    expect(capped.earned_usd).toBe("0.7000");
    expect(capped.cap_reached).toBe(true);

    const after = await submitSteps(store, await reload(store, 9), 100, T0);
    expect(after).toMatchObject({ earned_usd: "0.0000", balance_usd: "1.0000", total_steps: 1100, cap_reached: true });
  });

  it("resets the counter on a new UTC day", async () => {
    await submitSteps(store, await reload(store, 9), 1_000, T0);
    const result = await submitSteps(store, await reload(store, 9), 100, NEXT_DAY);

    expect(result.earned_usd).toBe("0.1000");
    expect(result.balance_usd).toBe("1.1000");
    expect(await reload(store, 9)).toMatchObject({ stepsCreditedOn: "2026-03-02", stepsUsdToday: "0.1000" });
  });

  it("rejects non-positive step counts", async () => {
    await expect(submitSteps(store, await reload(store, 9), 0, T0)).rejects.toThrow("steps must be positive");
  });

  it("sums the price of every level passed", () => {
    expect(upgradeCost(1, 2)).toBe(parseUsd("5.00"));
    expect(upgradeCost(1, 3)).toBe(parseUsd("20.00"));
    expect(upgradeCost(2, 4)).toBe(parseUsd("55.00"));
  });

  it("refuses an upgrade the balance cannot cover", async () => {
    const attempt = upgradeWalkLevel(store, await reload(store, 9), 3);

    await expect(attempt).rejects.toBeInstanceOf(InsufficientBalanceError);
    await expect(attempt).rejects.toMatchObject({ details: { required_usd: "20.0000" } });
    expect((await reload(store, 9)).walkLevel).toBe(1);
  });

  it("debits the cost and raises rate, cap and energy regeneration", async () => {
    await store.recordTransaction({ chatId: 9, type: "deposit", status: "completed", amountUsd: parseUsd("25.00") });

    const result = await upgradeWalkLevel(store, await reload(store, 9), 3);
    expect(result).toEqual({
      balance_usd: "5.0000",
      balance_ngn: "5000.00",
      walk_level: 3,
      walk_rate: "0.0050",
      energy_regen_per_sec: "0.28",
    });

    const upgraded = await reload(store, 9);
    expect(dailyWalkCap(upgraded)).toBe(parseUsd("5.00"));
    const [entry] = await store.getUserTransactions(9, 1);
    expect(entry).toMatchObject({ type: "upgrade", amountUsd: "-20.0000", meta: { from: 1, to: 3 } });
  });

  it("keeps concurrent step submissions within the daily cap", async () => {
    const user = await reload(store, 9);

    const results = await Promise.all([
      submitSteps(store, user, 1_000, T0),
      submitSteps(store, user, 1_000, T0),
    ]);

    expect(results.map((r) => r.earned_usd)).toEqual(["1.0000", "0.0000"]);
    expect(results[1]).toMatchObject({ balance_usd: "1.0000", cap_reached: true });
    expect((await reload(store, 9)).balanceUsd).toBe("1.0000");
    expect(await store.getUserTransactions(9, 10)).toHaveLength(1);
  });

  it("charges a contested upgrade once", async () => {
    await store.recordTransaction({ chatId: 9, type: "deposit", status: "completed", amountUsd: parseUsd("20.00") });
    const user = await reload(store, 9);

    const results = await Promise.allSettled([
      upgradeWalkLevel(store, user, 2),
      upgradeWalkLevel(store, user, 2),
    ]);

    expect(results[0]).toMatchObject({ status: "fulfilled", value: { walk_level: 2, balance_usd: "15.0000" } });
    expect(results[1]).toMatchObject({
      status: "rejected",
      reason: expect.objectContaining({ message: "Target must be higher than current level" }),
    });
    expect((await reload(store, 9)).balanceUsd).toBe("15.0000");
  });

  it("prices an upgrade from the level a concurrent upgrade reached", async () => {
    await store.recordTransaction({ chatId: 9, type: "deposit", status: "completed", amountUsd: parseUsd("25.00") });
    const user = await reload(store, 9);

    const [toTwo, toThree] = await Promise.all([
      upgradeWalkLevel(store, user, 2),
      upgradeWalkLevel(store, user, 3),
    ]);

    expect(toTwo.balance_usd).toBe("20.0000");
    expect(toThree).toMatchObject({ walk_level: 3, balance_usd: "5.0000" });
    const [last] = await store.getUserTransactions(9, 1);
    expect(last).toMatchObject({ type: "upgrade", amountUsd: "-15.0000", meta: { from: 2, to: 3 } });
  });

  it("rejects upgrades that do not move up to a known level", async () => {
    const user = await reload(store, 9);
    await expect(upgradeWalkLevel(store, user, 1)).rejects.toThrow("Target must be higher than current level");
    await expect(upgradeWalkLevel(store, user, 9)).rejects.toThrow("Invalid level");
  });

  it("lists the level table", () => {
    expect(listWalkLevels()[3]).toEqual({
      level: 4,
      rate_usd_per_step: "0.0100",
      price_usd: "40.0000",
      daily_cap_usd: "10.0000",
    });
  });
});
