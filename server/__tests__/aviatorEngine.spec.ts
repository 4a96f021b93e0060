import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { MemStorage } from "../memStorage";
import { AviatorEngine } from "../services/aviatorEngine";
import type { AviatorTiming } from "../config";
import { parseUsd } from "../lib/money";

const timing: AviatorTiming = {
  roundDurationMs: 20_000,
  gapMs: 10_000,
  growthPerSec: 0.25,
  errorPauseMs: 1_000,
};

const T0 = new Date("2026-03-01T12:00:00.000Z");

describe("AviatorEngine", () => {
  let store: MemStorage;
  let engine: AviatorEngine | undefined;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    store = new MemStorage();
  });

  afterEach(async () => {
    await engine?.stop();
    engine = undefined;
    vi.useRealTimers();
  });

  it("runs a round until its crash point, then pauses for the gap", async () => {
    // 0.5 lands in the low tier and in its middle: 2.05x, reached after 4.2s.
    engine = new AviatorEngine(store, timing, { random: () => 0.5 });
    engine.start();
    await vi.advanceTimersByTimeAsync(0);

    const first = await store.getActiveRound();
    expect(first?.id).toBe(1);
    expect(first?.crashMultiplier).toBe("2.05");
    expect(first?.growthPerSec).toBe("0.250000");
    expect(first?.startTime.getTime()).toBe(T0.getTime());

    await vi.advanceTimersByTimeAsync(4_199);
    expect((await store.getRound(1))?.status).toBe("active");

    await vi.advanceTimersByTimeAsync(1);
    const crashed = await store.getRound(1);
    expect(crashed?.status).toBe("crashed");
    expect(crashed?.crashedAt?.getTime()).toBe(T0.getTime() + 4_200);
    expect(await store.getActiveRound()).toBeUndefined();

    await vi.advanceTimersByTimeAsync(9_999);
    expect(await store.getActiveRound()).toBeUndefined();

    await vi.advanceTimersByTimeAsync(1);
    expect((await store.getActiveRound())?.id).toBe(2);
  });

  it("ends a round at the configured duration when the crash point is further out", async () => {
    const random = vi.fn<() => number>().mockReturnValueOnce(0.99).mockReturnValue(0.5);
    engine = new AviatorEngine(store, timing, { random });
    engine.start();
    await vi.advanceTimersByTimeAsync(0);

    expect((await store.getActiveRound())?.crashMultiplier).toBe("30.00");

    await vi.advanceTimersByTimeAsync(19_999);
    expect((await store.getRound(1))?.status).toBe("active");

    await vi.advanceTimersByTimeAsync(1);
    expect((await store.getRound(1))?.status).toBe("crashed");
    // 1.00 + 0.25 × 20s, not the sampled 30.00.
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("round 1 crashed at 6.00x (0/0 bets lost)"));
  });

  it("closes rounds left active by a previous process on start", async () => {
    await store.createRound({ startTime: T0, crashMultiplier: "5.00", growthPerSec: "0.250000" }, "active");

    engine = new AviatorEngine(store, timing, { random: () => 0.5 });
    engine.start();
    await vi.advanceTimersByTimeAsync(0);

    expect((await store.getRound(1))?.status).toBe("crashed");
    expect((await store.getActiveRound())?.id).toBe(2);
  });

  it("ignores repeated start calls", async () => {
    engine = new AviatorEngine(store, timing, { random: () => 0.5 });
    engine.start();
    engine.start();
    await vi.advanceTimersByTimeAsync(0);

    expect((await store.getLatestRound())?.id).toBe(1);
    expect(engine.isRunning).toBe(true);
  });

  it("logs a failed cycle and retries after the error pause", async () => {
    const createRound = vi.spyOn(store, "createRound").mockRejectedValueOnce(new Error("db down"));
    engine = new AviatorEngine(store, timing, { random: () => 0.5 });
    engine.start();

    await vi.advanceTimersByTimeAsync(0);
    expect(createRound).toHaveBeenCalledTimes(1);
    expect(await store.getActiveRound()).toBeUndefined();
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("[aviator] round cycle failed: db down"));

    await vi.advanceTimersByTimeAsync(999);
    expect(createRound).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(createRound).toHaveBeenCalledTimes(2);
    expect((await store.getActiveRound())?.id).toBe(1);
  });

  it("closes a round whose crash write failed before opening the next one", async () => {
    const crashRound = vi.spyOn(store, "crashRound").mockRejectedValueOnce(new Error("db blip"));
    engine = new AviatorEngine(store, timing, { random: () => 0.5 });
    engine.start();
    await vi.advanceTimersByTimeAsync(4_200);

    expect(crashRound).toHaveBeenCalledTimes(1);
    expect((await store.getRound(1))?.status).toBe("active");
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("[aviator] round cycle failed: db blip"));

    await vi.advanceTimersByTimeAsync(1_000);
    const first = await store.getRound(1);
    expect(first?.status).toBe("crashed");
    expect(first?.crashedAt?.getTime()).toBe(T0.getTime() + 5_200);
    expect((await store.getActiveRound())?.id).toBe(2);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("closed 1 round(s) left active: 1"));
  });

  it("ignores start while a stop is still winding down", async () => {
    engine = new AviatorEngine(store, timing, { random: () => 0.5 });
    engine.start();
    await vi.advanceTimersByTimeAsync(1_000);

    const stopping = engine.stop();
    engine.start();
    await stopping;
    expect(engine.isRunning).toBe(false);
    expect((await store.getRound(1))?.status).toBe("crashed");

    engine.start();
    await vi.advanceTimersByTimeAsync(0);
    expect((await store.getActiveRound())?.id).toBe(2);

    await engine.stop();
    expect(engine.isRunning).toBe(false);
    expect(await store.getActiveRound()).toBeUndefined();

    await vi.advanceTimersByTimeAsync(60_000);
    expect((await store.getLatestRound())?.id).toBe(2);
  });

  it("reports lost bets when a round crashes", async () => {
    await store.createUser({ chatId: 42, username: "pilot" }, T0);
    await store.recordTransaction({ chatId: 42, type: "deposit", status: "completed", amountUsd: parseUsd("5.00") });

    engine = new AviatorEngine(store, timing, { random: () => 0.5 });
    engine.start();
    await vi.advanceTimersByTimeAsync(0);
    await store.placeBet({ roundId: 1, chatId: 42, amountUsd: parseUsd("1.00") });

    await vi.advanceTimersByTimeAsync(4_200);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining("round 1 crashed at 2.05x (1/1 bets lost)"));
  });

  it("stops mid-flight and crashes the open round", async () => {
    engine = new AviatorEngine(store, timing, { random: () => 0.5 });
    engine.start();
    await vi.advanceTimersByTimeAsync(1_000);

    await engine.stop();

    expect(engine.isRunning).toBe(false);
    const round = await store.getRound(1);
    expect(round?.status).toBe("crashed");
    expect(round?.crashedAt?.getTime()).toBe(T0.getTime() + 1_000);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(await store.getLatestRound()).toMatchObject({ id: 1 });
  });
});
