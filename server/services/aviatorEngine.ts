import type { AviatorRound } from "@shared/schema";
import type { IStorage } from "../storage";
import type { AviatorTiming } from "../config";
import { log, errorMessage } from "../log";
import { formatMultiplier } from "../lib/money";
import { finalMultiplier, msUntilCrash, sampleCrashMultiplier } from "./crashMath";

export interface AviatorEngineDeps {
  now?: () => Date;
  random?: () => number;
}

/**
 * Drives the single global Aviator round: create an active round, let it fly
 * until its deadline, crash it, pause, repeat. One loop per process.
 */
export class AviatorEngine {
  private running = false;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private readonly now: () => Date;
  private readonly random: () => number;

  constructor(
    private readonly store: IStorage,
    private readonly timing: AviatorTiming,
    deps: AviatorEngineDeps = {},
  ) {
    this.now = deps.now ?? (() => new Date());
    this.random = deps.random ?? Math.random;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    // A loop that is still winding down after stop() owns the store until it exits.
    if (this.running || this.loop) return;
    this.running = true;
    this.loop = this.run();
    log("engine started", "aviator");
  }

  async stop(): Promise<void> {
    if (!this.loop) return;
    this.running = false;
    this.wake?.();
    await this.loop;
    this.loop = null;
    log("engine stopped", "aviator");
  }

  private async run(): Promise<void> {
    while (this.running) {
      try {
        await this.runCycle();
      } catch (error) {
        log(`round cycle failed: ${errorMessage(error)}`, "aviator");
        await this.sleep(this.timing.errorPauseMs);
      }
    }
  }

  private async runCycle(): Promise<void> {
    // Rounds left active by a previous process or a failed crash write.
    const stale = await this.store.crashActiveRounds(this.now());
    if (stale.length > 0) {
      log(`closed ${stale.length} round(s) left active: ${stale.map((r) => r.id).join(", ")}`, "aviator");
    }

    const crash = sampleCrashMultiplier(this.random);
    const round = await this.store.createRound(
      {
        startTime: this.now(),
        crashMultiplier: formatMultiplier(crash),
        growthPerSec: this.timing.growthPerSec.toFixed(6),
      },
      "active",
    );
    log(`round ${round.id} started`, "aviator");

    const flightMs = Math.min(this.timing.roundDurationMs, msUntilCrash(crash, this.timing.growthPerSec));
    await this.sleep(flightMs);
    await this.crash(round);

    await this.sleep(this.timing.gapMs);
  }

  private async crash(round: AviatorRound): Promise<void> {
    const crashed = await this.store.crashRound(round.id, this.now());
    if (!crashed) return;

    const bets = await this.store.getRoundBets(round.id);
    const lost = bets.filter((b) => !b.cashedOut).length;
    const at = formatMultiplier(finalMultiplier(crashed));
    log(`round ${round.id} crashed at ${at}x (${lost}/${bets.length} bets lost)`, "aviator");
  }

  /** Resolves after `ms`, or as soon as stop() is called. */
  private sleep(ms: number): Promise<void> {
    if (!this.running || ms <= 0) return Promise.resolve();

    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const done = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      this.wake = done;
      timer = setTimeout(done, ms);
    });
  }
}
