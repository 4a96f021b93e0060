import type { AviatorRound } from "@shared/schema";
import { parseMultiplier } from "../lib/money";

/** 1.00x in hundredths. */
export const BASE_MULTIPLIER = 100;

interface CrashTier {
  /** Cumulative probability upper bound. */
  cumulative: number;
  min: number;
  max: number;
}

// 80% land low, 18% mid, 2% in the long tail.
const CRASH_TIERS: CrashTier[] = [
  { cumulative: 0.8, min: 1.1, max: 3 },
  { cumulative: 0.98, min: 3, max: 10 },
  { cumulative: 1, min: 10, max: 50 },
];

/** Draws a crash point, in hundredths, from the tiered distribution. */
export function sampleCrashMultiplier(random: () => number = Math.random): number {
  const roll = random();
  const tier = CRASH_TIERS.find((t) => roll < t.cumulative) ?? CRASH_TIERS[CRASH_TIERS.length - 1];
  return Math.round(tier.min * 100 + random() * (tier.max - tier.min) * 100);
}

function growthMicros(growthPerSec: number): number {
  return Math.round(growthPerSec * 1_000_000);
}

/** Milliseconds after start at which the multiplier reaches `crash`. */
export function msUntilCrash(crash: number, growthPerSec: number): number {
  const micros = growthMicros(growthPerSec);
  if (micros <= 0) return Number.POSITIVE_INFINITY;
  return Math.ceil(((crash - BASE_MULTIPLIER) * 10_000_000) / micros);
}

/**
 * 1.00 + growth × elapsed seconds, truncated to hundredths and clamped at the
 * crash point. Elapsed time before the start counts as zero.
 */
export function multiplierAt(elapsedMs: number, crash: number, growthPerSec: number): number {
  const elapsed = Math.max(0, elapsedMs);
  if (elapsed >= msUntilCrash(crash, growthPerSec)) return crash;
  const grown = BASE_MULTIPLIER + Math.floor((growthMicros(growthPerSec) * elapsed) / 10_000_000);
  return Math.min(grown, crash);
}

export interface RoundSnapshot {
  multiplier: number;
  crashMultiplier: number;
  crashed: boolean;
}

/** A crashed round's multiplier stays frozen at its crash time. */
export function evaluateRound(round: AviatorRound, now: Date): RoundSnapshot {
  const crashMultiplier = parseMultiplier(round.crashMultiplier);
  const at = round.crashedAt && round.crashedAt < now ? round.crashedAt : now;
  const multiplier = multiplierAt(
    at.getTime() - round.startTime.getTime(),
    crashMultiplier,
    Number(round.growthPerSec),
  );
  return {
    multiplier,
    crashMultiplier,
    crashed: round.status === "crashed" || multiplier >= crashMultiplier,
  };
}

/**
 * Where a crashed round stopped. Below the sampled crash point when the round
 * duration ended the flight first.
 */
export function finalMultiplier(round: AviatorRound): number {
  if (!round.crashedAt) return parseMultiplier(round.crashMultiplier);
  return evaluateRound(round, round.crashedAt).multiplier;
}
