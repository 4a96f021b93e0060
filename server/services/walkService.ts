import type { User } from "@shared/schema";
import type { IStorage } from "../storage";
import { formatUsd, parseUsd } from "../lib/money";
import { BadRequestError, ConflictError, NotFoundError } from "../lib/errors";
import {
  WALK_LEVELS,
  BASE_WALK_RATE,
  BASE_DAILY_WALK_CAP,
  getWalkLevel,
  energyRegenForLevel,
} from "../constants/game";
import { balanceView } from "../middleware/ledger";

export function utcDay(now: Date): string {
  return now.toISOString().slice(0, 10);
}

/** $1.00 per day at the base rate, scaled linearly with the player's rate. */
export function dailyWalkCap(user: User): number {
  return Math.floor((BASE_DAILY_WALK_CAP * parseUsd(user.walkRate)) / BASE_WALK_RATE);
}

export function walkCounterFor(user: User, now: Date): { day: string; earnedToday: number } {
  const day = utcDay(now);
  return {
    day,
    earnedToday: user.stepsCreditedOn === day ? parseUsd(user.stepsUsdToday) : 0,
  };
}

// Each retry follows a write by a concurrent request, so a handful is plenty.
const MAX_WALK_ATTEMPTS = 5;

async function reloadUser(store: IStorage, chatId: number): Promise<User> {
  const user = await store.getUser(chatId);
  if (!user) throw new NotFoundError("User not found");
  return user;
}

export async function submitSteps(store: IStorage, user: User, steps: number, now: Date) {
  if (!Number.isInteger(steps) || steps <= 0) {
    throw new BadRequestError("steps must be positive");
  }

  let current = user;
  for (let attempt = 0; attempt < MAX_WALK_ATTEMPTS; attempt++) {
    const cap = dailyWalkCap(current);
    const { day, earnedToday } = walkCounterFor(current, now);
    const remaining = cap - earnedToday;

    if (remaining <= 0) {
      return {
        earned_usd: formatUsd(0),
        ...balanceView(current),
        total_steps: current.totalSteps,
        cap_reached: true,
      };
    }

    const rate = parseUsd(current.walkRate);
    const earned = Math.min(rate * steps, remaining);
    const result = await store.creditSteps({
      chatId: current.chatId,
      steps,
      day,
      walkRate: rate,
      earnedUsd: earned,
      capUsd: cap,
    });

    if (result) {
      return {
        earned_usd: formatUsd(earned),
        ...balanceView(result.user),
        total_steps: result.user.totalSteps,
        cap_reached: earnedToday + earned >= cap,
      };
    }
    current = await reloadUser(store, current.chatId);
  }

  throw new ConflictError("Steps could not be credited, please retry");
}

export function upgradeCost(fromLevel: number, toLevel: number): number {
  return WALK_LEVELS
    .filter((l) => l.level > fromLevel && l.level <= toLevel)
    .reduce((sum, l) => sum + parseUsd(l.price), 0);
}

export async function upgradeWalkLevel(store: IStorage, user: User, target: number) {
  let current = user;
  for (let attempt = 0; attempt < MAX_WALK_ATTEMPTS; attempt++) {
    if (target <= current.walkLevel) {
      throw new BadRequestError("Target must be higher than current level");
    }
    const level = getWalkLevel(target);
    if (!level) {
      throw new BadRequestError("Invalid level");
    }

    const result = await store.upgradeWalk({
      chatId: current.chatId,
      fromLevel: current.walkLevel,
      toLevel: target,
      costUsd: upgradeCost(current.walkLevel, target),
      walkRate: parseUsd(level.rate),
      energyRegenPerSec: energyRegenForLevel(target).toFixed(6),
    });

    if (result) {
      const upgraded = result.user;
      return {
        ...balanceView(upgraded),
        walk_level: upgraded.walkLevel,
        walk_rate: formatUsd(parseUsd(upgraded.walkRate)),
        energy_regen_per_sec: Number(upgraded.energyRegenPerSec).toString(),
      };
    }
    current = await reloadUser(store, current.chatId);
  }

  throw new ConflictError("Upgrade could not be applied, please retry");
}

export function listWalkLevels() {
  return WALK_LEVELS.map((l) => ({
    level: l.level,
    rate_usd_per_step: formatUsd(parseUsd(l.rate)),
    price_usd: formatUsd(parseUsd(l.price)),
    daily_cap_usd: formatUsd(Math.floor((BASE_DAILY_WALK_CAP * parseUsd(l.rate)) / BASE_WALK_RATE)),
  }));
}
