import type { User } from "@shared/schema";
import type { IStorage } from "../storage";
import { formatUsd } from "../lib/money";
import { NotEnoughEnergyError } from "../lib/errors";
import { TAP_REWARD, MAX_TAP_PER_REQUEST } from "../constants/game";
import { balanceView } from "../middleware/ledger";
import { refreshEnergy } from "./userService";

export function clampTapCount(count: number): number {
  if (!Number.isFinite(count)) return 1;
  return Math.max(1, Math.min(Math.trunc(count), MAX_TAP_PER_REQUEST));
}

export async function processTap(store: IStorage, user: User, requested: number, now: Date) {
  const current = await refreshEnergy(store, user, now);
  const count = clampTapCount(requested);
  if (current.energy < count) {
    throw new NotEnoughEnergyError(current.energy);
  }

  const earned = TAP_REWARD * count;
  const result = await store.atomicTap({ chatId: current.chatId, energyCost: count, earnedUsd: earned, at: now });
  if (!result) {
    // Energy was spent by a concurrent request between the read and the update.
    const latest = await store.getUser(current.chatId);
    throw new NotEnoughEnergyError(latest?.energy ?? 0);
  }

  const { user: updated } = result;
  return {
    earned_usd: formatUsd(earned),
    ...balanceView(updated),
    energy: updated.energy,
    energy_max: updated.energyMax,
  };
}
