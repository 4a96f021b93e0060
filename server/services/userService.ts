import type { User } from "@shared/schema";
import type { IStorage } from "../storage";
import { formatUsd, parseUsd } from "../lib/money";
import { balanceView } from "../middleware/ledger";
import { dailyWalkCap, walkCounterFor } from "./walkService";

export interface PlayerIdentity {
  chatId: number;
  username?: string | null;
}

export async function getOrCreateUser(store: IStorage, identity: PlayerIdentity, now: Date): Promise<User> {
  const existing = await store.getUser(identity.chatId);
  if (existing) return existing;
  return store.createUser({ chatId: identity.chatId, username: identity.username ?? null }, now);
}

export interface EnergyState {
  energy: number;
  lastEnergyUpdate: Date;
}

/**
 * Whole units regenerated since the last update, capped at energyMax. The
 * timestamp moves forward only by the time those units took, so fractional
 * progress carries over; a full bar resets it to `now`.
 */
export function regenerateEnergy(user: User, now: Date): EnergyState | null {
  const elapsedMs = now.getTime() - user.lastEnergyUpdate.getTime();
  if (elapsedMs <= 0) return null;

  const microsPerSec = Math.round(Number(user.energyRegenPerSec) * 1_000_000);
  if (microsPerSec <= 0) return null;

  const gained = Math.floor((microsPerSec * elapsedMs) / 1_000_000_000);
  if (gained <= 0) return null;

  const energy = Math.min(user.energyMax, user.energy + gained);
  if (energy >= user.energyMax) {
    return { energy: user.energyMax, lastEnergyUpdate: now };
  }
  const consumedMs = Math.ceil((gained * 1_000_000_000) / microsPerSec);
  return { energy, lastEnergyUpdate: new Date(user.lastEnergyUpdate.getTime() + consumedMs) };
}

export async function refreshEnergy(store: IStorage, user: User, now: Date): Promise<User> {
  const next = regenerateEnergy(user, now);
  if (!next) return user;
  return (await store.updateUser(user.chatId, next)) ?? user;
}

export async function getProfile(store: IStorage, user: User, now: Date) {
  const current = await refreshEnergy(store, user, now);
  const cap = dailyWalkCap(current);
  const { earnedToday } = walkCounterFor(current, now);

  return {
    chat_id: current.chatId,
    username: current.username,
    ...balanceView(current),
    walk_level: current.walkLevel,
    walk_rate: formatUsd(parseUsd(current.walkRate)),
    total_steps: current.totalSteps,
    walk_cap_usd_today: formatUsd(cap),
    walk_remaining_usd_today: formatUsd(Math.max(0, cap - earnedToday)),
    energy: current.energy,
    energy_max: current.energyMax,
    energy_regen_per_sec: Number(current.energyRegenPerSec).toString(),
    last_energy_update: current.lastEnergyUpdate.toISOString(),
  };
}

export type UserProfile = Awaited<ReturnType<typeof getProfile>>;
