import { parseUsd, parseNgn } from "../lib/money";

export interface WalkLevelDefinition {
  level: number;
  rate: string;
  price: string;
}

export const WALK_LEVELS: WalkLevelDefinition[] = [
  { level: 1, rate: "0.001", price: "0.00" },
  { level: 2, rate: "0.002", price: "5.00" },
  { level: 3, rate: "0.005", price: "15.00" },
  { level: 4, rate: "0.010", price: "40.00" },
];

export const BASE_WALK_RATE = parseUsd(WALK_LEVELS[0].rate);
export const BASE_DAILY_WALK_CAP = parseUsd("1.00");

export const TAP_REWARD = parseUsd("0.001");
export const MAX_TAP_PER_REQUEST = 50;

export const DEFAULT_ENERGY_MAX = 100;
export const DEFAULT_ENERGY_REGEN_PER_SEC = 0.2;

export const MIN_BET = parseUsd("0.10");
export const MAX_BET = parseUsd("1000000.00");

export const MIN_DEPOSIT_NGN = parseNgn("100.00");
export const MIN_WITHDRAW_USD = parseUsd("50.00");

export const TRANSACTION_HISTORY_LIMIT = 50;

export function getWalkLevel(level: number): WalkLevelDefinition | undefined {
  return WALK_LEVELS.find((l) => l.level === level);
}

export function energyRegenForLevel(level: number): number {
  return DEFAULT_ENERGY_REGEN_PER_SEC * (1 + 0.2 * (level - 1));
}
