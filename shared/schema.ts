import { sql } from "drizzle-orm";
import {
  pgTable,
  text,
  integer,
  bigint,
  boolean,
  timestamp,
  serial,
  decimal,
  date,
  jsonb,
  uniqueIndex,
  index,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const users = pgTable("users", {
  chatId: bigint("chat_id", { mode: "number" }).primaryKey(),
  username: text("username"),
  balanceUsd: decimal("balance_usd", { precision: 18, scale: 4 }).notNull().default("0"),
  walkLevel: integer("walk_level").notNull().default(1),
  walkRate: decimal("walk_rate", { precision: 18, scale: 4 }).notNull().default("0.001"),
  totalSteps: bigint("total_steps", { mode: "number" }).notNull().default(0),
  stepsCreditedOn: date("steps_credited_on"),
  stepsUsdToday: decimal("steps_usd_today", { precision: 18, scale: 4 }).notNull().default("0"),
  energy: integer("energy").notNull().default(100),
  energyMax: integer("energy_max").notNull().default(100),
  energyRegenPerSec: decimal("energy_regen_per_sec", { precision: 18, scale: 6 }).notNull().default("0.2"),
  lastEnergyUpdate: timestamp("last_energy_update", { withTimezone: true }).notNull().default(sql`now()`),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().default(sql`now()`),
});

export const transactions = pgTable("transactions", {
  id: serial("id").primaryKey(),
  chatId: bigint("chat_id", { mode: "number" }).notNull().references(() => users.chatId),
  type: text("type").notNull(),
  status: text("status").notNull().default("approved"),
  amountUsd: decimal("amount_usd", { precision: 18, scale: 4 }).notNull().default("0"),
  amountNgn: decimal("amount_ngn", { precision: 18, scale: 2 }),
  externalRef: text("external_ref").unique(),
  meta: jsonb("meta").$type<Record<string, unknown>>().notNull().default({}),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().default(sql`now()`),
}, (table) => ({
  chatIdx: index("idx_transactions_chat_id").on(table.chatId),
}));

export const withdrawalRequests = pgTable("withdrawal_requests", {
  id: serial("id").primaryKey(),
  chatId: bigint("chat_id", { mode: "number" }).notNull().references(() => users.chatId),
  amountUsd: decimal("amount_usd", { precision: 18, scale: 4 }).notNull(),
  amountNgn: decimal("amount_ngn", { precision: 18, scale: 2 }).notNull(),
  payout: text("payout").notNull().default(""),
  status: text("status").notNull().default("pending"),
  transactionId: integer("transaction_id").references(() => transactions.id),
  reason: text("reason"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().default(sql`now()`),
  decidedAt: timestamp("decided_at", { withTimezone: true }),
});

export const aviatorRounds = pgTable("global_aviator_rounds", {
  id: serial("id").primaryKey(),
  startTime: timestamp("start_time", { withTimezone: true }).notNull(),
  crashMultiplier: decimal("crash_multiplier", { precision: 18, scale: 2 }).notNull(),
  growthPerSec: decimal("growth_per_sec", { precision: 18, scale: 6 }).notNull().default("0.25"),
  status: text("status").notNull().default("scheduled"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().default(sql`now()`),
  crashedAt: timestamp("crashed_at", { withTimezone: true }),
}, (table) => ({
  statusIdx: index("idx_aviator_rounds_status").on(table.status),
}));

export const aviatorBets = pgTable("aviator_bets", {
  id: serial("id").primaryKey(),
  roundId: integer("round_id").notNull().references(() => aviatorRounds.id),
  chatId: bigint("chat_id", { mode: "number" }).notNull().references(() => users.chatId),
  amountUsd: decimal("amount_usd", { precision: 18, scale: 4 }).notNull(),
  cashedOut: boolean("cashed_out").notNull().default(false),
  cashoutMultiplier: decimal("cashout_multiplier", { precision: 18, scale: 2 }),
  payoutUsd: decimal("payout_usd", { precision: 18, scale: 4 }),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().default(sql`now()`),
}, (table) => ({
  roundUserIdx: uniqueIndex("idx_aviator_bets_round_chat").on(table.roundId, table.chatId),
}));

export const TRANSACTION_TYPES = [
  "tap",
  "walk",
  "upgrade",
  "aviator_bet",
  "aviator_cashout",
  "deposit",
  "withdraw",
  "withdraw_revert",
] as const;

export const TRANSACTION_STATUSES = ["pending", "approved", "completed", "rejected", "reversed"] as const;
export const WITHDRAWAL_STATUSES = ["pending", "approved", "rejected"] as const;
export const ROUND_STATUSES = ["scheduled", "active", "crashed"] as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[number];
export type TransactionStatus = (typeof TRANSACTION_STATUSES)[number];
export type WithdrawalStatus = (typeof WITHDRAWAL_STATUSES)[number];
export type RoundStatus = (typeof ROUND_STATUSES)[number];

export const insertUserSchema = createInsertSchema(users).pick({
  chatId: true,
  username: true,
});

export const insertWithdrawalRequestSchema = createInsertSchema(withdrawalRequests).pick({
  chatId: true,
  amountUsd: true,
  amountNgn: true,
  payout: true,
});

export const insertAviatorRoundSchema = createInsertSchema(aviatorRounds).pick({
  startTime: true,
  crashMultiplier: true,
  growthPerSec: true,
});

export type InsertUser = z.infer<typeof insertUserSchema>;
export type InsertWithdrawalRequest = z.infer<typeof insertWithdrawalRequestSchema>;
export type InsertAviatorRound = z.infer<typeof insertAviatorRoundSchema>;

export type User = typeof users.$inferSelect;
export type Transaction = typeof transactions.$inferSelect;
export type WithdrawalRequest = typeof withdrawalRequests.$inferSelect;
export type AviatorRound = typeof aviatorRounds.$inferSelect;
export type AviatorBet = typeof aviatorBets.$inferSelect;
