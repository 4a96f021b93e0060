import type pg from "pg";
import { log } from "./log";

const DUPLICATE_COLUMN = "42701";

const tableStatements = [
  `CREATE TABLE IF NOT EXISTS "users" (
    "chat_id" bigint PRIMARY KEY NOT NULL,
    "username" text,
    "balance_usd" numeric(18, 4) DEFAULT '0' NOT NULL,
    "walk_level" integer DEFAULT 1 NOT NULL,
    "walk_rate" numeric(18, 4) DEFAULT '0.001' NOT NULL,
    "total_steps" bigint DEFAULT 0 NOT NULL,
    "steps_credited_on" date,
    "steps_usd_today" numeric(18, 4) DEFAULT '0' NOT NULL,
    "created_at" timestamp with time zone DEFAULT now() NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS "transactions" (
    "id" serial PRIMARY KEY NOT NULL,
    "chat_id" bigint NOT NULL REFERENCES "users"("chat_id"),
    "type" text NOT NULL,
    "status" text DEFAULT 'approved' NOT NULL,
    "amount_usd" numeric(18, 4) DEFAULT '0' NOT NULL,
    "amount_ngn" numeric(18, 2),
    "external_ref" text UNIQUE,
    "meta" jsonb DEFAULT '{}'::jsonb NOT NULL,
    "created_at" timestamp with time zone DEFAULT now() NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS "idx_transactions_chat_id" ON "transactions" ("chat_id")`,
  `CREATE TABLE IF NOT EXISTS "withdrawal_requests" (
    "id" serial PRIMARY KEY NOT NULL,
    "chat_id" bigint NOT NULL REFERENCES "users"("chat_id"),
    "amount_usd" numeric(18, 4) NOT NULL,
    "amount_ngn" numeric(18, 2) NOT NULL,
    "payout" text DEFAULT '' NOT NULL,
    "status" text DEFAULT 'pending' NOT NULL,
    "transaction_id" integer REFERENCES "transactions"("id"),
    "reason" text,
    "created_at" timestamp with time zone DEFAULT now() NOT NULL,
    "decided_at" timestamp with time zone
  )`,
  `CREATE TABLE IF NOT EXISTS "global_aviator_rounds" (
    "id" serial PRIMARY KEY NOT NULL,
    "start_time" timestamp with time zone NOT NULL,
    "crash_multiplier" numeric(18, 2) NOT NULL,
    "growth_per_sec" numeric(18, 6) DEFAULT '0.25' NOT NULL,
    "status" text DEFAULT 'scheduled' NOT NULL,
    "created_at" timestamp with time zone DEFAULT now() NOT NULL,
    "crashed_at" timestamp with time zone
  )`,
  `CREATE INDEX IF NOT EXISTS "idx_aviator_rounds_status" ON "global_aviator_rounds" ("status")`,
  `CREATE TABLE IF NOT EXISTS "aviator_bets" (
    "id" serial PRIMARY KEY NOT NULL,
    "round_id" integer NOT NULL REFERENCES "global_aviator_rounds"("id"),
    "chat_id" bigint NOT NULL REFERENCES "users"("chat_id"),
    "amount_usd" numeric(18, 4) NOT NULL,
    "cashed_out" boolean DEFAULT false NOT NULL,
    "cashout_multiplier" numeric(18, 2),
    "payout_usd" numeric(18, 4),
    "created_at" timestamp with time zone DEFAULT now() NOT NULL
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS "idx_aviator_bets_round_chat" ON "aviator_bets" ("round_id", "chat_id")`,
];

// Columns added after the first release; older databases pick them up here.
const addColumnStatements = [
  `ALTER TABLE "users" ADD COLUMN IF NOT EXISTS "energy" integer DEFAULT 100 NOT NULL`,
  `ALTER TABLE "users" ADD COLUMN IF NOT EXISTS "energy_max" integer DEFAULT 100 NOT NULL`,
  `ALTER TABLE "users" ADD COLUMN IF NOT EXISTS "energy_regen_per_sec" numeric(18, 6) DEFAULT '0.2' NOT NULL`,
  `ALTER TABLE "users" ADD COLUMN IF NOT EXISTS "last_energy_update" timestamp with time zone DEFAULT now() NOT NULL`,
  `ALTER TABLE "aviator_bets" ADD COLUMN IF NOT EXISTS "payout_usd" numeric(18, 4)`,
  `ALTER TABLE "global_aviator_rounds" ADD COLUMN IF NOT EXISTS "crashed_at" timestamp with time zone`,
];

/** Creates any missing tables, indexes and columns. Safe to run on every start. */
export async function ensureSchema(pool: pg.Pool): Promise<void> {
  for (const statement of tableStatements) {
    await pool.query(statement);
  }

  for (const statement of addColumnStatements) {
    try {
      await pool.query(statement);
    } catch (error) {
      if (typeof error === "object" && error !== null && "code" in error && error.code === DUPLICATE_COLUMN) {
        continue;
      }
      throw error;
    }
  }
  log("schema ensured", "db");
}
