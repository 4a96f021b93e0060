import {
  type User,
  type InsertUser,
  type Transaction,
  type TransactionType,
  type TransactionStatus,
  type WithdrawalRequest,
  type InsertWithdrawalRequest,
  type AviatorRound,
  type InsertAviatorRound,
  type AviatorBet,
  type RoundStatus,
  users,
  transactions,
  withdrawalRequests,
  aviatorRounds,
  aviatorBets,
} from "@shared/schema";
import { eq, desc, asc, sql, and, gte, ne } from "drizzle-orm";
import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import { formatUsd, formatNgn, formatMultiplier, usdToKobo, parseUsd } from "./lib/money";
import {
  AlreadyCashedOutError,
  DuplicateBetError,
  InsufficientBalanceError,
  NotFoundError,
  RoundCrashedError,
} from "./lib/errors";

export interface LedgerEntryInput {
  chatId: number;
  type: TransactionType;
  /** Signed USD minor units. */
  amountUsd: number;
  /** Signed kobo; defaults to the USD amount at the fixed rate. */
  amountNgn?: number | null;
  status?: TransactionStatus;
  meta?: Record<string, unknown>;
  externalRef?: string | null;
  affectBalance?: boolean;
  /** Reject debits that would take the balance below zero. */
  guardBalance?: boolean;
}

export interface LedgerResult {
  transaction: Transaction;
  user: User;
}

export type UserUpdate = Partial<Omit<User, "chatId" | "balanceUsd" | "createdAt">>;

export interface TapInput {
  chatId: number;
  energyCost: number;
  earnedUsd: number;
  at: Date;
}

export interface StepCreditInput {
  chatId: number;
  steps: number;
  /** UTC day the credit counts against. */
  day: string;
  /** Rate the credit was priced at; refused if the stored rate differs. */
  walkRate: number;
  earnedUsd: number;
  capUsd: number;
}

export interface WalkUpgradeInput {
  chatId: number;
  fromLevel: number;
  toLevel: number;
  costUsd: number;
  walkRate: number;
  energyRegenPerSec: string;
}

export interface PlaceBetInput {
  roundId: number;
  chatId: number;
  amountUsd: number;
}

export interface CashOutInput {
  betId: number;
  chatId: number;
  multiplier: number;
  payoutUsd: number;
}

export interface BetResult {
  bet: AviatorBet;
  user: User;
}

export interface WithdrawalResult {
  request: WithdrawalRequest;
  user: User;
}

export interface IStorage {
  getUser(chatId: number): Promise<User | undefined>;
  createUser(data: InsertUser, now: Date): Promise<User>;
  updateUser(chatId: number, data: UserUpdate): Promise<User | undefined>;
  atomicTap(input: TapInput): Promise<LedgerResult | undefined>;
  /** Undefined when the day's counter or the rate moved since the credit was priced. */
  creditSteps(input: StepCreditInput): Promise<LedgerResult | undefined>;
  /** Undefined when the player is no longer at `fromLevel`. */
  upgradeWalk(input: WalkUpgradeInput): Promise<LedgerResult | undefined>;

  recordTransaction(input: LedgerEntryInput): Promise<LedgerResult>;
  getTransactionByExternalRef(ref: string): Promise<Transaction | undefined>;
  getUserTransactions(chatId: number, limit: number): Promise<Transaction[]>;
  completeDeposit(ref: string, amountUsd: number, meta: Record<string, unknown>): Promise<LedgerResult | undefined>;
  reconcileBalance(chatId: number): Promise<User | undefined>;

  createWithdrawal(data: InsertWithdrawalRequest): Promise<WithdrawalResult>;
  getWithdrawal(id: number): Promise<WithdrawalRequest | undefined>;
  getUserWithdrawals(chatId: number): Promise<WithdrawalRequest[]>;
  getPendingWithdrawals(): Promise<WithdrawalRequest[]>;
  approveWithdrawal(id: number, at: Date): Promise<WithdrawalRequest | undefined>;
  rejectWithdrawal(id: number, reason: string, at: Date): Promise<WithdrawalResult | undefined>;

  createRound(data: InsertAviatorRound, status: RoundStatus): Promise<AviatorRound>;
  getRound(id: number): Promise<AviatorRound | undefined>;
  getLatestRound(): Promise<AviatorRound | undefined>;
  getActiveRound(): Promise<AviatorRound | undefined>;
  crashRound(id: number, at: Date): Promise<AviatorRound | undefined>;
  crashActiveRounds(at: Date): Promise<AviatorRound[]>;
  getRecentCrashedRounds(limit: number): Promise<AviatorRound[]>;

  getBet(roundId: number, chatId: number): Promise<AviatorBet | undefined>;
  getRoundBets(roundId: number): Promise<AviatorBet[]>;
  placeBet(input: PlaceBetInput): Promise<BetResult>;
  cashOutBet(input: CashOutInput): Promise<BetResult>;
}

type Db = NodePgDatabase<Record<string, never>>;
type DbTransaction = Parameters<Parameters<Db["transaction"]>[0]>[0];

const UNIQUE_VIOLATION = "23505";

function isUniqueViolation(error: unknown): boolean {
  if (typeof error !== "object" || error === null) return false;
  if ("code" in error && error.code === UNIQUE_VIOLATION) return true;
  return "cause" in error && isUniqueViolation(error.cause);
}

function ledgerValues(input: LedgerEntryInput) {
  const amountNgn = input.amountNgn === undefined ? usdToKobo(input.amountUsd) : input.amountNgn;
  return {
    chatId: input.chatId,
    type: input.type,
    status: input.status ?? "approved",
    amountUsd: formatUsd(input.amountUsd),
    amountNgn: amountNgn === null ? null : formatNgn(amountNgn),
    externalRef: input.externalRef ?? null,
    meta: input.meta ?? {},
  };
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Db) {}

  async getUser(chatId: number): Promise<User | undefined> {
    const [user] = await this.db.select().from(users).where(eq(users.chatId, chatId));
    return user;
  }

  async createUser(data: InsertUser, now: Date): Promise<User> {
    const [created] = await this.db
      .insert(users)
      .values({ ...data, lastEnergyUpdate: now, createdAt: now })
      .onConflictDoNothing()
      .returning();
    if (created) return created;

    // Lost a race with a concurrent first request for the same chat.
    const existing = await this.getUser(data.chatId);
    if (!existing) throw new NotFoundError("User not found");
    return existing;
  }

  async updateUser(chatId: number, data: UserUpdate): Promise<User | undefined> {
    const [user] = await this.db.update(users).set(data).where(eq(users.chatId, chatId)).returning();
    return user;
  }

  async atomicTap(input: TapInput): Promise<LedgerResult | undefined> {
    return this.db.transaction(async (tx) => {
      const [spent] = await tx
        .update(users)
        .set({
          energy: sql`${users.energy} - ${input.energyCost}`,
          lastEnergyUpdate: input.at,
        })
        .where(and(eq(users.chatId, input.chatId), gte(users.energy, input.energyCost)))
        .returning();
      if (!spent) return undefined;

      return this.writeLedger(tx, {
        chatId: input.chatId,
        type: "tap",
        amountUsd: input.earnedUsd,
        meta: { count: input.energyCost },
      });
    });
  }

  async creditSteps(input: StepCreditInput): Promise<LedgerResult | undefined> {
    const earned = formatUsd(input.earnedUsd);
    const earnedToday = sql`(case when ${users.stepsCreditedOn} = ${input.day} then ${users.stepsUsdToday} else 0 end)`;

    return this.db.transaction(async (tx) => {
      const [credited] = await tx
        .update(users)
        .set({
          totalSteps: sql`${users.totalSteps} + ${input.steps}`,
          stepsCreditedOn: input.day,
          stepsUsdToday: sql`${earnedToday} + ${earned}::numeric`,
        })
        .where(and(
          eq(users.chatId, input.chatId),
          eq(users.walkRate, formatUsd(input.walkRate)),
          sql`${earnedToday} + ${earned}::numeric <= ${formatUsd(input.capUsd)}::numeric`,
        ))
        .returning();
      if (!credited) return undefined;

      return this.writeLedger(tx, {
        chatId: input.chatId,
        type: "walk",
        amountUsd: input.earnedUsd,
        meta: { steps: input.steps, rate: formatUsd(input.walkRate) },
      });
    });
  }

  async upgradeWalk(input: WalkUpgradeInput): Promise<LedgerResult | undefined> {
    return this.db.transaction(async (tx) => {
      const [upgraded] = await tx
        .update(users)
        .set({
          walkLevel: input.toLevel,
          walkRate: formatUsd(input.walkRate),
          energyRegenPerSec: input.energyRegenPerSec,
        })
        .where(and(eq(users.chatId, input.chatId), eq(users.walkLevel, input.fromLevel)))
        .returning();
      if (!upgraded) return undefined;

      // An insufficient balance throws here and rolls the level change back.
      return this.writeLedger(tx, {
        chatId: input.chatId,
        type: "upgrade",
        amountUsd: -input.costUsd,
        guardBalance: true,
        meta: { from: input.fromLevel, to: input.toLevel, new_rate: formatUsd(input.walkRate) },
      });
    });
  }

  async recordTransaction(input: LedgerEntryInput): Promise<LedgerResult> {
    return this.db.transaction((tx) => this.writeLedger(tx, input));
  }

  private async writeLedger(tx: DbTransaction, input: LedgerEntryInput): Promise<LedgerResult> {
    let user: User | undefined;

    if (input.affectBalance ?? true) {
      const conditions = [eq(users.chatId, input.chatId)];
      if (input.guardBalance && input.amountUsd < 0) {
        conditions.push(gte(users.balanceUsd, formatUsd(-input.amountUsd)));
      }
      [user] = await tx
        .update(users)
        .set({ balanceUsd: sql`${users.balanceUsd} + ${formatUsd(input.amountUsd)}::numeric` })
        .where(and(...conditions))
        .returning();

      if (!user) {
        const [exists] = await tx.select().from(users).where(eq(users.chatId, input.chatId));
        if (!exists) throw new NotFoundError("User not found");
        throw new InsufficientBalanceError({ required_usd: formatUsd(-input.amountUsd) });
      }
    } else {
      [user] = await tx.select().from(users).where(eq(users.chatId, input.chatId));
      if (!user) throw new NotFoundError("User not found");
    }

    const [transaction] = await tx.insert(transactions).values(ledgerValues(input)).returning();
    return { transaction, user };
  }

  async getTransactionByExternalRef(ref: string): Promise<Transaction | undefined> {
    const [tx] = await this.db.select().from(transactions).where(eq(transactions.externalRef, ref));
    return tx;
  }

  async getUserTransactions(chatId: number, limit: number): Promise<Transaction[]> {
    return this.db
      .select()
      .from(transactions)
      .where(eq(transactions.chatId, chatId))
      .orderBy(desc(transactions.id))
      .limit(limit);
  }

  async completeDeposit(ref: string, amountUsd: number, meta: Record<string, unknown>): Promise<LedgerResult | undefined> {
    return this.db.transaction(async (tx) => {
      const [transaction] = await tx
        .update(transactions)
        .set({
          status: "completed",
          amountUsd: formatUsd(amountUsd),
          amountNgn: formatNgn(usdToKobo(amountUsd)),
          meta: sql`${transactions.meta} || ${JSON.stringify(meta)}::jsonb`,
        })
        .where(and(
          eq(transactions.externalRef, ref),
          eq(transactions.type, "deposit"),
          eq(transactions.status, "pending"),
        ))
        .returning();
      if (!transaction) return undefined;

      const [user] = await tx
        .update(users)
        .set({ balanceUsd: sql`${users.balanceUsd} + ${formatUsd(amountUsd)}::numeric` })
        .where(eq(users.chatId, transaction.chatId))
        .returning();
      if (!user) throw new NotFoundError("User not found");

      return { transaction, user };
    });
  }

  async reconcileBalance(chatId: number): Promise<User | undefined> {
    return this.db.transaction(async (tx) => {
      const [row] = await tx
        .select({ total: sql<string>`coalesce(sum(${transactions.amountUsd}), 0)::text` })
        .from(transactions)
        .where(and(eq(transactions.chatId, chatId), ne(transactions.status, "rejected")));

      const [user] = await tx
        .update(users)
        .set({ balanceUsd: formatUsd(parseUsd(row?.total ?? "0")) })
        .where(eq(users.chatId, chatId))
        .returning();
      return user;
    });
  }

  async createWithdrawal(data: InsertWithdrawalRequest): Promise<WithdrawalResult> {
    return this.db.transaction(async (tx) => {
      const hold = parseUsd(data.amountUsd);
      const { transaction, user } = await this.writeLedger(tx, {
        chatId: data.chatId,
        type: "withdraw",
        status: "pending",
        amountUsd: -hold,
        guardBalance: true,
        meta: { payout: data.payout ?? "" },
      });

      const [request] = await tx
        .insert(withdrawalRequests)
        .values({ ...data, status: "pending", transactionId: transaction.id })
        .returning();
      return { request, user };
    });
  }

  async getWithdrawal(id: number): Promise<WithdrawalRequest | undefined> {
    const [request] = await this.db.select().from(withdrawalRequests).where(eq(withdrawalRequests.id, id));
    return request;
  }

  async getUserWithdrawals(chatId: number): Promise<WithdrawalRequest[]> {
    return this.db
      .select()
      .from(withdrawalRequests)
      .where(eq(withdrawalRequests.chatId, chatId))
      .orderBy(desc(withdrawalRequests.id));
  }

  async getPendingWithdrawals(): Promise<WithdrawalRequest[]> {
    return this.db
      .select()
      .from(withdrawalRequests)
      .where(eq(withdrawalRequests.status, "pending"))
      .orderBy(asc(withdrawalRequests.id));
  }

  async approveWithdrawal(id: number, at: Date): Promise<WithdrawalRequest | undefined> {
    return this.db.transaction(async (tx) => {
      const [request] = await tx
        .update(withdrawalRequests)
        .set({ status: "approved", decidedAt: at })
        .where(and(eq(withdrawalRequests.id, id), eq(withdrawalRequests.status, "pending")))
        .returning();
      if (!request) return undefined;

      if (request.transactionId !== null) {
        await tx
          .update(transactions)
          .set({ status: "approved" })
          .where(eq(transactions.id, request.transactionId));
      }
      return request;
    });
  }

  async rejectWithdrawal(id: number, reason: string, at: Date): Promise<WithdrawalResult | undefined> {
    return this.db.transaction(async (tx) => {
      const [request] = await tx
        .update(withdrawalRequests)
        .set({ status: "rejected", reason, decidedAt: at })
        .where(and(eq(withdrawalRequests.id, id), eq(withdrawalRequests.status, "pending")))
        .returning();
      if (!request) return undefined;

      if (request.transactionId !== null) {
        await tx
          .update(transactions)
          .set({ status: "reversed" })
          .where(eq(transactions.id, request.transactionId));
      }

      const { user } = await this.writeLedger(tx, {
        chatId: request.chatId,
        type: "withdraw_revert",
        amountUsd: parseUsd(request.amountUsd),
        meta: { request_id: request.id, reason },
      });
      return { request, user };
    });
  }

  async createRound(data: InsertAviatorRound, status: RoundStatus): Promise<AviatorRound> {
    const [round] = await this.db.insert(aviatorRounds).values({ ...data, status }).returning();
    return round;
  }

  async getRound(id: number): Promise<AviatorRound | undefined> {
    const [round] = await this.db.select().from(aviatorRounds).where(eq(aviatorRounds.id, id));
    return round;
  }

  async getLatestRound(): Promise<AviatorRound | undefined> {
    const [round] = await this.db.select().from(aviatorRounds).orderBy(desc(aviatorRounds.id)).limit(1);
    return round;
  }

  async getActiveRound(): Promise<AviatorRound | undefined> {
    const [round] = await this.db
      .select()
      .from(aviatorRounds)
      .where(eq(aviatorRounds.status, "active"))
      .orderBy(desc(aviatorRounds.id))
      .limit(1);
    return round;
  }

  async crashRound(id: number, at: Date): Promise<AviatorRound | undefined> {
    const [round] = await this.db
      .update(aviatorRounds)
      .set({ status: "crashed", crashedAt: at })
      .where(and(eq(aviatorRounds.id, id), ne(aviatorRounds.status, "crashed")))
      .returning();
    return round;
  }

  async crashActiveRounds(at: Date): Promise<AviatorRound[]> {
    return this.db
      .update(aviatorRounds)
      .set({ status: "crashed", crashedAt: at })
      .where(eq(aviatorRounds.status, "active"))
      .returning();
  }

  async getRecentCrashedRounds(limit: number): Promise<AviatorRound[]> {
    return this.db
      .select()
      .from(aviatorRounds)
      .where(eq(aviatorRounds.status, "crashed"))
      .orderBy(desc(aviatorRounds.id))
      .limit(limit);
  }

  async getBet(roundId: number, chatId: number): Promise<AviatorBet | undefined> {
    const [bet] = await this.db
      .select()
      .from(aviatorBets)
      .where(and(eq(aviatorBets.roundId, roundId), eq(aviatorBets.chatId, chatId)));
    return bet;
  }

  async getRoundBets(roundId: number): Promise<AviatorBet[]> {
    return this.db.select().from(aviatorBets).where(eq(aviatorBets.roundId, roundId)).orderBy(asc(aviatorBets.id));
  }

  async placeBet(input: PlaceBetInput): Promise<BetResult> {
    return this.db.transaction(async (tx) => {
      const { user } = await this.writeLedger(tx, {
        chatId: input.chatId,
        type: "aviator_bet",
        amountUsd: -input.amountUsd,
        guardBalance: true,
        meta: { round_id: input.roundId },
      });

      try {
        const [bet] = await tx
          .insert(aviatorBets)
          .values({ roundId: input.roundId, chatId: input.chatId, amountUsd: formatUsd(input.amountUsd) })
          .returning();
        return { bet, user };
      } catch (error) {
        if (isUniqueViolation(error)) throw new DuplicateBetError();
        throw error;
      }
    });
  }

  async cashOutBet(input: CashOutInput): Promise<BetResult> {
    return this.db.transaction(async (tx) => {
      const [bet] = await tx
        .update(aviatorBets)
        .set({
          cashedOut: true,
          cashoutMultiplier: formatMultiplier(input.multiplier),
          payoutUsd: formatUsd(input.payoutUsd),
        })
        .where(and(
          eq(aviatorBets.id, input.betId),
          eq(aviatorBets.chatId, input.chatId),
          eq(aviatorBets.cashedOut, false),
          sql`exists (select 1 from ${aviatorRounds} where ${aviatorRounds.id} = ${aviatorBets.roundId} and ${aviatorRounds.status} = 'active')`,
        ))
        .returning();

      if (!bet) {
        const [current] = await tx.select().from(aviatorBets).where(eq(aviatorBets.id, input.betId));
        if (!current) throw new NotFoundError("No bet to cash out for user");
        if (current.cashedOut) throw new AlreadyCashedOutError();
        throw new RoundCrashedError();
      }

      const { user } = await this.writeLedger(tx, {
        chatId: input.chatId,
        type: "aviator_cashout",
        amountUsd: input.payoutUsd,
        meta: { round_id: bet.roundId, mult: formatMultiplier(input.multiplier) },
      });
      return { bet, user };
    });
  }
}

export interface StorageHandle {
  storage: IStorage;
  pool?: pg.Pool;
}

export function createDatabaseStorage(connectionString: string): StorageHandle {
  const pool = new pg.Pool({
    connectionString,
    ssl: connectionString.includes("sslmode=require") ? { rejectUnauthorized: false } : undefined,
  });
  return { storage: new DatabaseStorage(drizzle(pool)), pool };
}
