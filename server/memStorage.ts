import type {
  User,
  InsertUser,
  Transaction,
  WithdrawalRequest,
  InsertWithdrawalRequest,
  AviatorRound,
  InsertAviatorRound,
  AviatorBet,
  RoundStatus,
} from "@shared/schema";
import type {
  IStorage,
  LedgerEntryInput,
  LedgerResult,
  UserUpdate,
  TapInput,
  StepCreditInput,
  WalkUpgradeInput,
  PlaceBetInput,
  CashOutInput,
  BetResult,
  WithdrawalResult,
} from "./storage";
import { formatUsd, formatNgn, formatMultiplier, parseUsd, usdToKobo } from "./lib/money";
import {
  AlreadyCashedOutError,
  DuplicateBetError,
  InsufficientBalanceError,
  NotFoundError,
  RoundCrashedError,
} from "./lib/errors";
import {
  BASE_WALK_RATE,
  DEFAULT_ENERGY_MAX,
  DEFAULT_ENERGY_REGEN_PER_SEC,
} from "./constants/game";

/**
 * Process-local IStorage used when no DATABASE_URL is configured and by the
 * test suite. Every method runs synchronously between awaits, which gives it
 * the same all-or-nothing behaviour as the SQL transactions in DatabaseStorage.
 */
export class MemStorage implements IStorage {
  private users = new Map<number, User>();
  private transactions: Transaction[] = [];
  private withdrawals: WithdrawalRequest[] = [];
  private rounds: AviatorRound[] = [];
  private bets: AviatorBet[] = [];
  private seq = { transaction: 0, withdrawal: 0, round: 0, bet: 0 };

  async getUser(chatId: number): Promise<User | undefined> {
    const user = this.users.get(chatId);
    return user && { ...user };
  }

  async createUser(data: InsertUser, now: Date): Promise<User> {
    const existing = this.users.get(data.chatId);
    if (existing) return { ...existing };

    const user: User = {
      chatId: data.chatId,
      username: data.username ?? null,
      balanceUsd: formatUsd(0),
      walkLevel: 1,
      walkRate: formatUsd(BASE_WALK_RATE),
      totalSteps: 0,
      stepsCreditedOn: null,
      stepsUsdToday: formatUsd(0),
      energy: DEFAULT_ENERGY_MAX,
      energyMax: DEFAULT_ENERGY_MAX,
      energyRegenPerSec: DEFAULT_ENERGY_REGEN_PER_SEC.toFixed(6),
      lastEnergyUpdate: now,
      createdAt: now,
    };
    this.users.set(user.chatId, user);
    return { ...user };
  }

  async updateUser(chatId: number, data: UserUpdate): Promise<User | undefined> {
    const user = this.users.get(chatId);
    if (!user) return undefined;
    const updated = { ...user, ...data };
    this.users.set(chatId, updated);
    return { ...updated };
  }

  async atomicTap(input: TapInput): Promise<LedgerResult | undefined> {
    const user = this.users.get(input.chatId);
    if (!user || user.energy < input.energyCost) return undefined;

    this.users.set(input.chatId, {
      ...user,
      energy: user.energy - input.energyCost,
      lastEnergyUpdate: input.at,
    });
    return this.writeLedger({
      chatId: input.chatId,
      type: "tap",
      amountUsd: input.earnedUsd,
      meta: { count: input.energyCost },
    });
  }

  async creditSteps(input: StepCreditInput): Promise<LedgerResult | undefined> {
    const user = this.users.get(input.chatId);
    if (!user || parseUsd(user.walkRate) !== input.walkRate) return undefined;

    const earnedToday = user.stepsCreditedOn === input.day ? parseUsd(user.stepsUsdToday) : 0;
    if (earnedToday + input.earnedUsd > input.capUsd) return undefined;

    this.users.set(input.chatId, {
      ...user,
      totalSteps: user.totalSteps + input.steps,
      stepsCreditedOn: input.day,
      stepsUsdToday: formatUsd(earnedToday + input.earnedUsd),
    });
    return this.writeLedger({
      chatId: input.chatId,
      type: "walk",
      amountUsd: input.earnedUsd,
      meta: { steps: input.steps, rate: formatUsd(input.walkRate) },
    });
  }

  async upgradeWalk(input: WalkUpgradeInput): Promise<LedgerResult | undefined> {
    const user = this.users.get(input.chatId);
    if (!user || user.walkLevel !== input.fromLevel) return undefined;
    if (parseUsd(user.balanceUsd) < input.costUsd) {
      throw new InsufficientBalanceError({ required_usd: formatUsd(input.costUsd) });
    }

    this.users.set(input.chatId, {
      ...user,
      walkLevel: input.toLevel,
      walkRate: formatUsd(input.walkRate),
      energyRegenPerSec: input.energyRegenPerSec,
    });
    return this.writeLedger({
      chatId: input.chatId,
      type: "upgrade",
      amountUsd: -input.costUsd,
      guardBalance: true,
      meta: { from: input.fromLevel, to: input.toLevel, new_rate: formatUsd(input.walkRate) },
    });
  }

  async recordTransaction(input: LedgerEntryInput): Promise<LedgerResult> {
    return this.writeLedger(input);
  }

  private requireUser(chatId: number): User {
    const user = this.users.get(chatId);
    if (!user) throw new NotFoundError("User not found");
    return user;
  }

  private adjustBalance(chatId: number, deltaUsd: number, guard: boolean): User {
    const user = this.requireUser(chatId);
    const balance = parseUsd(user.balanceUsd);
    if (guard && deltaUsd < 0 && balance < -deltaUsd) {
      throw new InsufficientBalanceError({ required_usd: formatUsd(-deltaUsd) });
    }
    const updated = { ...user, balanceUsd: formatUsd(balance + deltaUsd) };
    this.users.set(chatId, updated);
    return updated;
  }

  private writeLedger(input: LedgerEntryInput): LedgerResult {
    if (input.externalRef && this.transactions.some((t) => t.externalRef === input.externalRef)) {
      throw new Error(`duplicate external reference ${input.externalRef}`);
    }

    const user = (input.affectBalance ?? true)
      ? this.adjustBalance(input.chatId, input.amountUsd, input.guardBalance ?? false)
      : this.requireUser(input.chatId);

    const amountNgn = input.amountNgn === undefined ? usdToKobo(input.amountUsd) : input.amountNgn;
    const transaction: Transaction = {
      id: ++this.seq.transaction,
      chatId: input.chatId,
      type: input.type,
      status: input.status ?? "approved",
      amountUsd: formatUsd(input.amountUsd),
      amountNgn: amountNgn === null ? null : formatNgn(amountNgn),
      externalRef: input.externalRef ?? null,
      meta: { ...(input.meta ?? {}) },
      createdAt: new Date(),
    };
    this.transactions.push(transaction);
    return { transaction: { ...transaction }, user: { ...user } };
  }

  async getTransactionByExternalRef(ref: string): Promise<Transaction | undefined> {
    const tx = this.transactions.find((t) => t.externalRef === ref);
    return tx && { ...tx };
  }

  async getUserTransactions(chatId: number, limit: number): Promise<Transaction[]> {
    return this.transactions
      .filter((t) => t.chatId === chatId)
      .sort((a, b) => b.id - a.id)
      .slice(0, limit)
      .map((t) => ({ ...t }));
  }

  async completeDeposit(ref: string, amountUsd: number, meta: Record<string, unknown>): Promise<LedgerResult | undefined> {
    const index = this.transactions.findIndex(
      (t) => t.externalRef === ref && t.type === "deposit" && t.status === "pending",
    );
    if (index === -1) return undefined;

    const pending = this.transactions[index];
    const user = this.adjustBalance(pending.chatId, amountUsd, false);
    const transaction: Transaction = {
      ...pending,
      status: "completed",
      amountUsd: formatUsd(amountUsd),
      amountNgn: formatNgn(usdToKobo(amountUsd)),
      meta: { ...pending.meta, ...meta },
    };
    this.transactions[index] = transaction;
    return { transaction: { ...transaction }, user: { ...user } };
  }

  async reconcileBalance(chatId: number): Promise<User | undefined> {
    const user = this.users.get(chatId);
    if (!user) return undefined;

    const total = this.transactions
      .filter((t) => t.chatId === chatId && t.status !== "rejected")
      .reduce((sum, t) => sum + parseUsd(t.amountUsd), 0);
    const updated = { ...user, balanceUsd: formatUsd(total) };
    this.users.set(chatId, updated);
    return { ...updated };
  }

  async createWithdrawal(data: InsertWithdrawalRequest): Promise<WithdrawalResult> {
    const payout = data.payout ?? "";
    const { transaction, user } = this.writeLedger({
      chatId: data.chatId,
      type: "withdraw",
      status: "pending",
      amountUsd: -parseUsd(data.amountUsd),
      guardBalance: true,
      meta: { payout },
    });

    const request: WithdrawalRequest = {
      id: ++this.seq.withdrawal,
      chatId: data.chatId,
      amountUsd: data.amountUsd,
      amountNgn: data.amountNgn,
      payout,
      status: "pending",
      transactionId: transaction.id,
      reason: null,
      createdAt: new Date(),
      decidedAt: null,
    };
    this.withdrawals.push(request);
    return { request: { ...request }, user };
  }

  async getWithdrawal(id: number): Promise<WithdrawalRequest | undefined> {
    const request = this.withdrawals.find((w) => w.id === id);
    return request && { ...request };
  }

  async getUserWithdrawals(chatId: number): Promise<WithdrawalRequest[]> {
    return this.withdrawals
      .filter((w) => w.chatId === chatId)
      .sort((a, b) => b.id - a.id)
      .map((w) => ({ ...w }));
  }

  async getPendingWithdrawals(): Promise<WithdrawalRequest[]> {
    return this.withdrawals.filter((w) => w.status === "pending").map((w) => ({ ...w }));
  }

  private decideWithdrawal(id: number, patch: Partial<WithdrawalRequest>): WithdrawalRequest | undefined {
    const index = this.withdrawals.findIndex((w) => w.id === id && w.status === "pending");
    if (index === -1) return undefined;
    const request = { ...this.withdrawals[index], ...patch };
    this.withdrawals[index] = request;
    return request;
  }

  private setTransactionStatus(id: number | null, status: Transaction["status"]): void {
    const tx = this.transactions.find((t) => t.id === id);
    if (tx) tx.status = status;
  }

  async approveWithdrawal(id: number, at: Date): Promise<WithdrawalRequest | undefined> {
    const request = this.decideWithdrawal(id, { status: "approved", decidedAt: at });
    if (!request) return undefined;
    this.setTransactionStatus(request.transactionId, "approved");
    return { ...request };
  }

  async rejectWithdrawal(id: number, reason: string, at: Date): Promise<WithdrawalResult | undefined> {
    const request = this.decideWithdrawal(id, { status: "rejected", reason, decidedAt: at });
    if (!request) return undefined;
    this.setTransactionStatus(request.transactionId, "reversed");

    const { user } = this.writeLedger({
      chatId: request.chatId,
      type: "withdraw_revert",
      amountUsd: parseUsd(request.amountUsd),
      meta: { request_id: request.id, reason },
    });
    return { request: { ...request }, user };
  }

  async createRound(data: InsertAviatorRound, status: RoundStatus): Promise<AviatorRound> {
    const round: AviatorRound = {
      id: ++this.seq.round,
      startTime: data.startTime,
      crashMultiplier: data.crashMultiplier,
      growthPerSec: data.growthPerSec ?? "0.25",
      status,
      createdAt: new Date(),
      crashedAt: null,
    };
    this.rounds.push(round);
    return { ...round };
  }

  async getRound(id: number): Promise<AviatorRound | undefined> {
    const round = this.rounds.find((r) => r.id === id);
    return round && { ...round };
  }

  async getLatestRound(): Promise<AviatorRound | undefined> {
    const round = this.rounds[this.rounds.length - 1];
    return round && { ...round };
  }

  async getActiveRound(): Promise<AviatorRound | undefined> {
    const round = [...this.rounds].reverse().find((r) => r.status === "active");
    return round && { ...round };
  }

  async crashRound(id: number, at: Date): Promise<AviatorRound | undefined> {
    const round = this.rounds.find((r) => r.id === id && r.status !== "crashed");
    if (!round) return undefined;
    round.status = "crashed";
    round.crashedAt = at;
    return { ...round };
  }

  async crashActiveRounds(at: Date): Promise<AviatorRound[]> {
    const crashed: AviatorRound[] = [];
    for (const round of this.rounds) {
      if (round.status !== "active") continue;
      round.status = "crashed";
      round.crashedAt = at;
      crashed.push({ ...round });
    }
    return crashed;
  }

  async getRecentCrashedRounds(limit: number): Promise<AviatorRound[]> {
    return this.rounds
      .filter((r) => r.status === "crashed")
      .sort((a, b) => b.id - a.id)
      .slice(0, limit)
      .map((r) => ({ ...r }));
  }

  async getBet(roundId: number, chatId: number): Promise<AviatorBet | undefined> {
    const bet = this.bets.find((b) => b.roundId === roundId && b.chatId === chatId);
    return bet && { ...bet };
  }

  async getRoundBets(roundId: number): Promise<AviatorBet[]> {
    return this.bets.filter((b) => b.roundId === roundId).map((b) => ({ ...b }));
  }

  async placeBet(input: PlaceBetInput): Promise<BetResult> {
    if (this.bets.some((b) => b.roundId === input.roundId && b.chatId === input.chatId)) {
      throw new DuplicateBetError();
    }
    const { user } = this.writeLedger({
      chatId: input.chatId,
      type: "aviator_bet",
      amountUsd: -input.amountUsd,
      guardBalance: true,
      meta: { round_id: input.roundId },
    });

    const bet: AviatorBet = {
      id: ++this.seq.bet,
      roundId: input.roundId,
      chatId: input.chatId,
      amountUsd: formatUsd(input.amountUsd),
      cashedOut: false,
      cashoutMultiplier: null,
      payoutUsd: null,
      createdAt: new Date(),
    };
    this.bets.push(bet);
    return { bet: { ...bet }, user };
  }

  async cashOutBet(input: CashOutInput): Promise<BetResult> {
    const bet = this.bets.find((b) => b.id === input.betId && b.chatId === input.chatId);
    if (!bet) throw new NotFoundError("No bet to cash out for user");
    if (bet.cashedOut) throw new AlreadyCashedOutError();
    const round = this.rounds.find((r) => r.id === bet.roundId);
    if (!round || round.status !== "active") throw new RoundCrashedError();

    bet.cashedOut = true;
    bet.cashoutMultiplier = formatMultiplier(input.multiplier);
    bet.payoutUsd = formatUsd(input.payoutUsd);

    const { user } = this.writeLedger({
      chatId: input.chatId,
      type: "aviator_cashout",
      amountUsd: input.payoutUsd,
      meta: { round_id: bet.roundId, mult: formatMultiplier(input.multiplier) },
    });
    return { bet: { ...bet }, user };
  }
}
