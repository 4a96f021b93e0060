import type { AviatorBet, AviatorRound, User } from "@shared/schema";
import type { IStorage } from "../storage";
import { formatUsd, formatMultiplier, parseUsd, parseMultiplier, applyMultiplier } from "../lib/money";
import {
  AlreadyCashedOutError,
  BadRequestError,
  DuplicateBetError,
  NoActiveRoundError,
  NotFoundError,
  RoundCrashedError,
} from "../lib/errors";
import { MIN_BET, MAX_BET } from "../constants/game";
import { balanceView } from "../middleware/ledger";
import { evaluateRound, finalMultiplier } from "./crashMath";

export const HISTORY_LIMIT = 20;

function serializeBet(bet: AviatorBet) {
  return {
    amount_usd: formatUsd(parseUsd(bet.amountUsd)),
    cashed_out: bet.cashedOut,
    cashout_multiplier: bet.cashoutMultiplier === null ? null : formatMultiplier(parseMultiplier(bet.cashoutMultiplier)),
    payout_usd: bet.payoutUsd === null ? null : formatUsd(parseUsd(bet.payoutUsd)),
  };
}

function serializeRound(round: AviatorRound, now: Date) {
  const snapshot = evaluateRound(round, now);
  return {
    id: round.id,
    status: snapshot.crashed ? "crashed" : round.status,
    start_time: round.startTime.toISOString(),
    current_multiplier: formatMultiplier(snapshot.multiplier),
    // Hidden while the round is live; once crashed, the value it stopped at.
    crash_multiplier: snapshot.crashed ? formatMultiplier(snapshot.multiplier) : null,
    crashed: snapshot.crashed,
  };
}

export async function getAviatorState(store: IStorage, user: User, now: Date) {
  const round = await store.getLatestRound();
  if (!round) throw new NotFoundError("No rounds yet");

  const bet = await store.getBet(round.id, user.chatId);
  return {
    round: serializeRound(round, now),
    bet: bet ? serializeBet(bet) : null,
  };
}

export async function getAviatorHistory(store: IStorage, limit = HISTORY_LIMIT) {
  const [crashed, latest] = await Promise.all([
    store.getRecentCrashedRounds(limit),
    store.getLatestRound(),
  ]);
  const bets = latest ? await store.getRoundBets(latest.id) : [];

  return {
    crash_points: crashed.map((r) => ({
      id: r.id,
      crash_multiplier: formatMultiplier(finalMultiplier(r)),
      crashed_at: r.crashedAt ? r.crashedAt.toISOString() : null,
    })),
    round_id: latest ? latest.id : null,
    players: bets.map((b) => ({ chat_id: b.chatId, ...serializeBet(b) })),
  };
}

export async function joinRound(store: IStorage, user: User, amount: number, now: Date) {
  if (amount < MIN_BET || amount > MAX_BET) {
    throw new BadRequestError(`Bet must be between ${formatUsd(MIN_BET)} and ${formatUsd(MAX_BET)}`);
  }

  const round = await store.getActiveRound();
  if (!round || evaluateRound(round, now).crashed) {
    throw new NoActiveRoundError();
  }
  if (await store.getBet(round.id, user.chatId)) {
    throw new DuplicateBetError();
  }

  const { bet, user: debited } = await store.placeBet({ roundId: round.id, chatId: user.chatId, amountUsd: amount });
  return {
    round_id: round.id,
    bet_id: bet.id,
    bet: formatUsd(parseUsd(bet.amountUsd)),
    ...balanceView(debited),
  };
}

export async function cashOut(store: IStorage, user: User, roundId: number | undefined, now: Date) {
  let round: AviatorRound | undefined;
  if (roundId === undefined) {
    round = await store.getActiveRound();
    if (!round) throw new NoActiveRoundError("No active round to cash out");
  } else {
    round = await store.getRound(roundId);
    if (!round) throw new NotFoundError("Round not found");
  }

  const bet = await store.getBet(round.id, user.chatId);
  if (!bet) throw new BadRequestError("No bet to cash out for user");
  if (bet.cashedOut) throw new AlreadyCashedOutError();

  const { multiplier, crashed } = evaluateRound(round, now);
  if (crashed) throw new RoundCrashedError();

  const payout = applyMultiplier(parseUsd(bet.amountUsd), multiplier);
  const { user: credited } = await store.cashOutBet({
    betId: bet.id,
    chatId: user.chatId,
    multiplier,
    payoutUsd: payout,
  });

  return {
    round_id: round.id,
    payout_usd: formatUsd(payout),
    multiplier: formatMultiplier(multiplier),
    ...balanceView(credited),
  };
}
