import type { User, Transaction, WithdrawalRequest } from "@shared/schema";
import type { IStorage } from "../storage";
import { formatUsd, formatNgn, parseUsd, parseNgn, usdToKobo } from "../lib/money";
import { NotFoundError } from "../lib/errors";
import { TRANSACTION_HISTORY_LIMIT } from "../constants/game";
import { log } from "../log";

export function balanceView(user: User) {
  const balance = parseUsd(user.balanceUsd);
  return {
    balance_usd: formatUsd(balance),
    balance_ngn: formatNgn(usdToKobo(balance)),
  };
}

export function serializeTransaction(tx: Transaction) {
  return {
    id: tx.id,
    type: tx.type,
    status: tx.status,
    amount_usd: formatUsd(parseUsd(tx.amountUsd)),
    amount_ngn: tx.amountNgn === null ? null : formatNgn(parseNgn(tx.amountNgn)),
    meta: tx.meta,
    ext: tx.externalRef,
    created_at: tx.createdAt.toISOString(),
  };
}

export function serializeWithdrawal(request: WithdrawalRequest) {
  return {
    id: request.id,
    chat_id: request.chatId,
    amount_usd: formatUsd(parseUsd(request.amountUsd)),
    amount_ngn: formatNgn(parseNgn(request.amountNgn)),
    payout: request.payout,
    status: request.status,
    reason: request.reason,
    created_at: request.createdAt.toISOString(),
    decided_at: request.decidedAt ? request.decidedAt.toISOString() : null,
  };
}

export async function getUserLedger(store: IStorage, chatId: number, limit = TRANSACTION_HISTORY_LIMIT) {
  const entries = await store.getUserTransactions(chatId, limit);
  return entries.map(serializeTransaction);
}

/**
 * Recomputes the stored balance from the ledger. Rejected entries never
 * moved money and are left out; reversed holds stay in, offset by their
 * withdraw_revert credit.
 */
export async function reconcileUserBalance(store: IStorage, chatId: number) {
  const before = await store.getUser(chatId);
  if (!before) throw new NotFoundError("User not found");

  const after = await store.reconcileBalance(chatId);
  if (!after) throw new NotFoundError("User not found");

  const drift = parseUsd(after.balanceUsd) - parseUsd(before.balanceUsd);
  if (drift !== 0) {
    log(`balance drift of ${formatUsd(drift)} USD corrected for chat ${chatId}`, "ledger");
  }

  return {
    chat_id: chatId,
    previous_balance_usd: formatUsd(parseUsd(before.balanceUsd)),
    balance_usd: formatUsd(parseUsd(after.balanceUsd)),
    drift_usd: formatUsd(drift),
  };
}
