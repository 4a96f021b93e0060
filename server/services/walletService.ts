import type { User } from "@shared/schema";
import type { IStorage } from "../storage";
import type { PaymentGateway, PaystackEvent } from "./paymentService";
import type { Notifier } from "./telegramBot";
import { messages } from "./telegramBot";
import { formatUsd, formatNgn, parseUsd, koboToUsd, usdToKobo } from "../lib/money";
import { BadRequestError, ServiceUnavailableError } from "../lib/errors";
import { MIN_DEPOSIT_NGN, MIN_WITHDRAW_USD } from "../constants/game";
import { balanceView, serializeWithdrawal } from "../middleware/ledger";
import { log } from "../log";

export async function createDeposit(
  store: IStorage,
  gateway: PaymentGateway | null,
  user: User,
  amountKobo: number,
) {
  if (!gateway) throw new ServiceUnavailableError("Paystack not configured");
  if (amountKobo < MIN_DEPOSIT_NGN) {
    throw new BadRequestError(`Minimum deposit is ₦${formatNgn(MIN_DEPOSIT_NGN)}`);
  }

  const session = await gateway.initialize({
    email: `${user.username || user.chatId}@tapify.local`,
    amountKobo,
    metadata: { chat_id: user.chatId },
  });

  await store.recordTransaction({
    chatId: user.chatId,
    type: "deposit",
    status: "pending",
    amountUsd: 0,
    amountNgn: amountKobo,
    affectBalance: false,
    externalRef: session.reference,
    meta: { init_ref: session.reference },
  });

  return { checkout_url: session.authorizationUrl, reference: session.reference };
}

export type DepositOutcome = "credited" | "duplicate" | "ignored";

function chatIdFrom(event: PaystackEvent): number | null {
  const raw = event.data.metadata?.chat_id;
  if (raw === undefined) return null;
  const chatId = typeof raw === "number" ? raw : Number(raw.trim());
  return Number.isSafeInteger(chatId) ? chatId : null;
}

/**
 * Applies a verified gateway event. Replays of a completed reference are
 * no-ops, so the gateway may deliver the same event any number of times.
 */
export async function handlePaystackEvent(
  store: IStorage,
  notifier: Notifier,
  event: PaystackEvent,
): Promise<DepositOutcome> {
  if (event.event !== "charge.success") return "ignored";

  const reference = event.data.reference;
  if (!reference) return "ignored";

  const amountUsd = koboToUsd(event.data.amount);
  const meta = { paystack_id: event.data.id ?? null };

  const existing = await store.getTransactionByExternalRef(reference);
  let credited: User;

  if (existing) {
    if (existing.type !== "deposit" || existing.status !== "pending") return "duplicate";
    const result = await store.completeDeposit(reference, amountUsd, meta);
    if (!result) return "duplicate";
    credited = result.user;
  } else {
    const chatId = chatIdFrom(event);
    if (chatId === null || !(await store.getUser(chatId))) {
      log(`charge ${reference} has no known chat_id, skipping`, "paystack");
      return "ignored";
    }
    const result = await store.recordTransaction({
      chatId,
      type: "deposit",
      status: "completed",
      amountUsd,
      amountNgn: event.data.amount,
      externalRef: reference,
      meta,
    });
    credited = result.user;
  }

  log(`deposit ${reference} credited ${formatUsd(amountUsd)} USD to chat ${credited.chatId}`, "paystack");
  await notifier.notify(
    credited.chatId,
    messages.depositCompleted(formatUsd(amountUsd), formatNgn(usdToKobo(amountUsd))),
  );
  return "credited";
}

export async function requestWithdrawal(store: IStorage, user: User, amountUsd: number, payout: string) {
  if (amountUsd < MIN_WITHDRAW_USD) {
    throw new BadRequestError(`Minimum withdraw is $${formatUsd(MIN_WITHDRAW_USD)}`);
  }

  const { request, user: debited } = await store.createWithdrawal({
    chatId: user.chatId,
    amountUsd: formatUsd(amountUsd),
    amountNgn: formatNgn(usdToKobo(amountUsd)),
    payout: payout.trim(),
  });

  return {
    message: "Withdrawal requested. Awaiting admin approval.",
    request_id: request.id,
    ...balanceView(debited),
  };
}

export async function listWithdrawals(store: IStorage, chatId: number) {
  const requests = await store.getUserWithdrawals(chatId);
  return requests.map(serializeWithdrawal);
}

export async function listPendingWithdrawals(store: IStorage) {
  const requests = await store.getPendingWithdrawals();
  return requests.map(serializeWithdrawal);
}

export async function approveWithdrawal(store: IStorage, notifier: Notifier, requestId: number, now: Date) {
  const request = await store.approveWithdrawal(requestId, now);
  if (!request) throw new BadRequestError("Invalid request");

  log(`withdrawal ${request.id} approved for chat ${request.chatId}`, "wallet");
  await notifier.notify(request.chatId, messages.withdrawalApproved(formatUsd(parseUsd(request.amountUsd))));
  return { message: "Withdrawal approved", request_id: request.id };
}

export async function rejectWithdrawal(
  store: IStorage,
  notifier: Notifier,
  requestId: number,
  reason: string,
  now: Date,
) {
  const result = await store.rejectWithdrawal(requestId, reason.trim(), now);
  if (!result) throw new BadRequestError("Invalid request");

  const { request } = result;
  log(`withdrawal ${request.id} rejected for chat ${request.chatId}`, "wallet");
  await notifier.notify(
    request.chatId,
    messages.withdrawalRejected(formatUsd(parseUsd(request.amountUsd)), request.reason ?? ""),
  );
  return { message: "Withdrawal rejected & funds returned", request_id: request.id };
}
