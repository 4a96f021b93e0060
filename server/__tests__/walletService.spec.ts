import { beforeEach, describe, expect, it, vi } from "vitest";
import type { User } from "@shared/schema";
import { MemStorage } from "../memStorage";
import { parseNgn, parseUsd } from "../lib/money";
import {
  BadRequestError,
  InsufficientBalanceError,
  PaymentGatewayError,
  ServiceUnavailableError,
} from "../lib/errors";
import {
  PaystackGateway,
  generateSignature,
  paystackEventSchema,
  verifyPaystackSignature,
  type PaymentGateway,
} from "../services/paymentService";
import { messages, type Notifier } from "../services/telegramBot";
import {
  approveWithdrawal,
  createDeposit,
  handlePaystackEvent,
  listPendingWithdrawals,
  listWithdrawals,
  rejectWithdrawal,
  requestWithdrawal,
} from "../services/walletService";
import { reconcileUserBalance } from "../middleware/ledger";

const T0 = new Date("2026-03-01T12:00:00.000Z");

function fakeGateway(reference = "ref-1"): PaymentGateway {
  return {
    initialize: vi.fn(async () => ({ authorizationUrl: `https://checkout.test/${reference}`, reference })),
    verifySignature: vi.fn(() => true),
  };
}

function fakeNotifier() {
  return { notify: vi.fn(async () => true) } satisfies Notifier;
}

function chargeSuccess(reference: string, amountKobo: number, chatId?: number | string) {
  return paystackEventSchema.parse({
    event: "charge.success",
    data: { id: 99, reference, amount: amountKobo, metadata: chatId === undefined ? null : { chat_id: chatId } },
  });
}

describe("deposits", () => {
  let store: MemStorage;
  let user: User;

  beforeEach(async () => {
    store = new MemStorage();
    user = await store.createUser({ chatId: 7, username: "alice" }, T0);
  });

  it("initializes a checkout and records a pending deposit", async () => {
    const gateway = fakeGateway();
    const result = await createDeposit(store, gateway, user, parseNgn("500"));

    expect(result).toEqual({ checkout_url: "https://checkout.test/ref-1", reference: "ref-1" });
    expect(gateway.initialize).toHaveBeenCalledWith({
      email: "alice@tapify.local",
      amountKobo: 50000,
      metadata: { chat_id: 7 },
    });
    expect(await store.getTransactionByExternalRef("ref-1")).toMatchObject({
      type: "deposit",
      status: "pending",
      amountUsd: "0.0000",
      amountNgn: "500.00",
      meta: { init_ref: "ref-1" },
    });
    expect((await store.getUser(7))?.balanceUsd).toBe("0.0000");
  });

  it("enforces the minimum deposit and a configured gateway", async () => {
    await expect(createDeposit(store, fakeGateway(), user, parseNgn("99.99"))).rejects.toThrow(
      "Minimum deposit is ₦100.00",
    );
    await expect(createDeposit(store, null, user, parseNgn("500"))).rejects.toBeInstanceOf(ServiceUnavailableError);
  });

  it("completes the pending deposit on charge.success and notifies the player", async () => {
    await createDeposit(store, fakeGateway(), user, parseNgn("500"));
    const notifier = fakeNotifier();

    expect(await handlePaystackEvent(store, notifier, chargeSuccess("ref-1", 50000, 7))).toBe("credited");

    expect((await store.getUser(7))?.balanceUsd).toBe("0.5000");
    expect(await store.getTransactionByExternalRef("ref-1")).toMatchObject({
      status: "completed",
      amountUsd: "0.5000",
      amountNgn: "500.00",
      meta: { init_ref: "ref-1", paystack_id: 99 },
    });
    expect(notifier.notify).toHaveBeenCalledWith(7, messages.depositCompleted("0.5000", "500.00"));
  });

  it("ignores replays of a completed reference", async () => {
    await createDeposit(store, fakeGateway(), user, parseNgn("500"));
    const notifier = fakeNotifier();
    await handlePaystackEvent(store, notifier, chargeSuccess("ref-1", 50000, 7));

    expect(await handlePaystackEvent(store, notifier, chargeSuccess("ref-1", 50000, 7))).toBe("duplicate");
    expect((await store.getUser(7))?.balanceUsd).toBe("0.5000");
    expect(notifier.notify).toHaveBeenCalledTimes(1);
  });

  it("credits an unseen reference to the chat named in its metadata", async () => {
    const notifier = fakeNotifier();
    expect(await handlePaystackEvent(store, notifier, chargeSuccess("ref-direct", 250000, "7"))).toBe("credited");

    expect((await store.getUser(7))?.balanceUsd).toBe("2.5000");
    expect(await store.getTransactionByExternalRef("ref-direct")).toMatchObject({
      chatId: 7,
      status: "completed",
      amountNgn: "2500.00",
    });
  });

  it("skips events it cannot attribute", async () => {
    const notifier = fakeNotifier();
    expect(await handlePaystackEvent(store, notifier, chargeSuccess("ref-x", 50000, 404))).toBe("ignored");
    expect(await handlePaystackEvent(store, notifier, chargeSuccess("ref-y", 50000))).toBe("ignored");
    expect(
      await handlePaystackEvent(store, notifier, paystackEventSchema.parse({ event: "transfer.success", data: {} })),
    ).toBe("ignored");
    expect(notifier.notify).not.toHaveBeenCalled();
  });
});

describe("withdrawals", () => {
  let store: MemStorage;
  let user: User;

  beforeEach(async () => {
    store = new MemStorage();
    user = await store.createUser({ chatId: 3, username: "bob" }, T0);
    await store.recordTransaction({ chatId: 3, type: "deposit", status: "completed", amountUsd: parseUsd("80.00") });
  });

  it("holds the amount and queues a pending request", async () => {
    const result = await requestWithdrawal(store, user, parseUsd("60"), "  bank:0001  ");

    expect(result).toEqual({
      message: "Withdrawal requested. Awaiting admin approval.",
      request_id: 1,
      balance_usd: "20.0000",
      balance_ngn: "20000.00",
    });
    const [request] = await listWithdrawals(store, 3);
    expect(request).toMatchObject({ amount_usd: "60.0000", amount_ngn: "60000.00", payout: "bank:0001", status: "pending" });
    const [hold] = await store.getUserTransactions(3, 1);
    expect(hold).toMatchObject({ type: "withdraw", status: "pending", amountUsd: "-60.0000" });
  });

  it("enforces the minimum and the balance", async () => {
    await expect(requestWithdrawal(store, user, parseUsd("49.99"), "")).rejects.toThrow("Minimum withdraw is $50.0000");
    await expect(requestWithdrawal(store, user, parseUsd("90"), "")).rejects.toBeInstanceOf(InsufficientBalanceError);
    expect(await listPendingWithdrawals(store)).toEqual([]);
  });

  it("approves a pending request once", async () => {
    await requestWithdrawal(store, user, parseUsd("60"), "bank:0001");
    const notifier = fakeNotifier();

    expect(await approveWithdrawal(store, notifier, 1, T0)).toEqual({ message: "Withdrawal approved", request_id: 1 });
    expect(await store.getWithdrawal(1)).toMatchObject({ status: "approved", decidedAt: T0 });
    const [hold] = await store.getUserTransactions(3, 1);
    expect(hold.status).toBe("approved");
    expect(notifier.notify).toHaveBeenCalledWith(3, messages.withdrawalApproved("60.0000"));

    await expect(approveWithdrawal(store, notifier, 1, T0)).rejects.toBeInstanceOf(BadRequestError);
    expect((await store.getUser(3))?.balanceUsd).toBe("20.0000");
  });

  it("rejects a request, reverses the hold and returns the funds", async () => {
    await requestWithdrawal(store, user, parseUsd("60"), "bank:0001");
    const notifier = fakeNotifier();

    expect(await rejectWithdrawal(store, notifier, 1, " wrong account ", T0)).toEqual({
      message: "Withdrawal rejected & funds returned",
      request_id: 1,
    });
    expect(await store.getWithdrawal(1)).toMatchObject({ status: "rejected", reason: "wrong account" });
    expect((await store.getUser(3))?.balanceUsd).toBe("80.0000");

    const [revert, hold] = await store.getUserTransactions(3, 2);
    expect(revert).toMatchObject({ type: "withdraw_revert", status: "approved", amountUsd: "60.0000" });
    expect(hold).toMatchObject({ type: "withdraw", status: "reversed" });
    expect(notifier.notify).toHaveBeenCalledWith(3, messages.withdrawalRejected("60.0000", "wrong account"));

    await expect(rejectWithdrawal(store, notifier, 1, "", T0)).rejects.toThrow("Invalid request");
  });

  it("keeps the ledger and the balance in agreement after a rejection", async () => {
    await requestWithdrawal(store, user, parseUsd("60"), "bank:0001");
    await rejectWithdrawal(store, fakeNotifier(), 1, "", T0);

    expect(await reconcileUserBalance(store, 3)).toEqual({
      chat_id: 3,
      previous_balance_usd: "80.0000",
      balance_usd: "80.0000",
      drift_usd: "0.0000",
    });
  });
});

describe("paystack signatures", () => {
  const body = JSON.stringify({ event: "charge.success", data: { reference: "ref-1" } });

  it("accepts the HMAC-SHA512 of the raw body", () => {
    const signature = generateSignature("test-secret", body);
    expect(signature).toMatch(/^[0-9a-f]{128}$/);
    expect(verifyPaystackSignature("test-secret", Buffer.from(body), signature)).toBe(true);
  });

  it("rejects tampered bodies, other keys and missing headers", () => {
    const signature = generateSignature("test-secret", body);
    expect(verifyPaystackSignature("test-secret", body.replace("ref-1", "ref-2"), signature)).toBe(false);
    expect(verifyPaystackSignature("other-secret", body, signature)).toBe(false);
    expect(verifyPaystackSignature("test-secret", body, undefined)).toBe(false);
    expect(verifyPaystackSignature("test-secret", body, "abc")).toBe(false);
  });
});

describe("PaystackGateway", () => {
  it("posts the amount in kobo and returns the checkout session", async () => {
    const fetchMock = vi.fn(async (..._args: Parameters<typeof fetch>) =>
      new Response(JSON.stringify({
        status: true,
        message: "Authorization URL created",
        data: { authorization_url: "https://checkout.test/r1", reference: "r1" },
      })),
    );
    const gateway = new PaystackGateway("test-secret", "https://api.paystack.test", fetchMock);

    const session = await gateway.initialize({ email: "7@tapify.local", amountKobo: 50000, metadata: { chat_id: 7 } });

    expect(session).toEqual({ authorizationUrl: "https://checkout.test/r1", reference: "r1" });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://api.paystack.test/transaction/initialize");
    expect(JSON.parse(String(init?.body))).toEqual({ email: "7@tapify.local", amount: 50000, metadata: { chat_id: 7 } });
    expect(new Headers(init?.headers).get("Authorization")).toBe("Bearer test-secret");
  });

  it("surfaces a refused initialization as a gateway error", async () => {
    const fetchMock = vi.fn(async (..._args: Parameters<typeof fetch>) =>
      new Response(JSON.stringify({ status: false, message: "Invalid key" })),
    );
    const gateway = new PaystackGateway("test-secret", "https://api.paystack.test", fetchMock);

    const attempt = gateway.initialize({ email: "7@tapify.local", amountKobo: 50000, metadata: {} });
    await expect(attempt).rejects.toBeInstanceOf(PaymentGatewayError);
    await expect(attempt).rejects.toThrow("Invalid key");
  });
});
