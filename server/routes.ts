import type { Express, Request, Response } from "express";
import type { Server } from "http";
import { z } from "zod";
import type { User } from "@shared/schema";
import type { IStorage } from "./storage";
import type { PaymentGateway } from "./services/paymentService";
import type { Notifier } from "./services/telegramBot";
import { paystackEventSchema } from "./services/paymentService";
import { log, errorMessage } from "./log";
import { parseUsd, parseNgn } from "./lib/money";
import { DomainError } from "./lib/errors";
import { readPlayerIdentity } from "./lib/identify";
import { requireAdmin } from "./middleware/adminAuth";
import { getUserLedger, reconcileUserBalance } from "./middleware/ledger";
import { getOrCreateUser, getProfile } from "./services/userService";
import { processTap } from "./services/tapService";
import { submitSteps, upgradeWalkLevel, listWalkLevels } from "./services/walkService";
import { getAviatorState, getAviatorHistory, joinRound, cashOut } from "./services/aviatorService";
import {
  createDeposit,
  handlePaystackEvent,
  requestWithdrawal,
  listWithdrawals,
  listPendingWithdrawals,
  approveWithdrawal,
  rejectWithdrawal,
} from "./services/walletService";

export interface RouteDeps {
  store: IStorage;
  gateway: PaymentGateway | null;
  notifier: Notifier;
  adminToken: string;
  now?: () => Date;
}

function decimalAmount(parse: (value: string | number) => number) {
  return z.union([z.number(), z.string()]).transform((value, ctx) => {
    try {
      return parse(value);
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(error) });
      return z.NEVER;
    }
  });
}

const tapSchema = z.object({ count: z.coerce.number().default(1) });
const stepsSchema = z.object({ steps: z.coerce.number().int() });
const upgradeSchema = z.object({ target_level: z.coerce.number().int() });
const joinSchema = z.object({ bet: decimalAmount(parseUsd) });
const cashoutSchema = z.object({ round_id: z.coerce.number().int().positive().nullish() });
const depositSchema = z.object({ amount_ngn: decimalAmount(parseNgn) });
const withdrawSchema = z.object({
  amount: decimalAmount(parseUsd),
  payout: z.string().max(256).default(""),
});
const decisionSchema = z.object({ request_id: z.coerce.number().int().positive() });
const rejectSchema = decisionSchema.extend({ reason: z.string().max(500).default("") });
const chatIdParamSchema = z.coerce.number().int();

function sendError(res: Response, error: unknown, context: string) {
  if (error instanceof z.ZodError) {
    const issue = error.issues[0];
    const message = issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "Invalid request";
    return res.status(400).json({ ok: false, error: message });
  }
  if (error instanceof DomainError) {
    return res.status(error.status).json({ ok: false, error: error.message, ...error.details });
  }
  log(`${context} error: ${errorMessage(error)}`);
  return res.status(500).json({ ok: false, error: `Failed to ${context}` });
}

export async function registerRoutes(httpServer: Server, app: Express, deps: RouteDeps): Promise<Server> {
  const { store, gateway, notifier } = deps;
  const now = deps.now ?? (() => new Date());
  const adminOnly = requireAdmin(deps.adminToken);

  async function resolvePlayer(req: Request): Promise<User> {
    return getOrCreateUser(store, readPlayerIdentity(req), now());
  }

  app.get("/", (_req, res) => {
    res.type("text/plain").send("OK");
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true, time: now().toISOString() });
  });

  app.get("/api/user", async (req, res) => {
    try {
      const user = await resolvePlayer(req);
      res.json({ ok: true, ...(await getProfile(store, user, now())) });
    } catch (error) {
      sendError(res, error, "get user");
    }
  });

  app.post("/api/tap", async (req, res) => {
    try {
      const user = await resolvePlayer(req);
      const { count } = tapSchema.parse(req.body ?? {});
      res.json({ ok: true, ...(await processTap(store, user, count, now())) });
    } catch (error) {
      sendError(res, error, "process tap");
    }
  });

  app.post("/api/steps", async (req, res) => {
    try {
      const user = await resolvePlayer(req);
      const { steps } = stepsSchema.parse(req.body ?? {});
      res.json({ ok: true, ...(await submitSteps(store, user, steps, now())) });
    } catch (error) {
      sendError(res, error, "submit steps");
    }
  });

  app.post("/api/upgrade", async (req, res) => {
    try {
      const user = await resolvePlayer(req);
      const { target_level } = upgradeSchema.parse(req.body ?? {});
      res.json({ ok: true, ...(await upgradeWalkLevel(store, user, target_level)) });
    } catch (error) {
      sendError(res, error, "upgrade");
    }
  });

  app.get("/api/walk/levels", (_req, res) => {
    res.json({ ok: true, levels: listWalkLevels() });
  });

  app.get("/api/aviator/state", async (req, res) => {
    try {
      const user = await resolvePlayer(req);
      res.json({ ok: true, ...(await getAviatorState(store, user, now())) });
    } catch (error) {
      sendError(res, error, "get aviator state");
    }
  });

  app.get("/api/aviator/history", async (_req, res) => {
    try {
      res.json({ ok: true, ...(await getAviatorHistory(store)) });
    } catch (error) {
      sendError(res, error, "get aviator history");
    }
  });

  app.post("/api/aviator/join", async (req, res) => {
    try {
      const user = await resolvePlayer(req);
      const { bet } = joinSchema.parse(req.body ?? {});
      res.json({ ok: true, ...(await joinRound(store, user, bet, now())) });
    } catch (error) {
      sendError(res, error, "join round");
    }
  });

  app.post("/api/aviator/cashout", async (req, res) => {
    try {
      const user = await resolvePlayer(req);
      const { round_id } = cashoutSchema.parse(req.body ?? {});
      res.json({ ok: true, ...(await cashOut(store, user, round_id ?? undefined, now())) });
    } catch (error) {
      sendError(res, error, "cash out");
    }
  });

  app.post("/api/deposit", async (req, res) => {
    try {
      const user = await resolvePlayer(req);
      const { amount_ngn } = depositSchema.parse(req.body ?? {});
      res.json({ ok: true, ...(await createDeposit(store, gateway, user, amount_ngn)) });
    } catch (error) {
      sendError(res, error, "create deposit");
    }
  });

  app.post("/api/webhook/paystack", async (req, res) => {
    try {
      const signature = req.get("x-paystack-signature");
      if (!gateway || !req.rawBody || !gateway.verifySignature(req.rawBody, signature)) {
        return res.status(403).json({ ok: false, error: "Invalid signature" });
      }

      const event = paystackEventSchema.safeParse(req.body);
      if (!event.success) {
        log("webhook payload did not match the expected shape", "paystack");
      } else {
        await handlePaystackEvent(store, notifier, event.data);
      }
      res.status(200).send("OK");
    } catch (error) {
      sendError(res, error, "process webhook");
    }
  });

  app.post("/api/withdraw", async (req, res) => {
    try {
      const user = await resolvePlayer(req);
      const { amount, payout } = withdrawSchema.parse(req.body ?? {});
      res.json({ ok: true, ...(await requestWithdrawal(store, user, amount, payout)) });
    } catch (error) {
      sendError(res, error, "request withdrawal");
    }
  });

  app.get("/api/withdrawals", async (req, res) => {
    try {
      const user = await resolvePlayer(req);
      res.json({ ok: true, items: await listWithdrawals(store, user.chatId) });
    } catch (error) {
      sendError(res, error, "list withdrawals");
    }
  });

  app.get("/api/transactions", async (req, res) => {
    try {
      const user = await resolvePlayer(req);
      res.json({ ok: true, items: await getUserLedger(store, user.chatId) });
    } catch (error) {
      sendError(res, error, "list transactions");
    }
  });

  app.post("/api/admin/withdraw/approve", adminOnly, async (req, res) => {
    try {
      const { request_id } = decisionSchema.parse(req.body ?? {});
      res.json({ ok: true, ...(await approveWithdrawal(store, notifier, request_id, now())) });
    } catch (error) {
      sendError(res, error, "approve withdrawal");
    }
  });

  app.post("/api/admin/withdraw/reject", adminOnly, async (req, res) => {
    try {
      const { request_id, reason } = rejectSchema.parse(req.body ?? {});
      res.json({ ok: true, ...(await rejectWithdrawal(store, notifier, request_id, reason, now())) });
    } catch (error) {
      sendError(res, error, "reject withdrawal");
    }
  });

  app.get("/api/admin/withdrawals/pending", adminOnly, async (_req, res) => {
    try {
      res.json({ ok: true, items: await listPendingWithdrawals(store) });
    } catch (error) {
      sendError(res, error, "list pending withdrawals");
    }
  });

  app.post("/api/admin/users/:chatId/reconcile", adminOnly, async (req, res) => {
    try {
      const chatId = chatIdParamSchema.parse(req.params.chatId);
      res.json({ ok: true, ...(await reconcileUserBalance(store, chatId)) });
    } catch (error) {
      sendError(res, error, "reconcile balance");
    }
  });

  return httpServer;
}
