import type { Request } from "express";
import { BadRequestError } from "./errors";
import type { PlayerIdentity } from "../services/userService";

function bodyField(body: unknown, key: string): unknown {
  if (typeof body !== "object" || body === null || !(key in body)) return undefined;
  return Object.entries(body).find(([k]) => k === key)?.[1];
}

function queryField(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === "string" ? value : undefined;
}

function present(value: unknown): boolean {
  return value !== undefined && value !== null && value !== "";
}

/**
 * Reads the Telegram chat id from the JSON body, then the query string, then
 * the X-Chat-Id header; the optional username from the body or query.
 */
export function readPlayerIdentity(req: Request): PlayerIdentity {
  const fromBody = bodyField(req.body, "chat_id");
  const raw = present(fromBody) ? fromBody : queryField(req, "chat_id") ?? req.get("X-Chat-Id");

  if (!present(raw)) {
    throw new BadRequestError("Missing chat_id. Launch from Telegram WebApp button or append ?chat_id=...");
  }

  let chatId: number;
  if (typeof raw === "number") {
    chatId = raw;
  } else if (typeof raw === "string" && /^-?\d+$/.test(raw.trim())) {
    chatId = Number(raw.trim());
  } else {
    throw new BadRequestError("chat_id must be numeric");
  }
  if (!Number.isSafeInteger(chatId)) {
    throw new BadRequestError("chat_id must be numeric");
  }

  const bodyName = bodyField(req.body, "username");
  const username = typeof bodyName === "string" && bodyName ? bodyName : queryField(req, "username");
  return { chatId, username: username ?? null };
}
