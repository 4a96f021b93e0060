import { z } from "zod";
import { log, errorMessage } from "../log";

const TELEGRAM_API = "https://api.telegram.org/bot";

export interface Notifier {
  notify(chatId: number, text: string): Promise<boolean>;
}

const apiResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

async function callApi(
  token: string,
  method: string,
  params: Record<string, unknown>,
  fetchImpl: typeof fetch,
): Promise<boolean> {
  try {
    const res = await fetchImpl(`${TELEGRAM_API}${token}/${method}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(params),
    });
    const data = apiResponseSchema.safeParse(await res.json());
    if (!data.success) {
      log(`API error (${method}): unexpected response`, "telegram");
      return false;
    }
    if (!data.data.ok) {
      log(`API error (${method}): ${data.data.description ?? "Unknown error"}`, "telegram");
    }
    return data.data.ok;
  } catch (error) {
    log(`Request failed (${method}): ${errorMessage(error)}`, "telegram");
    return false;
  }
}

/** Sends direct messages through the Bot API; a no-op without a token. */
export function createTelegramNotifier(token: string | undefined, fetchImpl: typeof fetch = fetch): Notifier {
  return {
    async notify(chatId, text) {
      if (!token) return false;
      return callApi(token, "sendMessage", { chat_id: chatId, text, parse_mode: "HTML" }, fetchImpl);
    },
  };
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export const messages = {
  depositCompleted: (usd: string, ngn: string) =>
    `✅ Deposit received: ₦${ngn} (<b>$${usd}</b>) has been added to your balance.`,
  withdrawalApproved: (usd: string) =>
    `💸 Your withdrawal of <b>$${usd}</b> was approved and is on its way.`,
  withdrawalRejected: (usd: string, reason: string) =>
    `⚠️ Your withdrawal of <b>$${usd}</b> was rejected${reason ? `: ${escapeHtml(reason)}` : ""}. The funds are back in your balance.`,
};
