import crypto from "crypto";
import { z } from "zod";
import { log, errorMessage } from "../log";
import { PaymentGatewayError } from "../lib/errors";

export interface InitializeInput {
  email: string;
  amountKobo: number;
  metadata: Record<string, unknown>;
}

export interface CheckoutSession {
  authorizationUrl: string;
  reference: string;
}

export interface PaymentGateway {
  initialize(input: InitializeInput): Promise<CheckoutSession>;
  verifySignature(rawBody: Buffer | string, signature: string | undefined): boolean;
}

const initializeResponseSchema = z.object({
  status: z.boolean(),
  message: z.string().optional(),
  data: z
    .object({
      authorization_url: z.string(),
      reference: z.string(),
    })
    .optional(),
});

export const paystackEventSchema = z.object({
  event: z.string(),
  data: z
    .object({
      id: z.union([z.number(), z.string()]).optional(),
      reference: z.string().optional(),
      amount: z.coerce.number().int().nonnegative().default(0),
      metadata: z
        .object({ chat_id: z.union([z.number(), z.string()]).optional() })
        .passthrough()
        .nullish(),
    })
    .passthrough()
    .default({}),
});

export type PaystackEvent = z.infer<typeof paystackEventSchema>;

export function generateSignature(secretKey: string, payload: string | Buffer): string {
  return crypto.createHmac("sha512", secretKey).update(payload).digest("hex");
}

export function verifyPaystackSignature(
  secretKey: string,
  rawBody: Buffer | string,
  signature: string | undefined,
): boolean {
  if (!signature) return false;
  const expected = Buffer.from(generateSignature(secretKey, rawBody));
  const received = Buffer.from(signature);
  if (received.length !== expected.length) return false;
  return crypto.timingSafeEqual(received, expected);
}

export class PaystackGateway implements PaymentGateway {
  constructor(
    private readonly secretKey: string,
    private readonly baseUrl: string,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async initialize(input: InitializeInput): Promise<CheckoutSession> {
    let body: unknown;
    try {
      const res = await this.fetchImpl(`${this.baseUrl}/transaction/initialize`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.secretKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          email: input.email,
          amount: input.amountKobo,
          metadata: input.metadata,
        }),
        signal: AbortSignal.timeout(30_000),
      });
      body = await res.json();
    } catch (error) {
      log(`initialize request failed: ${errorMessage(error)}`, "paystack");
      throw new PaymentGatewayError("Paystack init failed");
    }

    const parsed = initializeResponseSchema.safeParse(body);
    if (!parsed.success || !parsed.data.status || !parsed.data.data) {
      const message = parsed.success ? parsed.data.message : undefined;
      log(`initialize rejected: ${message ?? "malformed response"}`, "paystack");
      throw new PaymentGatewayError(message ?? "Paystack init failed");
    }

    return {
      authorizationUrl: parsed.data.data.authorization_url,
      reference: parsed.data.data.reference,
    };
  }

  verifySignature(rawBody: Buffer | string, signature: string | undefined): boolean {
    return verifyPaystackSignature(this.secretKey, rawBody, signature);
  }
}
