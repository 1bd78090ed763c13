// src/services/paymentGateway.ts
import { z } from "zod";
import { GatewayError } from "../lib/errors";

export type GatewayVerification =
  | { status: "success"; amount: number }
  | { status: "failure"; reason: string };

export interface PaymentGateway {
  verify(reference: string): Promise<GatewayVerification>;
}

export interface HttpGatewayOptions {
  baseUrl: string;
  secretKey: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs?: number;
  fetchImpl?: typeof fetch;
}

const verifyResponse = z.object({
  data: z.object({
    status: z.string(),
    amount: z.number(),
    gateway_response: z.string().optional(),
  }),
});

class TransientGatewayError extends Error {}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Verifies a transaction reference against the gateway's
 * `GET /transaction/verify/:reference` endpoint. Timeouts, network errors
 * and 5xx responses are retried up to `retries` times; a definitive answer
 * (success or failure) is returned as-is.
 */
export class HttpPaymentGateway implements PaymentGateway {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpGatewayOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async verify(reference: string): Promise<GatewayVerification> {
    if (!this.options.baseUrl) throw new GatewayError("Payment gateway is not configured");

    const attempts = Math.max(0, this.options.retries) + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await this.attempt(reference);
      } catch (err) {
        if (!(err instanceof TransientGatewayError) && !isNetworkFailure(err) && !isAbort(err)) throw err;
        lastError = err;
        console.warn(`Payment gateway verify attempt ${attempt}/${attempts} failed for ${reference}:`, errorMessage(err));
        if (attempt < attempts) await sleep(this.options.retryDelayMs ?? 500 * attempt);
      }
    }

    throw new GatewayError("Payment gateway unavailable, the payment is still pending", {
      reference,
      error: errorMessage(lastError),
    });
  }

  private async attempt(reference: string): Promise<GatewayVerification> {
    const url = `${this.options.baseUrl.replace(/\/$/, "")}/transaction/verify/${encodeURIComponent(reference)}`;
    const res = await this.fetchImpl(url, {
      headers: { Authorization: `Bearer ${this.options.secretKey}`, Accept: "application/json" },
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (res.status >= 500) throw new TransientGatewayError(`Gateway responded ${res.status}`);
    if (!res.ok) return { status: "failure", reason: `Gateway rejected reference (${res.status})` };

    const parsed = verifyResponse.safeParse(await res.json());
    if (!parsed.success) throw new GatewayError("Unexpected response from payment gateway", parsed.error.issues);

    const { status, amount, gateway_response } = parsed.data.data;
    return status === "success"
      ? { status: "success", amount }
      : { status: "failure", reason: gateway_response || `Transaction ${status}` };
  }
}

// fetch reports connection failures as a TypeError carrying the socket error as `cause`
const isNetworkFailure = (err: unknown) => err instanceof TypeError && err.cause !== undefined;

const isAbort = (err: unknown) =>
  err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));
