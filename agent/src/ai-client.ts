/**
 * OpenAI-compatible chat-completions client with retry on transient failures.
 */

import { AIUnavailable, TransientNetworkError, errorMessage } from "./errors.ts";
import { asArray, asRecord, asString } from "./json.ts";
import { silentLogger, type Logger } from "./logger.ts";

export type AiProvider = "deepseek" | "qwen" | "custom";

export interface AiSettings {
  provider: AiProvider;
  baseUrl: string;
  apiKey: string;
  model: string;
}

export const PROVIDER_DEFAULTS: Readonly<Record<Exclude<AiProvider, "custom">, { baseUrl: string; model: string }>> = {
  deepseek: { baseUrl: "https://api.deepseek.com/v1", model: "deepseek-chat" },
  qwen: { baseUrl: "https://dashscope.aliyuncs.com/compatible-mode/v1", model: "qwen-plus" },
};

export interface ModelClient {
  call(systemPrompt: string, userPrompt: string): Promise<string>;
}

export interface ChatClientOptions {
  timeoutMs?: number;
  maxAttempts?: number;
  temperature?: number;
  maxTokens?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const TRANSIENT_SIGNATURES = [
  "eof",
  "timeout",
  "timed out",
  "connection reset",
  "connection refused",
  "temporary failure",
  "no such host",
  "other side closed",
  "econnreset",
  "econnrefused",
  "enotfound",
  "eai_again",
  "etimedout",
  "und_err_socket",
];

/** Flattens message, name and cause code(s) of an error chain into one lowercase string. */
function describe(err: unknown): string {
  const parts: string[] = [];
  let cur: unknown = err;
  for (let depth = 0; cur !== undefined && cur !== null && depth < 4; depth++) {
    if (cur instanceof Error) {
      parts.push(cur.name, cur.message);
      const code = asString(asRecord(cur).code);
      if (code) parts.push(code);
      cur = cur.cause;
    } else {
      parts.push(String(cur));
      break;
    }
  }
  return parts.join(" ").toLowerCase();
}

export function isTransientFailure(err: unknown): boolean {
  if (err instanceof TransientNetworkError) return true;
  const text = describe(err);
  return TRANSIENT_SIGNATURES.some((sig) => text.includes(sig));
}

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export class ChatCompletionsClient implements ModelClient {
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(
    readonly settings: AiSettings,
    private readonly opts: ChatClientOptions = {},
  ) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.sleep = opts.sleep ?? defaultSleep;
    this.logger = opts.logger ?? silentLogger;
  }

  /** Up to `maxAttempts` tries, waiting attempt × 2 s after each transient failure. */
  async call(systemPrompt: string, userPrompt: string): Promise<string> {
    const maxAttempts = this.opts.maxAttempts ?? 3;
    let lastErr: unknown;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const text = await this.callOnce(systemPrompt, userPrompt);
        if (attempt > 1) this.logger.log(`AI call succeeded on attempt ${attempt}`);
        return text;
      } catch (err) {
        if (!isTransientFailure(err)) throw err;
        lastErr = err;
        this.logger.warn(`AI call attempt ${attempt}/${maxAttempts} failed: ${errorMessage(err)}`);
        if (attempt < maxAttempts) await this.sleep(attempt * 2_000);
      }
    }
    throw new AIUnavailable(
      `AI endpoint unavailable after ${maxAttempts} attempts: ${errorMessage(lastErr)}`,
      maxAttempts,
      { cause: lastErr },
    );
  }

  private async callOnce(systemPrompt: string, userPrompt: string): Promise<string> {
    const { baseUrl, apiKey, model } = this.settings;
    let res: Response;
    try {
      res = await this.fetchImpl(`${baseUrl.replace(/\/+$/, "")}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          model,
          messages: [
            { role: "system", content: systemPrompt },
            { role: "user", content: userPrompt },
          ],
          temperature: this.opts.temperature ?? 0.5,
          max_tokens: this.opts.maxTokens ?? 2000,
        }),
        signal: AbortSignal.timeout(this.opts.timeoutMs ?? 120_000),
      });
    } catch (err) {
      if (isTransientFailure(err)) {
        throw new TransientNetworkError(`request to ${model} failed: ${errorMessage(err)}`, { cause: err });
      }
      throw err;
    }

    let body: string;
    try {
      body = await res.text();
    } catch (err) {
      // connection dropped mid-body
      throw new TransientNetworkError(`truncated response from ${model}: ${errorMessage(err)}`, { cause: err });
    }
    if (!res.ok) {
      throw new Error(`AI API error ${res.status}: ${body.slice(0, 500)}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      throw new TransientNetworkError(`unexpected EOF in response from ${model}`);
    }
    const [choice] = asArray(asRecord(parsed).choices);
    if (choice === undefined) throw new Error("AI API returned no choices");
    return asString(asRecord(asRecord(choice).message).content);
  }
}
