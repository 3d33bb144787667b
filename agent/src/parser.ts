/**
 * Splits raw model output into a reasoning trace and the decision array.
 *
 * The model writes free text first and a JSON array last. The text may itself
 * contain bracketed fragments ("[note]", "[1h]"), so every `[` is tried in order
 * and the first bracket-balanced slice that parses as an array of objects wins.
 */

import { MalformedResponse } from "./errors.ts";
import { isRecord, type JsonRecord } from "./json.ts";
import type { Decision, FullDecision } from "./types.ts";

const SMART_QUOTES: Array<[RegExp, string]> = [
  [/[“”„‟]/g, '"'],
  [/[‘’‚‛]/g, "'"],
];

export function normalizeQuotes(text: string): string {
  return SMART_QUOTES.reduce((acc, [re, ascii]) => acc.replace(re, ascii), text);
}

/** Index of the `]` closing the `[` at `start`, or -1. Brackets inside JSON strings are ignored. */
export function matchingBracket(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "[") depth++;
    else if (ch === "]") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function tryParseArray(slice: string): JsonRecord[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(normalizeQuotes(slice));
  } catch {
    return null;
  }
  if (!Array.isArray(parsed) || !parsed.every(isRecord)) return null;
  return parsed;
}

function str(v: unknown): string {
  return typeof v === "string" ? v : "";
}

function num(v: unknown): number {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim() !== "") {
    const n = Number(v);
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
}

/** Missing or mistyped fields fall back to "" / 0 instead of failing the batch. */
export function toDecision(raw: JsonRecord): Decision {
  return {
    symbol: str(raw.symbol).trim().toUpperCase(),
    action: str(raw.action).trim(),
    leverage: num(raw.leverage),
    positionSizeUsd: num(raw.position_size_usd),
    stopLoss: num(raw.stop_loss),
    takeProfit: num(raw.take_profit),
    confidence: num(raw.confidence),
    riskUsd: num(raw.risk_usd),
    reasoning: str(raw.reasoning),
  };
}

export interface ParsedResponse {
  reasoning: string;
  decisions: Decision[];
}

export function parseResponse(raw: string): ParsedResponse {
  const first = raw.indexOf("[");
  if (first < 0) {
    throw new MalformedResponse("no JSON array found in model response", raw.trim());
  }

  // An empty array only wins when nothing after it parses: "[]" in prose is not a decision list.
  let emptyAt = -1;
  for (let start = first; start >= 0; start = raw.indexOf("[", start + 1)) {
    const end = matchingBracket(raw, start);
    if (end < 0) continue;
    const items = tryParseArray(raw.slice(start, end + 1));
    if (!items) continue;
    if (items.length === 0) {
      if (emptyAt < 0) emptyAt = start;
      continue;
    }
    return { reasoning: raw.slice(0, start).trim(), decisions: items.map(toDecision) };
  }
  if (emptyAt >= 0) return { reasoning: raw.slice(0, emptyAt).trim(), decisions: [] };

  throw new MalformedResponse(
    "model response contains no parseable decision array",
    raw.slice(0, first).trim(),
  );
}

export function parseFullDecision(raw: string, userPrompt: string, now = new Date()): FullDecision {
  const { reasoning, decisions } = parseResponse(raw);
  return { userPrompt, reasoning, decisions, timestamp: now };
}

/** Wire shape of a decision, as the model writes it and as records store it. */
export function decisionToJson(d: Decision): Record<string, string | number> {
  return {
    symbol: d.symbol,
    action: d.action,
    leverage: d.leverage,
    position_size_usd: d.positionSizeUsd,
    stop_loss: d.stopLoss,
    take_profit: d.takeProfit,
    confidence: d.confidence,
    risk_usd: d.riskUsd,
    reasoning: d.reasoning,
  };
}
