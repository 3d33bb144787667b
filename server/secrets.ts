/**
 * Secrets handling: never log or expose.
 */

const SENSITIVE_KEYS = [
  "HL_PRIVATE_KEY",
  "BINANCE_API_KEY",
  "BINANCE_SECRET_KEY",
  "DEEPSEEK_API_KEY",
  "QWEN_API_KEY",
  "CUSTOM_API_KEY",
];

const extraSecrets = new Map<string, string>();

/** Registers a secret read from config.json so it is redacted too. */
export function registerSecret(label: string, value: string): void {
  if (value.length >= 8) extraSecrets.set(value, label);
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Redact sensitive values from strings. Use when logging errors. */
export function redactSecrets(str: string): string {
  let out = str;
  for (const key of SENSITIVE_KEYS) {
    const val = process.env[key];
    if (val && out.includes(val)) {
      out = out.replace(new RegExp(escapeRegExp(val), "g"), `[${key}]`);
    }
  }
  for (const [val, label] of extraSecrets) {
    if (out.includes(val)) out = out.replace(new RegExp(escapeRegExp(val), "g"), `[${label}]`);
  }
  return out;
}

/** Test hook. */
export function _clearRegisteredSecrets(): void {
  extraSecrets.clear();
}
