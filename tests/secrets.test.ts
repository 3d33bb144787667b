import { describe, it, expect, afterEach } from "vitest";
import { _clearRegisteredSecrets, redactSecrets, registerSecret } from "../server/secrets.ts";

describe("redactSecrets", () => {
  const origEnv = { ...process.env };

  afterEach(() => {
    process.env = { ...origEnv };
    _clearRegisteredSecrets();
  });

  it("returns unchanged strings without secrets", () => {
    expect(redactSecrets("some error message")).toBe("some error message");
    expect(redactSecrets("")).toBe("");
  });

  it("redacts the signing key from the environment", () => {
    const fakeKey = "a".repeat(64);
    process.env.HL_PRIVATE_KEY = fakeKey;
    expect(redactSecrets(`Error: key ${fakeKey} is invalid`)).toBe("Error: key [HL_PRIVATE_KEY] is invalid");
  });

  it("redacts every occurrence of an API secret", () => {
    process.env.BINANCE_SECRET_KEY = "test-secret";
    expect(redactSecrets("test-secret / test-secret")).toBe("[BINANCE_SECRET_KEY] / [BINANCE_SECRET_KEY]");
  });

  it("redacts secrets registered from the config file", () => {
    registerSecret("trader1.deepseek_key", "test-deepseek-key");
    expect(redactSecrets("401 for test-deepseek-key")).toBe("401 for [trader1.deepseek_key]");
  });

  it("ignores values too short to be secrets", () => {
    registerSecret("short", "abc");
    expect(redactSecrets("abc")).toBe("abc");
  });

  it("leaves values alone when the variable is unset", () => {
    delete process.env.HL_PRIVATE_KEY;
    const msg = "some random hex " + "a".repeat(64);
    expect(redactSecrets(msg)).toBe(msg);
  });
});
