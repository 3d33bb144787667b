import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { DEFAULT_KEY_ENV, isAddress, loadPrivateKey, parsePrivateKey } from "../agent/src/keyloader.ts";

const keyDir = fs.mkdtempSync(path.join(os.tmpdir(), "keys-"));

function keyFile(name: string, content: string): string {
  const p = path.join(keyDir, name);
  fs.writeFileSync(p, content);
  return p;
}

describe("loadPrivateKey", () => {
  beforeEach(() => {
    delete process.env[DEFAULT_KEY_ENV];
    delete process.env.OTHER_KEY;
  });

  afterEach(() => {
    delete process.env[DEFAULT_KEY_ENV];
    delete process.env.OTHER_KEY;
  });

  it("returns null when nothing is configured", () => {
    expect(loadPrivateKey()).toBeNull();
  });

  it("rejects a short env key", () => {
    process.env[DEFAULT_KEY_ENV] = "abc123";
    expect(() => loadPrivateKey()).toThrow(
      "Invalid key format in HL_PRIVATE_KEY: expected 64 hex chars (with or without 0x)",
    );
  });

  it("rejects non-hex env keys", () => {
    process.env[DEFAULT_KEY_ENV] = "g".repeat(64);
    expect(() => loadPrivateKey()).toThrow(/Invalid key format/);
  });

  it("adds the 0x prefix", () => {
    process.env[DEFAULT_KEY_ENV] = "a".repeat(64);
    expect(loadPrivateKey()).toBe("0x" + "a".repeat(64));
  });

  it("reads a custom variable", () => {
    process.env.OTHER_KEY = "0x" + "b".repeat(64);
    expect(loadPrivateKey({ keyEnv: "OTHER_KEY" })).toBe("0x" + "b".repeat(64));
  });

  it("prefers the key file over the environment", () => {
    process.env[DEFAULT_KEY_ENV] = "a".repeat(64);
    const file = keyFile("valid.txt", "c".repeat(64) + "\n");
    expect(loadPrivateKey({ keyFile: file })).toBe("0x" + "c".repeat(64));
  });

  it("throws when the key file is missing", () => {
    expect(() => loadPrivateKey({ keyFile: "/nonexistent/path/key.txt" })).toThrow(
      "Key file not found: /nonexistent/path/key.txt",
    );
  });

  it("throws when the key file is malformed", () => {
    const file = keyFile("invalid.txt", "not-64-hex-chars");
    expect(() => loadPrivateKey({ keyFile: file })).toThrow("Invalid key format in key file");
  });
});

describe("parsePrivateKey", () => {
  it("accepts config values with or without 0x", () => {
    expect(parsePrivateKey("d".repeat(64))).toBe("0x" + "d".repeat(64));
    expect(parsePrivateKey(" 0X" + "d".repeat(64))).toBe("0x" + "d".repeat(64));
    expect(() => parsePrivateKey("0x1234")).toThrow("Invalid key format in config");
  });
});

describe("isAddress", () => {
  it("checks 20-byte hex addresses", () => {
    expect(isAddress("0x" + "1".repeat(40))).toBe(true);
    expect(isAddress("1".repeat(40))).toBe(false);
    expect(isAddress("0x" + "1".repeat(64))).toBe(false);
  });
});
