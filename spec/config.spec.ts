import { describe, expect, test } from "vitest";
import { loadConfig } from "../src/config";
import { ConfigError } from "../src/errors";

describe("loadConfig", () => {
  test("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      PORT: 3000,
      HOST: "0.0.0.0",
      WALLET_ADDRESSES: [],
      LOG_LEVEL: "info",
      LEDGER_TIMEOUT_MS: 5000,
      LEDGER_RETRIES: 2,
      ROLLBACK_POLICY: "undo-log",
    });
  });

  test("splits and trims the tracked addresses", () => {
    expect(loadConfig({ WALLET_ADDRESSES: " alice, bob ,,carol" }).WALLET_ADDRESSES).toEqual(["alice", "bob", "carol"]);
  });

  test("reads numeric and optional settings", () => {
    const config = loadConfig({
      PORT: "8080",
      LEDGER_URL: "http://ledger.test:3000",
      UNDO_DEPTH: "5",
      ROLLBACK_POLICY: "rescan",
    });

    expect(config.PORT).toBe(8080);
    expect(config.LEDGER_URL).toBe("http://ledger.test:3000");
    expect(config.UNDO_DEPTH).toBe(5);
    expect(config.ROLLBACK_POLICY).toBe("rescan");
  });

  test("treats empty optional settings as unset", () => {
    const config = loadConfig({ LEDGER_URL: "", DATABASE_URL: " ", UNDO_DEPTH: "" });

    expect(config.LEDGER_URL).toBeUndefined();
    expect(config.DATABASE_URL).toBeUndefined();
    expect(config.UNDO_DEPTH).toBeUndefined();
  });

  test("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "not-a-port" })).toThrow(ConfigError);
    expect(() => loadConfig({ LEDGER_URL: "ledger" })).toThrow(/LEDGER_URL/);
    expect(() => loadConfig({ ROLLBACK_POLICY: "forget" })).toThrow(/ROLLBACK_POLICY/);
    expect(() => loadConfig({ UNDO_DEPTH: "0" })).toThrow(ConfigError);
  });
});
