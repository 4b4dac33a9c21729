import { ConfigError, loadConfig } from "../src/config.js";
import { assert, assertEqual } from "./helpers/assert.js";
import { test } from "./helpers/runner.js";

test("config applies defaults", () => {
  const config = loadConfig({ BOT_TOKEN: "test-token" });
  assertEqual(config.GSHEET_TAB, "Ads", "tab");
  assertEqual(config.GSHEET_REFRESH_SEC, 120, "refresh");
  assertEqual(config.ADS_PROB, 0.18, "ad probability");
  assertEqual(config.ADMIN_CHAT_ID, 0, "no admin");
  assertEqual(config.ZERO_PRICE_PASSES, true, "zero price passes");
  assertEqual(config.SESSION_TTL_SEC, 0, "sessions never expire");
  assertEqual(config.DB_PATH, "liveplace_stats.db", "db path");
});

test("config reads token aliases and booleans", () => {
  const config = loadConfig({
    TELEGRAM_BOT_TOKEN: "test-token",
    ADS_ENABLED: "no",
    SHEETS_ENABLED: "1",
    ZERO_PRICE_PASSES: "false",
    ADMIN_CHAT_ID: "-100123",
    PORT: ""
  });
  assertEqual(config.BOT_TOKEN, "test-token", "alias token");
  assertEqual(config.ADS_ENABLED, false, "ads disabled");
  assertEqual(config.SHEETS_ENABLED, true, "sheets enabled");
  assertEqual(config.ZERO_PRICE_PASSES, false, "flag off");
  assertEqual(config.ADMIN_CHAT_ID, -100123, "admin chat");
  assertEqual(config.PORT, 3000, "blank uses default");
});

test("missing token is a configuration error", () => {
  let caught: unknown;
  try {
    loadConfig({ BOT_TOKEN: "  " });
  } catch (err) {
    caught = err;
  }
  assert(caught instanceof ConfigError, "ConfigError thrown");
  assert(caught.message.includes("BOT_TOKEN"), "names the variable");
});

test("invalid numbers are rejected", () => {
  let caught: unknown;
  try {
    loadConfig({ BOT_TOKEN: "test-token", ADS_PROB: "2" });
  } catch (err) {
    caught = err;
  }
  assert(caught instanceof ConfigError, "ConfigError thrown");
  assert(caught.message.includes("ADS_PROB"), "names the variable");
});
