import crypto from "node:crypto";

import { ADS, adToken, buildUtmUrl, pickAd, shouldShowAd } from "../src/ads.js";
import { assert, assertEqual } from "./helpers/assert.js";
import { test } from "./helpers/runner.js";

const SETTINGS = { enabled: true, probability: 0.5, cooldownMs: 180_000 };
const UTM = { source: "telegram", medium: "bot", campaign: "bot_ads" };

test("ads respect the switch, the cooldown and the probability", () => {
  assert(!shouldShowAd(0, 1_000_000, { ...SETTINGS, enabled: false }, () => 0), "disabled");
  assert(!shouldShowAd(900_000, 1_000_000, SETTINGS, () => 0), "within cooldown");
  assert(shouldShowAd(800_000, 1_000_000, SETTINGS, () => 0.49), "below probability");
  assert(!shouldShowAd(800_000, 1_000_000, SETTINGS, () => 0.5), "at probability");
});

test("pickAd avoids repeating the last ad", () => {
  const [first, second] = ADS;
  assert(first && second, "two ads configured");
  assertEqual(pickAd(first.id, () => 0)?.id, second.id, "skips last shown");
  assertEqual(pickAd(undefined, () => 0.99)?.id, second.id, "random choice over all");
});

test("ad token hashes uid, UTC day and ad id", () => {
  const now = new Date("2025-03-09T23:59:00Z");
  const expected = crypto.createHash("sha256").update("42:20250309:lead_form").digest("hex").slice(0, 16);
  assertEqual(adToken(42, "lead_form", now), expected, "token");
});

test("buildUtmUrl appends tracking parameters", () => {
  const now = new Date("2025-03-09T12:00:00Z");
  const url = new URL(buildUtmUrl("https://example.com/lead?ref=1", "lead_form", 42, UTM, now));
  assertEqual(url.searchParams.get("ref"), "1", "existing params kept");
  assertEqual(url.searchParams.get("utm_source"), "telegram", "source");
  assertEqual(url.searchParams.get("utm_medium"), "bot", "medium");
  assertEqual(url.searchParams.get("utm_campaign"), "bot_ads", "campaign");
  assertEqual(url.searchParams.get("utm_content"), "lead_form", "content");
  assertEqual(url.searchParams.get("token"), adToken(42, "lead_form", now), "token");
  assertEqual(buildUtmUrl("", "x", 1, UTM, now), "", "empty url");
  assertEqual(buildUtmUrl("not a url", "x", 1, UTM, now), "not a url", "invalid url returned as is");
});
