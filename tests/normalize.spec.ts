import { isLabel, langFromTelegramCode, t } from "../src/i18n.js";
import {
  cleanButtonText,
  digitsOnly,
  isSkip,
  isUnlimited,
  norm,
  normMode,
  parsePrice,
  parseRooms
} from "../src/search/normalize.js";
import { assert, assertEqual } from "./helpers/assert.js";
import { test } from "./helpers/runner.js";

test("norm trims, lower-cases and collapses whitespace", () => {
  assertEqual(norm("  Old   Town "), "old town", "whitespace collapsed");
  assertEqual(norm(undefined), "", "undefined is empty");
  assertEqual(norm(42), "42", "numbers are stringified");
});

test("normMode resolves aliases in every language and button labels", () => {
  assertEqual(normMode("Аренда"), "rent", "ru rent");
  assertEqual(normMode("SALE"), "sale", "en sale");
  assertEqual(normMode("დღიურად"), "daily", "ka daily");
  assertEqual(normMode("🏘 Аренда"), "rent", "ru button");
  assertEqual(normMode("🕓 Daily rent"), "daily", "en daily button");
  assertEqual(normMode("🏠 იყიდება"), "sale", "ka sale button");
  assertEqual(normMode("mortgage"), "", "unknown mode");
});

test("parseRooms maps studios to 0.5 and strips plus", () => {
  assertEqual(parseRooms("Студия"), 0.5, "ru studio");
  assertEqual(parseRooms("stud"), 0.5, "short studio");
  assertEqual(parseRooms("3+"), 3, "plus stripped");
  assertEqual(parseRooms("2,5"), 2.5, "comma decimal");
  assertEqual(parseRooms("many"), undefined, "unparsable");
  assertEqual(parseRooms(""), undefined, "blank");
});

test("parsePrice keeps digits and dots, blank is zero", () => {
  assertEqual(parsePrice("1 200 $"), 1200, "spaces and currency removed");
  assertEqual(parsePrice("750.50"), 750.5, "decimal kept");
  assertEqual(parsePrice(""), 0, "blank");
  assertEqual(parsePrice("договорная"), 0, "text");
  assertEqual(digitsOnly("35000$"), 35000, "digitsOnly");
  assertEqual(digitsOnly("$"), 0, "digitsOnly without digits");
});

test("skip and unlimited phrases", () => {
  assert(isSkip("Пропустить"), "ru skip");
  assert(isSkip(" skip "), "en skip");
  assert(isSkip("გამოტოვება"), "ka skip");
  assert(!isSkip("Tbilisi"), "city is not skip");
  assert(isUnlimited("Без ограничений"), "ru unlimited");
  assert(isUnlimited("no limit"), "en unlimited");
  assert(!isUnlimited("1000"), "number is not unlimited");
});

test("cleanButtonText strips leading emoji and trailing count", () => {
  assertEqual(cleanButtonText("🏙 Tbilisi (12)"), "Tbilisi", "city button");
  assertEqual(cleanButtonText("Old Town (3)"), "Old Town", "district button");
  assertEqual(cleanButtonText("Vake"), "Vake", "plain text");
});

test("i18n falls back to Russian and interpolates parameters", () => {
  assertEqual(t("en", "found", { count: 3 }), "✅ Listings found: 3", "en interpolation");
  assertEqual(t("ka", "card_counter", { index: 1, total: 2 }), "📊 განცხადება 1 / 2", "ka interpolation");
  assertEqual(t("ru", "missing_key"), "missing_key", "unknown key");
  assert(isLabel("🔎 Search", "btn_search"), "en label recognised");
  assert(isLabel("🔎 ძიება", "btn_search"), "ka label recognised");
  assertEqual(langFromTelegramCode("en-US"), "en", "region code");
  assertEqual(langFromTelegramCode("de"), "ru", "unsupported code");
});
