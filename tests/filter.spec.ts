import {
  countDistinct,
  filterListings,
  matchesCriteria,
  parsePriceRange,
  sortByPublishedDesc
} from "../src/search/filter.js";
import { assert, assertDeepEqual, assertEqual } from "./helpers/assert.js";
import { listing, sampleListings } from "./helpers/listings.js";
import { test } from "./helpers/runner.js";

const ids = (rows: { id?: string }[]) => rows.map((row) => row.id);

test("empty criteria keep every listing", () => {
  const rows = sampleListings();
  assertDeepEqual(ids(filterListings(rows, {})), ["a", "b", "c", "d", "e"], "identity filter");
  assertDeepEqual(
    ids(filterListings(rows, { mode: "", city: "", district: "", rooms: "" })),
    ["a", "b", "c", "d", "e"],
    "empty strings are wildcards"
  );
});

test("rent in Tbilisi with 2 rooms keeps matches in snapshot order", () => {
  const result = filterListings(sampleListings(), { mode: "rent", city: "Tbilisi", rooms: "2" });
  assertDeepEqual(ids(result), ["a", "d"], "two matches in original order");
});

test("mode mismatch excludes and aliases match", () => {
  const rows = [listing({ id: "x", mode: "Аренда" }), listing({ id: "y", mode: "sale" })];
  assertDeepEqual(ids(filterListings(rows, { mode: "rent" })), ["x"], "ru alias matches rent");
  assertDeepEqual(ids(filterListings(rows, { mode: "Продажа" })), ["y"], "criteria alias normalised");
});

test("city and district compare case-insensitively", () => {
  const rows = [listing({ id: "x", city: " TBILISI ", district: "old  town" })];
  assert(matchesCriteria(rows[0] ?? {}, { city: "tbilisi", district: "Old Town" }), "normalised match");
});

test("rooms plus keeps counts at or above and drops unparsable", () => {
  const rows = [
    listing({ id: "one", rooms: "1" }),
    listing({ id: "three", rooms: "3" }),
    listing({ id: "four", rooms: "4.0" }),
    listing({ id: "studio", rooms: "studio" }),
    listing({ id: "blank", rooms: "n/a" })
  ];
  assertDeepEqual(ids(filterListings(rows, { rooms: "3+" })), ["three", "four"], "3+ semantics");
  assertDeepEqual(ids(filterListings(rows, { rooms: "4" })), ["four"], "whole-room equality");
  assertDeepEqual(ids(filterListings(rows, { rooms: "studio" })), ["studio"], "studio equality");
  assertDeepEqual(ids(filterListings(rows, { rooms: "lots" })).length, 5, "unparsable criterion does not filter");
});

test("symbolic price 500-1000 excludes 1200 and keeps unspecified price", () => {
  const rows = [
    listing({ id: "low", price: "400" }),
    listing({ id: "mid", price: "750$" }),
    listing({ id: "edge", price: "1000" }),
    listing({ id: "high", price: "1200" }),
    listing({ id: "zero", price: "0" }),
    listing({ id: "none", price: undefined })
  ];
  const result = filterListings(rows, { price: { kind: "range", value: "500-1000" } });
  assertDeepEqual(ids(result), ["mid", "edge", "zero", "none"], "inclusive range with pass-through");
});

test("zero price pass-through can be disabled", () => {
  const rows = [listing({ id: "zero", price: "" }), listing({ id: "mid", price: "700" })];
  const result = filterListings(rows, { price: { kind: "range", value: "500-1000" } }, { zeroPricePasses: false });
  assertDeepEqual(ids(result), ["mid"], "zero price excluded");
});

test("parsePriceRange handles open ends, caps and skip", () => {
  assertDeepEqual(parsePriceRange("500-1000"), { min: 500, max: 1000 }, "closed range");
  assertDeepEqual(parsePriceRange("1500-"), { min: 1500 }, "dash open end");
  assertDeepEqual(parsePriceRange("1100$+"), { min: 1100 }, "plus open end");
  assertDeepEqual(parsePriceRange("≤300$"), { max: 300 }, "upper cap label");
  assertEqual(parsePriceRange("0"), undefined, "zero cap does not filter");
  assertEqual(parsePriceRange("Пропустить"), undefined, "skip");
  assertDeepEqual(parsePriceRange("≥500"), { min: 500 }, "lower bound label");
});

test("parsePriceRange rejects text without digits", () => {
  assertEqual(parsePriceRange("abc-"), undefined, "dash without numbers");
  assertEqual(parsePriceRange("abc-def"), undefined, "words on both sides");
  assertEqual(parsePriceRange("cheap+"), undefined, "plus without a number");
});

test("a lower bound label keeps pricier listings", () => {
  const rows = [listing({ id: "a", price: "300" }), listing({ id: "b", price: "900" })];
  assertDeepEqual(ids(filterListings(rows, { price: { kind: "range", value: "≥500" } })), ["b"], "min only");
});

test("explicit bounds filter with open sides", () => {
  const rows = [listing({ id: "a", price: "300" }), listing({ id: "b", price: "900" })];
  assertDeepEqual(ids(filterListings(rows, { price: { kind: "bounds", min: 500 } })), ["b"], "min only");
  assertDeepEqual(ids(filterListings(rows, { price: { kind: "bounds", max: 500 } })), ["a"], "max only");
  assertDeepEqual(ids(filterListings(rows, { price: { kind: "bounds" } })), ["a", "b"], "no bounds");
});

test("sortByPublishedDesc is newest first and stable", () => {
  const rows = [
    listing({ id: "old", published: "2024-12-01" }),
    listing({ id: "new1", published: "2025-02-01" }),
    listing({ id: "new2", published: "2025-02-01" }),
    listing({ id: "blank", published: undefined })
  ];
  assertDeepEqual(ids(sortByPublishedDesc(rows)), ["new1", "new2", "old", "blank"], "descending, ties in order");
});

test("countDistinct counts values reachable under the criteria", () => {
  const cities = countDistinct(sampleListings(), "city", { mode: "rent" });
  assertDeepEqual(cities, [
    { value: "Tbilisi", count: 3 },
    { value: "Batumi", count: 1 }
  ], "rent cities by count");

  const districts = countDistinct(sampleListings(), "district", { mode: "rent", city: "Tbilisi" });
  assertDeepEqual(districts, [
    { value: "Saburtalo", count: 2 },
    { value: "Vake", count: 1 }
  ], "districts in Tbilisi");
});
