import { listingIdentity } from "../src/listings/listing.js";
import { ResultCursor } from "../src/session/cursor.js";
import {
  addFavorite,
  createEmptyFavorites,
  favoriteListings,
  isFavorite,
  removeFavorite,
  toggleFavorite
} from "../src/session/favorites.js";
import {
  createSession,
  InMemorySessionStore,
  pushRecentSearch,
  RECENT_SEARCH_LIMIT,
  showResults
} from "../src/session/store.js";
import { assert, assertDeepEqual, assertEqual } from "./helpers/assert.js";
import { listing, sampleListings } from "./helpers/listings.js";
import { test } from "./helpers/runner.js";

test("cursor walks forward and signals exhaustion without throwing", () => {
  const cursor = new ResultCursor(sampleListings().slice(0, 2));
  const first = cursor.current();
  assert(!first.done, "first listing available");
  assertEqual(first.listing.id, "a", "first id");

  const second = cursor.advance();
  assert(!second.done, "second listing available");
  assertEqual(second.index, 1, "second index");

  assertDeepEqual(cursor.advance(), { done: true, total: 2 }, "exhausted");
  assertDeepEqual(cursor.advance(), { done: true, total: 2 }, "still exhausted");
  assertEqual(cursor.index, 2, "index stays at length");
});

test("cursor retreat and seek clamp into range", () => {
  const cursor = new ResultCursor(sampleListings());
  assertEqual(cursor.retreat().done, false, "retreat at start stays");
  assertEqual(cursor.index, 0, "index 0");
  cursor.seek(3);
  assertEqual(cursor.index, 3, "seek within range");
  cursor.seek(99);
  assertEqual(cursor.index, 5, "seek clamps to length");
  cursor.seek(-4);
  assertEqual(cursor.index, 0, "seek clamps to zero");
  assertEqual(cursor.at(7), undefined, "out-of-range lookup");
  assertEqual(cursor.at(1.5), undefined, "fractional lookup");
});

test("empty cursor is immediately exhausted", () => {
  assertDeepEqual(new ResultCursor([]).current(), { done: true, total: 0 }, "empty");
});

test("adding a favorite twice keeps a single entry", () => {
  const item = listing({ id: "fav-1" });
  const once = addFavorite(createEmptyFavorites(), item);
  const twice = addFavorite(once.favorites, item);
  assert(once.added, "first add");
  assert(!twice.added, "second add ignored");
  assertEqual(twice.favorites.items.length, 1, "one entry");
  assert(isFavorite(twice.favorites, "id:fav-1"), "present by identity");
});

test("add then remove leaves the favorite absent", () => {
  const item = listing({ price: "650" });
  const identity = listingIdentity(item);
  const added = addFavorite(createEmptyFavorites(), item).favorites;
  const removed = removeFavorite(added, identity);
  assert(removed.removed, "removed");
  assert(!isFavorite(removed.favorites, identity), "absent");
  assert(!removeFavorite(removed.favorites, identity).removed, "second remove is a no-op");
});

test("toggleFavorite flips membership", () => {
  const item = listing({ id: "t" });
  const on = toggleFavorite(createEmptyFavorites(), item);
  assert(on.added, "toggled on");
  const off = toggleFavorite(on.favorites, item);
  assert(!off.added, "toggled off");
  assertDeepEqual(favoriteListings(off.favorites), [], "no favorites left");
});

test("recent searches keep the newest three without immediate duplicates", () => {
  const session = createSession(7, 0);
  pushRecentSearch(session, { city: "Tbilisi" });
  pushRecentSearch(session, { city: "Tbilisi" });
  pushRecentSearch(session, { city: "Batumi" });
  pushRecentSearch(session, { mode: "sale" });
  pushRecentSearch(session, { rooms: "2" });
  assertEqual(RECENT_SEARCH_LIMIT, 3, "limit");
  assertDeepEqual(session.recentSearches, [{ rooms: "2" }, { mode: "sale" }, { city: "Batumi" }], "newest first");
});

test("session store evicts idle sessions after the TTL", () => {
  let now = 1_000;
  const store = new InMemorySessionStore(60_000, () => now);
  store.put(createSession(1, now));
  now += 30_000;
  assert(store.get(1) !== undefined, "still alive");
  now += 61_000;
  assertEqual(store.get(1), undefined, "evicted");
  assertEqual(store.size(), 0, "removed from the map");
});

test("session store without TTL keeps sessions", () => {
  let now = 0;
  const store = new InMemorySessionStore(0, () => now);
  const session = createSession(5, now);
  store.put(session);
  now += 10 * 24 * 3600 * 1000;
  assert(store.get(5) === session, "same session");
  store.delete(5);
  assertEqual(store.size(), 0, "deleted");
});

test("showResults replaces the cursor and rewinds", () => {
  const session = createSession(3, 0);
  showResults(session, sampleListings()).seek(2);
  const cursor = showResults(session, sampleListings().slice(0, 1));
  assert(session.results === cursor, "cursor stored on the session");
  assertEqual(cursor.index, 0, "rewound");
  assertEqual(cursor.length, 1, "new results");
});
