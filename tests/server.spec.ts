import { ListingStore } from "../src/listings/store.js";
import { StaticListingSource } from "../src/listings/sheets.js";
import { logger } from "../src/logger.js";
import { createHttpServer } from "../src/server.js";
import { InMemorySessionStore, createSession } from "../src/session/store.js";
import { assertDeepEqual, assertEqual } from "./helpers/assert.js";
import { sampleListings } from "./helpers/listings.js";
import { test } from "./helpers/runner.js";

test("health reports cache and session state", async () => {
  let clock = 1_000_000;
  const store = new ListingStore(new StaticListingSource(sampleListings()), 60_000, logger, () => clock);
  const sessions = new InMemorySessionStore();
  sessions.put(createSession(1));

  const app = createHttpServer(logger, { store, sessions });
  try {
    const cold = await app.inject({ method: "GET", url: "/health" });
    assertEqual(cold.statusCode, 200, "status code");
    assertDeepEqual(cold.json(), { status: "ok", rows: 0, cacheAgeSec: null, sessions: 1 }, "before first fetch");

    await store.get();
    clock += 5_500;
    const warm = await app.inject({ method: "GET", url: "/health" });
    assertDeepEqual(warm.json(), { status: "ok", rows: 5, cacheAgeSec: 5, sessions: 1 }, "after fetch");

    const root = await app.inject({ method: "GET", url: "/" });
    assertDeepEqual(root.json(), { service: "liveplace-bot", health: "/health" }, "root");
  } finally {
    await app.close();
  }
});
