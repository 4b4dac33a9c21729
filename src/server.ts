import Fastify from "fastify";
import rateLimit from "@fastify/rate-limit";

import type { ListingStore } from "./listings/store.js";
import type { Logger } from "./logger.js";
import type { SessionStore } from "./session/store.js";

export type HealthSources = {
  store: Pick<ListingStore, "info">;
  sessions: Pick<SessionStore, "size">;
};

export type HealthReport = {
  status: "ok";
  rows: number;
  cacheAgeSec: number | null;
  sessions: number;
};

export function createHttpServer(logger: Logger, sources: HealthSources) {
  const fastify = Fastify({ loggerInstance: logger });

  fastify.register(rateLimit, { max: 120, timeWindow: "1 minute" });

  fastify.get("/", async () => ({
    service: "liveplace-bot",
    health: "/health"
  }));

  fastify.get("/health", async (): Promise<HealthReport> => {
    const info = sources.store.info();
    return {
      status: "ok",
      rows: info.rows,
      cacheAgeSec: info.ageSec ?? null,
      sessions: sources.sessions.size()
    };
  });

  return fastify;
}
