import type { Logger } from "../logger.js";
import type { ListingStore } from "./store.js";
import { errorMessage } from "../retry.js";

export const HEARTBEAT_INTERVAL_MS = 10 * 60 * 1000;

export type BackgroundTasks = {
  stop(): void;
};

/**
 * Forces a listing refresh every `refreshMs` and logs cache size and age on a
 * heartbeat. Timers are unref'd so they never keep the process alive.
 */
export function startBackgroundTasks(
  store: ListingStore,
  logger: Logger,
  refreshMs: number,
  heartbeatMs: number = HEARTBEAT_INTERVAL_MS
): BackgroundTasks {
  let refreshing = false;

  const refresh = setInterval(() => {
    if (refreshing) return;
    refreshing = true;
    store
      .get(true)
      .then((listings) => logger.info({ rows: listings.length }, "auto-refresh complete"))
      .catch((err: unknown) => logger.error({ err_message: errorMessage(err) }, "auto-refresh failed"))
      .finally(() => {
        refreshing = false;
      });
  }, refreshMs);

  const heartbeat = setInterval(() => {
    const info = store.info();
    logger.info({ rows: info.rows, ageSec: info.ageSec }, "heartbeat");
  }, heartbeatMs);

  refresh.unref();
  heartbeat.unref();

  return {
    stop() {
      clearInterval(refresh);
      clearInterval(heartbeat);
    }
  };
}
