import "dotenv/config";

import { createBot } from "./bot.js";
import { ConfigError, loadConfig, type AppConfig } from "./config.js";
import { startBackgroundTasks } from "./listings/refresh.js";
import { SheetsListingSource } from "./listings/sheets.js";
import { ListingStore } from "./listings/store.js";
import { logger } from "./logger.js";
import { errorMessage } from "./retry.js";
import { createHttpServer } from "./server.js";
import { InMemorySessionStore } from "./session/store.js";
import { SqliteStatsStore } from "./stats/db.js";

async function notifyAdmin(send: (text: string) => Promise<unknown>, text: string): Promise<void> {
  try {
    await send(text);
  } catch (err) {
    logger.warn({ err_message: errorMessage(err) }, "failed to notify admin");
  }
}

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal({ err_message: err.message }, "configuration error");
      process.exit(1);
    }
    throw err;
  }
}

async function main() {
  const config = loadConfigOrExit();
  logger.level = config.LOG_LEVEL;

  const stats = new SqliteStatsStore(config.DB_PATH, logger);
  const source = new SheetsListingSource({
    enabled: config.SHEETS_ENABLED,
    spreadsheetId: config.GSHEET_ID,
    tab: config.GSHEET_TAB,
    credentialsJson: config.GOOGLE_CREDENTIALS_JSON
  });
  const store = new ListingStore(source, config.GSHEET_REFRESH_SEC * 1000, logger);
  const sessions = new InMemorySessionStore(config.SESSION_TTL_SEC * 1000);
  const bot = createBot({ config, store, sessions, stats, logger });

  const listings = await store.get(true);
  const tasks = startBackgroundTasks(store, logger, config.GSHEET_REFRESH_SEC * 1000);
  const app = createHttpServer(logger, { store, sessions });

  try {
    await app.listen({ port: config.PORT, host: config.HOST });
  } catch (error) {
    logger.error({ err: error }, "failed to start health server");
    process.exit(1);
  }

  const sendToAdmin = (text: string) => bot.telegram.sendMessage(config.ADMIN_CHAT_ID, text, { parse_mode: "HTML" });

  bot
    .launch({ dropPendingUpdates: true }, () => {
      logger.info({ rows: listings.length }, "liveplace bot started");
    })
    .catch((err: unknown) => {
      logger.fatal({ err_message: errorMessage(err) }, "polling stopped with an error");
      process.exit(1);
    });

  if (config.ADMIN_CHAT_ID) {
    await notifyAdmin(
      sendToAdmin,
      [
        "✅ <b>LivePlace bot started</b>",
        "",
        `📊 Loaded: ${listings.length} ads`,
        `🔄 Auto-refresh: every ${config.GSHEET_REFRESH_SEC}s`,
        `📢 Feedback channel: ${config.FEEDBACK_CHAT_ID}`,
        `💾 Database: ${config.DB_PATH}`
      ].join("\n")
    );
  }

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "shutting down");
    bot.stop(signal);
    tasks.stop();
    if (config.ADMIN_CHAT_ID) {
      await notifyAdmin(sendToAdmin, "⚠️ <b>LivePlace bot stopped</b>\n\nБот был остановлен");
    }
    await app.close();
    stats.close();
    logger.info("shutdown complete");
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err_message: errorMessage(err) }, "shutdown failed");
        process.exitCode = 1;
      });
    });
  }
}

void main();
