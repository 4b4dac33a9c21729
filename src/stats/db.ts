import Database from "better-sqlite3";

import type { Logger } from "../logger.js";
import type { Listing, QueryCriteria } from "../types.js";
import { errorMessage } from "../retry.js";

export type StatsSummary = {
  periodDays: number;
  uniqueUsers: number;
  newUsers: number;
  totalActions: number;
  searches: number;
  leads: number;
  favoritesAdded: number;
  favoritesRemoved: number;
  actionCounts: Record<string, number>;
  modeCounts: Record<string, number>;
  cityCounts: Record<string, number>;
  avgResultsPerSearch: number;
  conversionRate: number;
};

export interface StatsRecorder {
  registerUser(uid: number): void;
  logAction(uid: number, action: string, data?: Record<string, unknown>): void;
  logSearch(uid: number, criteria: QueryCriteria, resultsCount: number): void;
  logLead(uid: number, name: string, phone: string, listing: Listing): void;
  logFavorite(uid: number, action: "add" | "remove", listing: Listing): void;
  getStats(days: number): StatsSummary;
  exportJson(days: number): string;
  close(): void;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS user_actions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    uid INTEGER NOT NULL,
    action TEXT NOT NULL,
    data TEXT,
    timestamp DATETIME DEFAULT CURRENT_TIMESTAMP
  );
  CREATE TABLE IF NOT EXISTS searches (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    uid INTEGER NOT NULL,
    mode TEXT,
    city TEXT,
    district TEXT,
    rooms TEXT,
    price TEXT,
    price_min REAL,
    price_max REAL,
    results_count INTEGER,
    timestamp DATETIME DEFAULT CURRENT_TIMESTAMP
  );
  CREATE TABLE IF NOT EXISTS leads (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    uid INTEGER NOT NULL,
    name TEXT,
    phone TEXT,
    ad_data TEXT,
    timestamp DATETIME DEFAULT CURRENT_TIMESTAMP
  );
  CREATE TABLE IF NOT EXISTS favorites (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    uid INTEGER NOT NULL,
    action TEXT NOT NULL,
    ad_data TEXT,
    timestamp DATETIME DEFAULT CURRENT_TIMESTAMP
  );
  CREATE TABLE IF NOT EXISTS first_seen (
    uid INTEGER PRIMARY KEY,
    timestamp DATETIME DEFAULT CURRENT_TIMESTAMP
  );
  CREATE INDEX IF NOT EXISTS idx_actions_timestamp ON user_actions(timestamp);
  CREATE INDEX IF NOT EXISTS idx_actions_uid ON user_actions(uid);
  CREATE INDEX IF NOT EXISTS idx_searches_timestamp ON searches(timestamp);
  CREATE INDEX IF NOT EXISTS idx_leads_timestamp ON leads(timestamp);
  CREATE INDEX IF NOT EXISTS idx_favorites_timestamp ON favorites(timestamp);
`;

/** SQLite's CURRENT_TIMESTAMP layout, in UTC. */
export function sqlTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}

type CountRow = { n: number };
type GroupRow = { key: string; n: number };

function emptySummary(days: number): StatsSummary {
  return {
    periodDays: days,
    uniqueUsers: 0,
    newUsers: 0,
    totalActions: 0,
    searches: 0,
    leads: 0,
    favoritesAdded: 0,
    favoritesRemoved: 0,
    actionCounts: {},
    modeCounts: {},
    cityCounts: {},
    avgResultsPerSearch: 0,
    conversionRate: 0
  };
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Append-only activity log used for /stats and the JSON export. Write failures
 * are logged and dropped; they never reach the conversation.
 */
export class SqliteStatsStore implements StatsRecorder {
  private readonly db: Database.Database;

  constructor(
    readonly path: string,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {
    this.db = new Database(path, { timeout: 10_000 });
    this.db.exec(SCHEMA);
    logger.info({ path }, "stats database ready");
  }

  private write(label: string, run: () => void): void {
    try {
      run();
    } catch (err) {
      this.logger.error({ err_message: errorMessage(err) }, `failed to ${label}`);
    }
  }

  registerUser(uid: number): void {
    this.write("register user", () => {
      this.db.prepare("INSERT OR IGNORE INTO first_seen (uid, timestamp) VALUES (?, ?)").run(uid, sqlTimestamp(this.now()));
    });
  }

  logAction(uid: number, action: string, data?: Record<string, unknown>): void {
    this.write("log action", () => {
      this.db
        .prepare("INSERT INTO user_actions (uid, action, data, timestamp) VALUES (?, ?, ?, ?)")
        .run(uid, action, data ? JSON.stringify(data) : null, sqlTimestamp(this.now()));
    });
  }

  logSearch(uid: number, criteria: QueryCriteria, resultsCount: number): void {
    const price = criteria.price;
    this.write("log search", () => {
      this.db
        .prepare(
          `INSERT INTO searches (uid, mode, city, district, rooms, price, price_min, price_max, results_count, timestamp)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          uid,
          criteria.mode ?? "",
          criteria.city ?? "",
          criteria.district ?? "",
          criteria.rooms ?? "",
          price?.kind === "range" ? price.value : "",
          price?.kind === "bounds" ? price.min ?? null : null,
          price?.kind === "bounds" ? price.max ?? null : null,
          resultsCount,
          sqlTimestamp(this.now())
        );
    });
  }

  logLead(uid: number, name: string, phone: string, listing: Listing): void {
    this.write("log lead", () => {
      this.db
        .prepare("INSERT INTO leads (uid, name, phone, ad_data, timestamp) VALUES (?, ?, ?, ?, ?)")
        .run(uid, name, phone, JSON.stringify(listing), sqlTimestamp(this.now()));
    });
  }

  logFavorite(uid: number, action: "add" | "remove", listing: Listing): void {
    this.write("log favorite", () => {
      this.db
        .prepare("INSERT INTO favorites (uid, action, ad_data, timestamp) VALUES (?, ?, ?, ?)")
        .run(uid, action, JSON.stringify(listing), sqlTimestamp(this.now()));
    });
  }

  private cutoff(days: number): string {
    return sqlTimestamp(new Date(this.now().getTime() - days * 86_400_000));
  }

  private count(sql: string, cutoff: string): number {
    const row = this.db.prepare<[string], CountRow>(sql).get(cutoff);
    return row?.n ?? 0;
  }

  private grouped(sql: string, cutoff: string): Record<string, number> {
    const rows = this.db.prepare<[string], GroupRow>(sql).all(cutoff);
    return Object.fromEntries(rows.map((row) => [row.key, row.n]));
  }

  getStats(days: number): StatsSummary {
    try {
      const cutoff = this.cutoff(days);
      const searches = this.count("SELECT COUNT(*) AS n FROM searches WHERE timestamp >= ?", cutoff);
      const leads = this.count("SELECT COUNT(*) AS n FROM leads WHERE timestamp >= ?", cutoff);
      const avg = this.db
        .prepare<[string], { avg: number | null }>(
          "SELECT AVG(results_count) AS avg FROM searches WHERE timestamp >= ? AND results_count > 0"
        )
        .get(cutoff);

      return {
        periodDays: days,
        uniqueUsers: this.count("SELECT COUNT(DISTINCT uid) AS n FROM user_actions WHERE timestamp >= ?", cutoff),
        newUsers: this.count("SELECT COUNT(*) AS n FROM first_seen WHERE timestamp >= ?", cutoff),
        totalActions: this.count("SELECT COUNT(*) AS n FROM user_actions WHERE timestamp >= ?", cutoff),
        searches,
        leads,
        favoritesAdded: this.count("SELECT COUNT(*) AS n FROM favorites WHERE action = 'add' AND timestamp >= ?", cutoff),
        favoritesRemoved: this.count(
          "SELECT COUNT(*) AS n FROM favorites WHERE action = 'remove' AND timestamp >= ?",
          cutoff
        ),
        actionCounts: this.grouped(
          "SELECT action AS key, COUNT(*) AS n FROM user_actions WHERE timestamp >= ? GROUP BY action",
          cutoff
        ),
        modeCounts: this.grouped(
          "SELECT mode AS key, COUNT(*) AS n FROM searches WHERE timestamp >= ? AND mode != '' GROUP BY mode",
          cutoff
        ),
        cityCounts: this.grouped(
          `SELECT city AS key, COUNT(*) AS n FROM searches WHERE timestamp >= ? AND city != ''
           GROUP BY city ORDER BY n DESC LIMIT 10`,
          cutoff
        ),
        avgResultsPerSearch: round(avg?.avg ?? 0, 1),
        conversionRate: searches > 0 ? round((leads / searches) * 100, 2) : 0
      };
    } catch (err) {
      this.logger.error({ err_message: errorMessage(err) }, "failed to read stats");
      return emptySummary(days);
    }
  }

  exportJson(days: number): string {
    try {
      const cutoff = this.cutoff(days);
      const data = {
        export_date: this.now().toISOString(),
        period_days: days,
        searches: this.db.prepare("SELECT * FROM searches WHERE timestamp >= ?").all(cutoff),
        leads: this.db.prepare("SELECT * FROM leads WHERE timestamp >= ?").all(cutoff),
        favorites: this.db.prepare("SELECT * FROM favorites WHERE timestamp >= ?").all(cutoff)
      };
      return JSON.stringify(data, null, 2);
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error({ err_message: message }, "failed to export stats");
      return JSON.stringify({ error: message }, null, 2);
    }
  }

  close(): void {
    this.db.close();
  }
}
