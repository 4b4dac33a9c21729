import { escapeHtml } from "../formatters/card.js";
import type { StatsSummary } from "./db.js";

const MODE_NAMES: Record<string, string> = {
  rent: "Аренда",
  sale: "Продажа",
  daily: "Посуточно"
};

export function periodName(days: number): string {
  if (days === 1) return "сегодня";
  if (days === 7) return "за неделю";
  if (days === 30) return "за месяц";
  return "за всё время";
}

function topEntries(counts: Record<string, number>, limit: number): [string, number][] {
  return Object.entries(counts)
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit);
}

export type ReportContext = {
  cachedRows: number;
  dbPath: string;
  now: Date;
};

/** Admin report for `/stats`; Russian only, HTML. */
export function formatStatsReport(stats: StatsSummary, context: ReportContext): string {
  const lines = [
    `📊 <b>Статистика ${periodName(stats.periodDays)}</b>`,
    "",
    "👥 <b>Пользователи:</b>",
    `  • Уникальных: ${stats.uniqueUsers}`,
    `  • Новых: ${stats.newUsers}`,
    "",
    "🔍 <b>Активность:</b>",
    `  • Всего действий: ${stats.totalActions}`,
    `  • Поисков: ${stats.searches}`,
    `  • Заявок: ${stats.leads}`,
    `  • В избранное: ${stats.favoritesAdded}`,
    `  • Из избранного: ${stats.favoritesRemoved}`,
    ""
  ];

  if (stats.searches > 0) {
    lines.push(
      "📈 <b>Показатели:</b>",
      `  • Среднее результатов: ${stats.avgResultsPerSearch}`,
      `  • Конверсия в лиды: ${stats.conversionRate}%`,
      ""
    );
  }

  const modes = topEntries(stats.modeCounts, 5);
  if (modes.length > 0) {
    lines.push("🏠 <b>Режимы поиска:</b>");
    for (const [mode, count] of modes) lines.push(`  • ${escapeHtml(MODE_NAMES[mode] ?? mode)}: ${count}`);
    lines.push("");
  }

  const cities = topEntries(stats.cityCounts, 5);
  if (cities.length > 0) {
    lines.push("🏙 <b>Топ городов:</b>");
    for (const [city, count] of cities) lines.push(`  • ${escapeHtml(city)}: ${count}`);
    lines.push("");
  }

  lines.push(
    "💾 <b>Система:</b>",
    `  • Кэш: ${context.cachedRows} объявлений`,
    `  • БД: ${escapeHtml(context.dbPath)}`,
    "",
    `⏰ Обновлено: ${context.now.toISOString().slice(11, 19)}`
  );
  return lines.join("\n");
}
