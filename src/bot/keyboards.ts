import { Markup } from "telegraf";

import { t } from "../i18n.js";
import { LANGS, type Lang } from "../types.js";
import type { WizardPrompt } from "../wizard/machine.js";

export function mainMenuKeyboard(lang: Lang) {
  return Markup.keyboard([
    [t(lang, "btn_fast")],
    [t(lang, "btn_search"), t(lang, "btn_latest")],
    [t(lang, "btn_favs")],
    [t(lang, "btn_language"), t(lang, "btn_about")]
  ]).resize();
}

/** Step options followed by skip (when allowed) and the back / menu row. */
export function wizardKeyboard(prompt: WizardPrompt, lang: Lang) {
  const rows = prompt.rows.map((row) => [...row]);
  if (prompt.allowSkip) rows.push([t(lang, "btn_skip")]);
  rows.push([t(lang, "btn_back"), t(lang, "btn_home")]);
  return Markup.keyboard(rows).resize();
}

export function cardKeyboard(index: number, total: number, favorite: boolean, lang: Lang) {
  const nav: ReturnType<typeof Markup.button.callback>[] = [];
  if (index > 0) nav.push(Markup.button.callback(t(lang, "btn_prev"), `prev:${index}`));
  if (index < total - 1) nav.push(Markup.button.callback(t(lang, "btn_next"), `next:${index}`));

  const rows = [
    [
      Markup.button.callback(t(lang, "btn_like"), `like:${index}`),
      Markup.button.callback(t(lang, "btn_dislike"), `dislike:${index}`)
    ],
    [
      favorite
        ? Markup.button.callback(t(lang, "btn_fav_del"), `fav_del:${index}`)
        : Markup.button.callback(t(lang, "btn_fav_add"), `fav_add:${index}`)
    ]
  ];
  if (nav.length > 0) rows.push(nav);
  return Markup.inlineKeyboard(rows);
}

const LANG_NAMES: Record<Lang, string> = {
  ru: "🇷🇺 Русский",
  en: "🇬🇧 English",
  ka: "🇬🇪 ქართული"
};

export function languageKeyboard() {
  return Markup.inlineKeyboard(LANGS.map((lang) => [Markup.button.callback(LANG_NAMES[lang], `lang:${lang}`)]));
}

export function languageName(lang: Lang): string {
  return LANG_NAMES[lang];
}

export function adKeyboard(url: string, lang: Lang) {
  return Markup.inlineKeyboard([[Markup.button.url(t(lang, "btn_details"), url)]]);
}

export const STATS_PERIODS = [1, 7, 30, 365] as const;

const PERIOD_LABELS: Record<(typeof STATS_PERIODS)[number], string> = {
  1: "📅 За день",
  7: "📅 За неделю",
  30: "📅 За месяц",
  365: "📅 За всё время"
};

export function statsKeyboard() {
  return Markup.inlineKeyboard([
    [Markup.button.callback(PERIOD_LABELS[1], "stats:1"), Markup.button.callback(PERIOD_LABELS[7], "stats:7")],
    [Markup.button.callback(PERIOD_LABELS[30], "stats:30"), Markup.button.callback(PERIOD_LABELS[365], "stats:365")],
    [Markup.button.callback("📥 Экспорт JSON", "export:30")]
  ]);
}

export function statsRefreshKeyboard(days: number) {
  return Markup.inlineKeyboard([[Markup.button.callback("🔄 Обновить", `stats:${days}`)]]);
}
