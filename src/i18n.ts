import { readFileSync } from "node:fs";
import { z } from "zod";

import { DEFAULT_LANG, LANGS, type Lang } from "./types.js";

const entrySchema = z.object({
  ru: z.string(),
  en: z.string().optional(),
  ka: z.string().optional()
});

const catalog = z
  .record(entrySchema)
  .parse(JSON.parse(readFileSync(new URL("../locales/messages.json", import.meta.url), "utf8")));

export type MessageParams = Record<string, string | number>;

export function isLang(value: unknown): value is Lang {
  return LANGS.some((lang) => lang === value);
}

const LANG_BY_CODE: Record<string, Lang> = {
  ru: "ru",
  "ru-ru": "ru",
  en: "en",
  "en-us": "en",
  "en-gb": "en",
  ka: "ka",
  "ka-ge": "ka"
};

export function langFromTelegramCode(code: string | undefined): Lang {
  return LANG_BY_CODE[(code ?? "").trim().toLowerCase()] ?? DEFAULT_LANG;
}

/** Missing translations fall back to Russian, unknown keys to the key itself. */
export function t(lang: Lang, key: string, params?: MessageParams): string {
  const entry = catalog[key];
  const template = entry ? entry[lang] ?? entry.ru : key;
  if (!params) return template;
  return template.replace(/\{(\w+)\}/g, (match, name: string) => {
    const value = params[name];
    return value === undefined ? match : String(value);
  });
}

/** The label of `key` in every language, for matching reply-keyboard presses. */
export function labelsOf(key: string): string[] {
  return LANGS.map((lang) => t(lang, key));
}

export function isLabel(text: string, key: string): boolean {
  const trimmed = text.trim();
  return labelsOf(key).some((label) => label === trimmed);
}
