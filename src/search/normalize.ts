import type { Mode } from "../types.js";

export function norm(value: unknown): string {
  if (value === undefined || value === null) return "";
  return String(value).trim().toLowerCase().replace(/\s+/g, " ");
}

const MODE_ALIASES: Record<Mode, readonly string[]> = {
  rent: ["rent", "аренда", "long", "longterm", "долгосрочно", "ქირავდება", "ქირა"],
  sale: ["sale", "продажа", "buy", "sell", "იყიდება", "გაყიდვა"],
  daily: ["daily", "daily rent", "посуточно", "sutki", "сутки", "short", "shortterm", "day", "დღიურად"]
};

const MODE_BY_ALIAS: ReadonlyMap<string, Mode> = new Map(
  (["rent", "sale", "daily"] as const).flatMap((mode) => MODE_ALIASES[mode].map((alias) => [alias, mode] as const))
);

export function normMode(value: unknown): Mode | "" {
  const cleaned = norm(value)
    .replace(/[^\p{L}\p{N}\s-]/gu, "")
    .trim()
    .replace(/\s+/g, " ");
  return MODE_BY_ALIAS.get(cleaned) ?? "";
}

const STUDIO_WORDS = new Set(["студия", "studio", "stud", "სტუდიო"]);

/** Room count, with studios as 0.5. Unparsable values give `undefined`. */
export function parseRooms(value: unknown): number | undefined {
  const text = norm(value);
  if (text === "") return undefined;
  if (STUDIO_WORDS.has(text)) return 0.5;
  const numeric = text.replace("+", "").replace(",", ".").trim();
  if (!/^\d+(\.\d+)?$/.test(numeric)) return undefined;
  return Number(numeric);
}

/** Digits of a price cell. Blank or unparsable cells count as 0 ("unspecified"). */
export function parsePrice(value: unknown): number {
  const digits = String(value ?? "").replace(/[^\d.]/g, "");
  const parsed = Number.parseFloat(digits);
  return Number.isFinite(parsed) ? parsed : 0;
}

export function digitsOnly(value: string): number {
  const digits = value.replace(/\D/g, "");
  return digits === "" ? 0 : Number(digits);
}

const SKIP_WORDS = new Set(["skip", "пропустить", "გამოტოვება", "-"]);

export function isSkip(text: unknown): boolean {
  return SKIP_WORDS.has(norm(text));
}

const UNLIMITED_WORDS = new Set([
  "без ограничений",
  "без ограничения",
  "неограниченно",
  "no limit",
  "unlimited",
  "any",
  "შეზღუდვის გარეშე"
]);

export function isUnlimited(text: unknown): boolean {
  return UNLIMITED_WORDS.has(norm(text));
}

/** "🏙 Tbilisi (12)" -> "Tbilisi" */
export function cleanButtonText(text: string): string {
  return text
    .replace(/^[\p{Extended_Pictographic}\p{Emoji_Modifier}\u{FE0F}\u{200D}\s]+/u, "")
    .replace(/\s*\(\d+\)\s*$/, "")
    .trim();
}
