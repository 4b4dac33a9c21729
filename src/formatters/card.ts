import { t } from "../i18n.js";
import { DEFAULT_LANG, PHOTO_FIELDS, type Lang, type Listing, type ListingField } from "../types.js";

export const MAX_PHOTOS = 10;

function asString(value: unknown, fallback = ""): string {
  if (typeof value === "string") {
    const normalized = value.trim();
    return normalized === "" ? fallback : normalized;
  }
  return fallback;
}

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** ISO-8601 timestamps become YYYY-MM-DD; anything else is shown as written. */
export function formatPublished(raw: string): string {
  const value = raw.trim();
  if (!/^\d{4}-\d{2}-\d{2}/.test(value)) {
    return value;
  }
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    return value;
  }
  return value.slice(0, 10);
}

const DRIVE_PATH_ID = /\/d\/([A-Za-z0-9_-]{20,})\//;
const DRIVE_QUERY_ID = /[?&]id=([A-Za-z0-9_-]{20,})/;

export function driveDirect(url: string): string {
  const match = url.match(DRIVE_PATH_ID) ?? url.match(DRIVE_QUERY_ID);
  const id = match?.[1];
  return id ? `https://drive.google.com/uc?export=download&id=${id}` : url;
}

const IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".webp"];
const IMAGE_HOST_MARKERS = ["googleusercontent.com", "google.com/uc?export=download"];

export function looksLikeImage(url: string): boolean {
  const lower = url.toLowerCase();
  return IMAGE_EXTENSIONS.some((ext) => lower.endsWith(ext)) || IMAGE_HOST_MARKERS.some((marker) => lower.includes(marker));
}

export function isValidPhotoUrl(url: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") return false;
  if (!parsed.host) return false;
  return looksLikeImage(url);
}

export function collectPhotos(listing: Listing): string[] {
  const photos: string[] = [];
  for (const field of PHOTO_FIELDS) {
    const raw = asString(listing[field]);
    if (!raw) continue;
    const url = driveDirect(raw);
    if (isValidPhotoUrl(url)) {
      photos.push(url);
    }
  }
  return photos.slice(0, MAX_PHOTOS);
}

const LANG_FIELDS = {
  ru: { title: "title_ru", description: "description_ru" },
  en: { title: "title_en", description: "description_en" },
  ka: { title: "title_ka", description: "description_ka" }
} as const satisfies Record<Lang, Record<"title" | "description", ListingField>>;

function localized(listing: Listing, base: "title" | "description", lang: Lang): string {
  return asString(listing[LANG_FIELDS[lang][base]]) || asString(listing[LANG_FIELDS[DEFAULT_LANG][base]]);
}

export type Card = {
  text: string;
  photos: string[];
};

export function formatCard(listing: Listing, lang: Lang): Card {
  const title = localized(listing, "title", lang);
  const description = localized(listing, "description", lang);
  const city = asString(listing.city);
  const district = asString(listing.district);
  const type = asString(listing.type);
  const rooms = asString(listing.rooms);
  const price = asString(listing.price);
  const published = formatPublished(asString(listing.published));
  const phone = asString(listing.phone);

  const location = [city, district].filter(Boolean).join(", ");
  const info = [type, rooms, location].filter(Boolean).map(escapeHtml).join(" • ");

  const lines: string[] = [];
  if (title) lines.push(`<b>${escapeHtml(title)}</b>`);
  if (info) lines.push(info);
  if (price) lines.push(`💰 ${escapeHtml(price)}`);
  if (published) lines.push(`📅 ${escapeHtml(published)}`);
  if (description) lines.push(`\n${escapeHtml(description)}`);
  if (phone) lines.push(`\n<b>${t(lang, "card_phone")}</b> ${escapeHtml(phone)}`);
  if (!description && !phone) lines.push("—");

  return { text: lines.join("\n"), photos: collectPhotos(listing) };
}
