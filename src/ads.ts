import crypto from "node:crypto";

export type Ad = {
  id: string;
  text: string;
  url: string;
};

export const ADS: readonly Ad[] = [
  {
    id: "lead_form",
    text: "🔥 Ищете квартиру быстрее? Оставьте заявку — подберём за 24 часа!",
    url: "https://liveplace.com.ge/lead"
  },
  {
    id: "mortgage_help",
    text: "🏦 Поможем с ипотекой для нерезидентов. Узнайте детали.",
    url: "https://liveplace.com.ge/mortgage"
  }
];

export type AdSettings = {
  enabled: boolean;
  probability: number;
  cooldownMs: number;
};

export type UtmSettings = {
  source: string;
  medium: string;
  campaign: string;
};

export function shouldShowAd(
  lastAdAt: number,
  now: number,
  settings: AdSettings,
  random: () => number = Math.random
): boolean {
  if (!settings.enabled || ADS.length === 0) return false;
  if (now - lastAdAt < settings.cooldownMs) return false;
  return random() < settings.probability;
}

/** Avoids showing the same ad twice in a row when there is a choice. */
export function pickAd(lastAdId: string | undefined, random: () => number = Math.random): Ad | undefined {
  const fresh = ADS.filter((ad) => ad.id !== lastAdId);
  const pool = fresh.length > 0 ? fresh : ADS;
  return pool[Math.floor(random() * pool.length)];
}

function utcDay(now: Date): string {
  return now.toISOString().slice(0, 10).replace(/-/g, "");
}

export function adToken(uid: number, adId: string, now: Date): string {
  return crypto.createHash("sha256").update(`${uid}:${utcDay(now)}:${adId}`).digest("hex").slice(0, 16);
}

export function buildUtmUrl(raw: string, adId: string, uid: number, utm: UtmSettings, now: Date = new Date()): string {
  if (!raw) return "";
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return raw;
  }
  url.searchParams.set("utm_source", utm.source);
  url.searchParams.set("utm_medium", utm.medium);
  url.searchParams.set("utm_campaign", utm.campaign);
  url.searchParams.set("utm_content", adId);
  url.searchParams.set("token", adToken(uid, adId, now));
  return url.toString();
}
