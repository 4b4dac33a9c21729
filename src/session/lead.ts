import { escapeHtml } from "../formatters/card.js";
import type { Listing } from "../types.js";

export type LeadDraft = {
  step: "awaiting_name" | "awaiting_phone";
  listing: Listing;
  /** Cursor index of the liked listing; the cursor moves past it once the lead is sent. */
  index: number;
  startedAt: Date;
  name?: string;
};

export type Lead = {
  uid: number;
  name: string;
  phone: string;
  listing: Listing;
  index: number;
  startedAt: Date;
};

export type LeadStepResult =
  | { kind: "ask_phone"; draft: LeadDraft }
  | { kind: "bad_phone"; draft: LeadDraft }
  | { kind: "complete"; lead: Lead };

export function startLead(listing: Listing, index: number, startedAt: Date = new Date()): LeadDraft {
  return { step: "awaiting_name", listing, index, startedAt };
}

export function normalizeLeadPhone(text: string): string | undefined {
  const trimmed = text.trim();
  const digits = trimmed.replace(/\D/g, "");
  if (digits.length < 7 || digits.length > 15) {
    return undefined;
  }
  return trimmed.replace(/\s+/g, " ");
}

export function advanceLead(draft: LeadDraft, uid: number, text: string): LeadStepResult {
  if (draft.step === "awaiting_name") {
    return { kind: "ask_phone", draft: { ...draft, step: "awaiting_phone", name: text.trim() } };
  }

  const phone = normalizeLeadPhone(text);
  if (!phone) {
    return { kind: "bad_phone", draft };
  }

  return {
    kind: "complete",
    lead: {
      uid,
      name: draft.name ?? "",
      phone,
      listing: draft.listing,
      index: draft.index,
      startedAt: draft.startedAt
    }
  };
}

/** Operator-facing notice; always in Russian. */
export function formatLeadNotice(lead: Lead): string {
  const ad = lead.listing;
  const value = (text: string | undefined, fallback: string) => escapeHtml(text?.trim() || fallback);
  return [
    "🔥 <b>НОВАЯ ЗАЯВКА</b>",
    "",
    `👤 <b>Имя:</b> ${value(lead.name, "Не указано")}`,
    `📱 <b>Телефон:</b> ${value(lead.phone, "Не указано")}`,
    `🆔 <b>User ID:</b> ${lead.uid}`,
    "",
    "<b>Интересующее объявление:</b>",
    `🏠 ${value(ad.title_ru, "Без названия")}`,
    `📍 ${value([ad.city, ad.district].filter(Boolean).join(" "), "—")}`,
    `💰 ${value(ad.price, "Не указана")}`,
    `🛏 ${value(ad.rooms, "—")} комнат`,
    `☎️ Телефон владельца: ${value(ad.phone, "Не указан")}`,
    "",
    `⏰ ${lead.startedAt.toISOString()}`
  ].join("\n");
}
