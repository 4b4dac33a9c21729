import { isLabel, t, type MessageParams } from "../i18n.js";
import { countDistinct, parsePriceRange } from "../search/filter.js";
import { cleanButtonText, isSkip, isUnlimited, norm, normMode, parseRooms } from "../search/normalize.js";
import type { Lang, Listing, Mode, QueryCriteria } from "../types.js";

export type WizardStep = "mode" | "city" | "district" | "rooms" | "price_method" | "price" | "price_min" | "price_max";

export type WizardPrompt = {
  step: WizardStep;
  textKey: string;
  textParams?: MessageParams;
  /** Option buttons, one array per keyboard row. */
  rows: string[][];
  allowSkip: boolean;
};

type WizardFrame = {
  step: WizardStep;
  /** Criteria collected before this step was answered. */
  criteria: QueryCriteria;
  prompt: WizardPrompt;
};

/** Active wizard; the last frame is the step awaiting an answer. */
export type WizardState = {
  frames: WizardFrame[];
};

export type WizardError = { key: string; params?: MessageParams };

export type WizardOutcome =
  | { kind: "prompt"; state: WizardState; prompt: WizardPrompt }
  | { kind: "reprompt"; state: WizardState; prompt: WizardPrompt; error: WizardError }
  | { kind: "complete"; criteria: QueryCriteria }
  | { kind: "cancelled" };

export type WizardContext = {
  listings: readonly Listing[];
  lang: Lang;
};

export const PRICE_RANGES: Record<Mode, readonly string[]> = {
  sale: ["≤35000$", "35000$-50000$", "50000$-75000$", "75000$-100000$", "100000$-150000$", "150000$+"],
  rent: ["≤300$", "300$-500$", "500$-700$", "700$-900$", "900$-1100$", "1100$+"],
  daily: []
};

const CITY_ICONS: Record<string, string> = {
  тбилиси: "🏙",
  tbilisi: "🏙",
  батуми: "🌊",
  batumi: "🌊",
  кутаиси: "⛰",
  kutaisi: "⛰"
};

const MAX_OPTION_ROWS = 40;
const BACK_WORDS = new Set(["back", "назад", "უკან"]);

function isBack(text: string): boolean {
  return isLabel(text, "btn_back") || BACK_WORDS.has(norm(text));
}

function modePrompt(lang: Lang): WizardPrompt {
  return {
    step: "mode",
    textKey: "ask_mode",
    rows: [[t(lang, "btn_rent")], [t(lang, "btn_sale")], [t(lang, "btn_daily")]],
    allowSkip: false
  };
}

function cityPrompt(criteria: QueryCriteria, ctx: WizardContext): WizardPrompt {
  const cities = countDistinct(ctx.listings, "city", { mode: criteria.mode });
  return {
    step: "city",
    textKey: "ask_city",
    rows: cities
      .slice(0, MAX_OPTION_ROWS)
      .map(({ value, count }) => [`${CITY_ICONS[norm(value)] ?? "🏠"} ${value} (${count})`]),
    allowSkip: true
  };
}

function districtRows(criteria: QueryCriteria, ctx: WizardContext): string[][] {
  return countDistinct(ctx.listings, "district", { mode: criteria.mode, city: criteria.city })
    .slice(0, MAX_OPTION_ROWS)
    .map(({ value, count }) => [`${value} (${count})`]);
}

function roomsPrompt(lang: Lang): WizardPrompt {
  return {
    step: "rooms",
    textKey: "ask_rooms",
    rows: [
      ["1", "2", "3"],
      ["4", "5+", t(lang, "btn_studio")]
    ],
    allowSkip: true
  };
}

function priceMethodPrompt(lang: Lang): WizardPrompt {
  return {
    step: "price_method",
    textKey: "ask_price_method",
    rows: [[t(lang, "btn_standard_ranges")], [t(lang, "btn_custom_price")]],
    allowSkip: true
  };
}

function pricePrompt(criteria: QueryCriteria): WizardPrompt {
  const mode = normMode(criteria.mode);
  const ranges = PRICE_RANGES[mode === "" ? "sale" : mode];
  return { step: "price", textKey: "ask_price", rows: ranges.map((range) => [range]), allowSkip: true };
}

function priceMinPrompt(): WizardPrompt {
  return { step: "price_min", textKey: "ask_price_min", rows: [], allowSkip: true };
}

function priceMaxPrompt(): WizardPrompt {
  return { step: "price_max", textKey: "ask_price_max", rows: [], allowSkip: true };
}

function parseAmount(text: string): number | undefined {
  const digits = text.replace(/[^\d.]/g, "");
  if (!/\d/.test(digits)) return undefined;
  const value = Number.parseFloat(digits);
  return Number.isFinite(value) ? value : undefined;
}

function enter(state: WizardState, criteria: QueryCriteria, prompt: WizardPrompt): WizardOutcome {
  const frame: WizardFrame = { step: prompt.step, criteria, prompt };
  return { kind: "prompt", state: { frames: [...state.frames, frame] }, prompt };
}

function reprompt(state: WizardState, frame: WizardFrame, error: WizardError): WizardOutcome {
  return { kind: "reprompt", state, prompt: frame.prompt, error };
}

function complete(criteria: QueryCriteria): WizardOutcome {
  return { kind: "complete", criteria };
}

export function startWizard(lang: Lang): WizardOutcome {
  return enter({ frames: [] }, {}, modePrompt(lang));
}

export function currentStep(state: WizardState): WizardStep | undefined {
  return state.frames.at(-1)?.step;
}

/** Steps back to the previous prompt, reusing the options computed when it was first shown. */
export function backWizard(state: WizardState): WizardOutcome {
  const frames = state.frames.slice(0, -1);
  const previous = frames.at(-1);
  if (!previous) {
    return { kind: "cancelled" };
  }
  return { kind: "prompt", state: { frames }, prompt: previous.prompt };
}

export function advanceWizard(state: WizardState, input: string, ctx: WizardContext): WizardOutcome {
  const frame = state.frames.at(-1);
  if (!frame) {
    return { kind: "cancelled" };
  }

  const text = input.trim();
  if (isBack(text)) {
    return backWizard(state);
  }

  const skip = isSkip(text);
  const criteria = frame.criteria;

  switch (frame.step) {
    case "mode": {
      const mode = skip ? "" : normMode(text);
      if (!mode) return reprompt(state, frame, { key: "err_mode" });
      const next = { ...criteria, mode };
      return enter(state, next, cityPrompt(next, ctx));
    }

    case "city": {
      if (skip) {
        return enter(state, { ...criteria, city: "", district: "" }, roomsPrompt(ctx.lang));
      }
      const next = { ...criteria, city: cleanButtonText(text) };
      const rows = districtRows(next, ctx);
      if (rows.length === 0) {
        return enter(state, { ...next, district: "" }, roomsPrompt(ctx.lang));
      }
      return enter(state, next, { step: "district", textKey: "ask_district", rows, allowSkip: true });
    }

    case "district": {
      const district = skip ? "" : cleanButtonText(text);
      return enter(state, { ...criteria, district }, roomsPrompt(ctx.lang));
    }

    case "rooms": {
      if (skip) {
        return enter(state, { ...criteria, rooms: "" }, priceMethodPrompt(ctx.lang));
      }
      const rooms = isLabel(text, "btn_studio") ? "studio" : norm(text);
      if (parseRooms(rooms) === undefined) return reprompt(state, frame, { key: "err_rooms" });
      return enter(state, { ...criteria, rooms }, priceMethodPrompt(ctx.lang));
    }

    case "price_method": {
      if (skip) return complete(criteria);
      if (isLabel(text, "btn_standard_ranges")) return enter(state, criteria, pricePrompt(criteria));
      if (isLabel(text, "btn_custom_price")) return enter(state, criteria, priceMinPrompt());
      return reprompt(state, frame, { key: "err_price_method" });
    }

    case "price": {
      if (skip) return complete(criteria);
      if (!parsePriceRange(text)) return reprompt(state, frame, { key: "err_price_number" });
      return complete({ ...criteria, price: { kind: "range", value: text } });
    }

    case "price_min": {
      if (skip) return enter(state, { ...criteria, price: { kind: "bounds" } }, priceMaxPrompt());
      const min = parseAmount(text);
      if (min === undefined) return reprompt(state, frame, { key: "err_price_number" });
      return enter(state, { ...criteria, price: { kind: "bounds", min } }, priceMaxPrompt());
    }

    case "price_max": {
      const min = criteria.price?.kind === "bounds" ? criteria.price.min : undefined;
      if (skip || isUnlimited(text)) {
        return complete({ ...criteria, price: { kind: "bounds", min } });
      }
      const max = parseAmount(text);
      if (max === undefined) return reprompt(state, frame, { key: "err_price_number" });
      if (min !== undefined && max <= min) {
        return reprompt(state, frame, { key: "err_price_order", params: { min } });
      }
      return complete({ ...criteria, price: { kind: "bounds", min, max } });
    }
  }
}
