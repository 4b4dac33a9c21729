import { Markup, Telegraf, type Context } from "telegraf";
import { message } from "telegraf/filters";

import { buildUtmUrl, pickAd, shouldShowAd } from "./ads.js";
import {
  adKeyboard,
  cardKeyboard,
  languageKeyboard,
  languageName,
  mainMenuKeyboard,
  statsKeyboard,
  statsRefreshKeyboard,
  wizardKeyboard
} from "./bot/keyboards.js";
import type { AppConfig } from "./config.js";
import { formatCard } from "./formatters/card.js";
import { isLabel, isLang, langFromTelegramCode, t } from "./i18n.js";
import { listingIdentity } from "./listings/listing.js";
import type { ListingStore } from "./listings/store.js";
import type { Logger } from "./logger.js";
import { errorMessage, withRetry } from "./retry.js";
import { describeCriteria, parseDeepLink } from "./search/deeplink.js";
import { filterListings, sortByPublishedDesc } from "./search/filter.js";
import { addFavorite, favoriteListings, isFavorite, removeFavorite } from "./session/favorites.js";
import { advanceLead, formatLeadNotice, startLead, type Lead } from "./session/lead.js";
import { createSession, pushRecentSearch, showResults, type Session, type SessionStore } from "./session/store.js";
import type { StatsRecorder } from "./stats/db.js";
import { formatStatsReport } from "./stats/report.js";
import type { Listing, QueryCriteria } from "./types.js";
import { advanceWizard, startWizard, type WizardOutcome } from "./wizard/machine.js";

export type BotDeps = {
  config: AppConfig;
  store: ListingStore;
  sessions: SessionStore;
  stats: StatsRecorder;
  logger: Logger;
  random?: () => number;
  now?: () => number;
};

type ReplyExtra = Parameters<Context["reply"]>[1];

/** Quick picks and latest show this many of the most recent listings. */
export const BROWSE_LIMIT = 20;
const CAPTION_LIMIT = 1024;
const NON_RETRIABLE_MEDIA_ERRORS = ["WEBPAGE_CURL_FAILED", "WEBPAGE_MEDIA_EMPTY", "FILE_REFERENCE"];
const MENU_LABELS = ["btn_search", "btn_fast", "btn_latest", "btn_favs", "btn_language", "btn_about", "btn_home"];

export function isRetriableMediaError(err: unknown): boolean {
  const text = errorMessage(err);
  return !NON_RETRIABLE_MEDIA_ERRORS.some((code) => text.includes(code));
}

export function createBot(deps: BotDeps): Telegraf {
  const { config, store, sessions, stats, logger } = deps;
  const random = deps.random ?? Math.random;
  const now = deps.now ?? Date.now;
  const bot = new Telegraf(config.BOT_TOKEN);

  const filterOptions = { zeroPricePasses: config.ZERO_PRICE_PASSES };

  function sessionFor(ctx: Context): Session | undefined {
    const from = ctx.from;
    if (!from) return undefined;
    let session = sessions.get(from.id);
    if (!session) {
      session = createSession(from.id, now());
      sessions.put(session);
      stats.registerUser(from.id);
    }
    if (!session.langChosen) {
      session.lang = langFromTelegramCode(from.language_code);
    }
    return session;
  }

  function isAdmin(ctx: Context): boolean {
    return config.ADMIN_CHAT_ID !== 0 && ctx.from?.id === config.ADMIN_CHAT_ID;
  }

  async function reply(ctx: Context, text: string, extra?: ReplyExtra): Promise<void> {
    await ctx.reply(text, { parse_mode: "HTML", ...extra });
  }

  async function showMenu(ctx: Context, session: Session, key = "menu_title"): Promise<void> {
    await reply(ctx, t(session.lang, key), mainMenuKeyboard(session.lang));
  }

  async function sendAlbum(ctx: Context, photos: string[], caption: string | undefined): Promise<boolean> {
    const media = photos.map((url, index) =>
      index === 0 && caption
        ? { type: "photo" as const, media: url, caption, parse_mode: "HTML" as const }
        : { type: "photo" as const, media: url }
    );
    const result = await withRetry(() => ctx.replyWithMediaGroup(media), {
      attempts: config.MEDIA_RETRY_COUNT,
      delayMs: config.MEDIA_RETRY_DELAY_MS,
      retriable: isRetriableMediaError,
      onError: (err, attempt) => {
        logger.warn(
          { uid: ctx.from?.id, attempt, attempts: config.MEDIA_RETRY_COUNT, err_message: errorMessage(err) },
          "[BOT] album send failed"
        );
      }
    });
    return result.ok;
  }

  async function maybeShowAd(ctx: Context, session: Session): Promise<void> {
    const current = now();
    const settings = {
      enabled: config.ADS_ENABLED,
      probability: config.ADS_PROB,
      cooldownMs: config.ADS_COOLDOWN_SEC * 1000
    };
    if (!shouldShowAd(session.lastAdAt, current, settings, random)) return;
    const ad = pickAd(session.lastAdId, random);
    if (!ad) return;

    const url = buildUtmUrl(
      ad.url,
      ad.id,
      session.uid,
      { source: config.UTM_SOURCE, medium: config.UTM_MEDIUM, campaign: config.UTM_CAMPAIGN },
      new Date(current)
    );
    try {
      await reply(ctx, ad.text, adKeyboard(url, session.lang));
    } catch (err) {
      logger.warn({ uid: session.uid, ad_id: ad.id, err_message: errorMessage(err) }, "[BOT] ad send failed");
    }
    session.lastAdAt = current;
    session.lastAdId = ad.id;
    stats.logAction(session.uid, "ad_shown", { ad_id: ad.id });
  }

  /** Renders the listing under the session's cursor, or the end-of-list screen. */
  async function presentCurrent(ctx: Context, session: Session): Promise<void> {
    const lang = session.lang;
    const cursor = session.results;
    if (!cursor || cursor.length === 0) {
      await showMenu(ctx, session, "list_empty");
      return;
    }

    const position = cursor.current();
    if (position.done) {
      await showMenu(ctx, session, "all_viewed");
      return;
    }

    const card = formatCard(position.listing, lang);
    const text = `${card.text}\n\n${t(lang, "card_counter", { index: position.index + 1, total: position.total })}`;
    const favorite = isFavorite(session.favorites, listingIdentity(position.listing));
    const keyboard = cardKeyboard(position.index, position.total, favorite, lang);

    if (card.photos.length === 0) {
      await reply(ctx, text, keyboard);
    } else {
      const captioned = text.length <= CAPTION_LIMIT;
      const sent = await sendAlbum(ctx, card.photos, captioned ? text : undefined);
      if (!sent) {
        await reply(ctx, `${text}\n\n${t(lang, "photos_unavailable")}`, keyboard);
      } else if (captioned) {
        await reply(ctx, t(lang, "choose_action"), keyboard);
      } else {
        await reply(ctx, text, keyboard);
      }
    }

    await maybeShowAd(ctx, session);
  }

  async function runSearch(ctx: Context, session: Session, criteria: QueryCriteria): Promise<void> {
    const listings = await store.get();
    const results = filterListings(listings, criteria, filterOptions);
    logger.info({ uid: session.uid, rows: listings.length, results: results.length }, "[BOT] search completed");

    stats.logSearch(session.uid, criteria, results.length);
    pushRecentSearch(session, criteria);
    showResults(session, results);

    if (results.length === 0) {
      await showMenu(ctx, session, "nothing_found");
      return;
    }
    await reply(ctx, t(session.lang, "found", { count: results.length }), mainMenuKeyboard(session.lang));
    await presentCurrent(ctx, session);
  }

  async function applyWizardOutcome(ctx: Context, session: Session, outcome: WizardOutcome): Promise<void> {
    const lang = session.lang;
    switch (outcome.kind) {
      case "prompt":
        session.wizard = outcome.state;
        await reply(ctx, t(lang, outcome.prompt.textKey, outcome.prompt.textParams), wizardKeyboard(outcome.prompt, lang));
        return;
      case "reprompt":
        session.wizard = outcome.state;
        await reply(ctx, t(lang, outcome.error.key, outcome.error.params), wizardKeyboard(outcome.prompt, lang));
        return;
      case "complete":
        session.wizard = undefined;
        await runSearch(ctx, session, outcome.criteria);
        return;
      case "cancelled":
        session.wizard = undefined;
        await showMenu(ctx, session);
        return;
    }
  }

  async function beginSearch(ctx: Context, session: Session): Promise<void> {
    session.lead = undefined;
    stats.logAction(session.uid, "search_start");
    await store.get();
    await applyWizardOutcome(ctx, session, startWizard(session.lang));
  }

  async function browse(ctx: Context, session: Session, action: string, titleKey?: string): Promise<void> {
    session.wizard = undefined;
    const listings = await store.get();
    if (listings.length === 0) {
      await showMenu(ctx, session, "no_listings");
      return;
    }
    stats.logAction(session.uid, action);
    showResults(session, sortByPublishedDesc(listings).slice(0, BROWSE_LIMIT));
    if (titleKey) await reply(ctx, t(session.lang, titleKey));
    await presentCurrent(ctx, session);
  }

  async function showFavorites(ctx: Context, session: Session): Promise<void> {
    session.wizard = undefined;
    stats.logAction(session.uid, "view_favorites");
    const favorites = favoriteListings(session.favorites);
    if (favorites.length === 0) {
      await showMenu(ctx, session, "favs_empty");
      return;
    }
    showResults(session, favorites);
    await reply(ctx, t(session.lang, "favs_count", { count: favorites.length }));
    await presentCurrent(ctx, session);
  }

  async function forwardLead(lead: Lead): Promise<void> {
    if (config.FEEDBACK_CHAT_ID === 0) {
      logger.warn({ uid: lead.uid }, "[BOT] FEEDBACK_CHAT_ID is not set, lead kept in stats only");
      return;
    }
    const notice = formatLeadNotice(lead);
    const result = await withRetry(
      () => bot.telegram.sendMessage(config.FEEDBACK_CHAT_ID, notice, { parse_mode: "HTML" }),
      {
        attempts: config.LEAD_RETRY_COUNT,
        delayMs: config.LEAD_RETRY_DELAY_MS,
        onError: (err, attempt) => {
          logger.error(
            { uid: lead.uid, attempt, attempts: config.LEAD_RETRY_COUNT, err_message: errorMessage(err) },
            "[BOT] lead forward failed"
          );
        }
      }
    );
    if (result.ok) {
      logger.info({ uid: lead.uid }, "[BOT] lead forwarded");
    }
  }

  async function continueLead(ctx: Context, session: Session, text: string): Promise<void> {
    const draft = session.lead;
    if (!draft) return;
    const step = advanceLead(draft, session.uid, text);
    switch (step.kind) {
      case "ask_phone":
        session.lead = step.draft;
        await reply(ctx, t(session.lang, "lead_ask_phone"));
        return;
      case "bad_phone":
        await reply(ctx, t(session.lang, "lead_bad_phone"));
        return;
      case "complete": {
        session.lead = undefined;
        const lead = step.lead;
        stats.logLead(session.uid, lead.name, lead.phone, lead.listing);
        stats.logAction(session.uid, "lead_submitted");
        await forwardLead(lead);
        await showMenu(ctx, session, "lead_done");
        if (session.results) {
          session.results.seek(lead.index + 1);
          await presentCurrent(ctx, session);
        }
        return;
      }
    }
  }

  /** Main-menu buttons, matched in every language. Returns false for other text. */
  async function routeMenu(ctx: Context, session: Session, text: string): Promise<boolean> {
    if (isLabel(text, "btn_search")) {
      await beginSearch(ctx, session);
    } else if (isLabel(text, "btn_fast")) {
      await browse(ctx, session, "quick_pick", "quick_title");
    } else if (isLabel(text, "btn_latest")) {
      await browse(ctx, session, "view_latest");
    } else if (isLabel(text, "btn_favs")) {
      await showFavorites(ctx, session);
    } else if (isLabel(text, "btn_language")) {
      await reply(ctx, t(session.lang, "lang_choose"), languageKeyboard());
    } else if (isLabel(text, "btn_about")) {
      await reply(ctx, t(session.lang, "about"), mainMenuKeyboard(session.lang));
    } else if (isLabel(text, "btn_home")) {
      await showMenu(ctx, session);
    } else {
      return false;
    }
    return true;
  }

  /** Answers a button whose listing is no longer in the session. */
  async function staleCallback(ctx: Context, session: Session): Promise<void> {
    await ctx.answerCbQuery(t(session.lang, "callback_error"));
    await showMenu(ctx, session, "menu_short");
  }

  async function sendStatsReport(ctx: Context, days: number): Promise<void> {
    const text = formatStatsReport(stats.getStats(days), {
      cachedRows: store.info().rows,
      dbPath: config.DB_PATH,
      now: new Date(now())
    });
    try {
      await ctx.editMessageText(text, { parse_mode: "HTML", ...statsRefreshKeyboard(days) });
      await ctx.answerCbQuery("✅ Статистика обновлена");
    } catch (err) {
      const reason = errorMessage(err);
      if (reason.includes("message is not modified")) {
        await ctx.answerCbQuery("Статистика актуальна");
        return;
      }
      logger.error({ err_message: reason }, "[BOT] stats update failed");
      await ctx.answerCbQuery("❌ Ошибка обновления");
    }
  }

  const handleStart = async (ctx: Context) => {
    const session = sessionFor(ctx);
    if (!session) return;
    session.wizard = undefined;
    session.lead = undefined;
    stats.logAction(session.uid, "start");
    await reply(ctx, t(session.lang, "start"), mainMenuKeyboard(session.lang));
  };

  bot.start(handleStart);
  bot.command("menu", handleStart);

  bot.command("search", async (ctx) => {
    const session = sessionFor(ctx);
    if (!session) return;
    await beginSearch(ctx, session);
  });

  bot.command("about", async (ctx) => {
    const session = sessionFor(ctx);
    if (!session) return;
    await reply(ctx, t(session.lang, "about"));
  });

  bot.command("help", async (ctx) => {
    const session = sessionFor(ctx);
    if (!session) return;
    await reply(ctx, t(session.lang, "help"));
  });

  bot.command("go", async (ctx) => {
    const session = sessionFor(ctx);
    if (!session) return;
    const criteria = parseDeepLink(ctx.payload);
    if (!criteria) {
      await reply(ctx, t(session.lang, "go_usage"));
      return;
    }
    session.wizard = undefined;
    stats.logAction(session.uid, "deep_link");
    await runSearch(ctx, session, criteria);
  });

  bot.command("repeat", async (ctx) => {
    const session = sessionFor(ctx);
    if (!session) return;
    if (session.recentSearches.length === 0) {
      await reply(ctx, t(session.lang, "repeat_empty"));
      return;
    }
    const keyboard = Markup.inlineKeyboard(
      session.recentSearches.map((criteria, index) => [
        Markup.button.callback(describeCriteria(criteria), `repeat:${index}`)
      ])
    );
    await reply(ctx, t(session.lang, "repeat_title"), keyboard);
  });

  bot.command("health", async (ctx) => {
    if (!isAdmin(ctx)) return;
    const info = store.info();
    await reply(
      ctx,
      [
        "✅ Bot OK",
        `Sheets enabled: ${config.SHEETS_ENABLED}`,
        `Cached rows: ${info.rows}`,
        `Cache age: ${info.ageSec === undefined ? "—" : `${info.ageSec}s`}`,
        `Sessions: ${sessions.size()}`,
        `Last error: ${info.lastError ?? "—"}`,
        `DB: ${config.DB_PATH}`
      ].join("\n")
    );
  });

  bot.command(["refresh", "reload"], async (ctx) => {
    if (!isAdmin(ctx)) return;
    const listings = await store.get(true);
    await reply(ctx, `♻️ Перезагружено. В кэше: ${listings.length} строк.`);
  });

  bot.command("stats", async (ctx) => {
    if (!isAdmin(ctx)) return;
    await reply(ctx, "📊 <b>Статистика бота</b>\n\nВыберите период:", statsKeyboard());
  });

  bot.action(/^stats:(\d+)$/, async (ctx) => {
    if (!isAdmin(ctx)) {
      await ctx.answerCbQuery(t(sessionFor(ctx)?.lang ?? "ru", "no_rights"));
      return;
    }
    await sendStatsReport(ctx, Number(ctx.match[1]));
  });

  bot.action(/^export:(\d+)$/, async (ctx) => {
    if (!isAdmin(ctx)) {
      await ctx.answerCbQuery(t(sessionFor(ctx)?.lang ?? "ru", "no_rights"));
      return;
    }
    const days = Number(ctx.match[1]);
    await ctx.answerCbQuery("Создаю экспорт...");
    const stamp = new Date(now()).toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
    await ctx.replyWithDocument(
      { source: Buffer.from(stats.exportJson(days), "utf8"), filename: `liveplace_stats_${stamp}.json` },
      { caption: `📥 Экспорт статистики за ${days} дней` }
    );
  });

  bot.action(/^lang:(\w+)$/, async (ctx) => {
    const session = sessionFor(ctx);
    const code = ctx.match[1];
    if (!session || !isLang(code)) {
      await ctx.answerCbQuery();
      return;
    }
    session.lang = code;
    session.langChosen = true;
    stats.logAction(session.uid, "set_language", { lang: code });
    await ctx.answerCbQuery(t(code, "lang_set", { lang: languageName(code) }));
    try {
      await ctx.deleteMessage();
    } catch (err) {
      logger.debug({ err_message: errorMessage(err) }, "[BOT] language prompt not deleted");
    }
    await showMenu(ctx, session, "menu_short");
  });

  bot.action(/^repeat:(\d+)$/, async (ctx) => {
    const session = sessionFor(ctx);
    if (!session) return;
    const criteria = session.recentSearches[Number(ctx.match[1])];
    if (!criteria) {
      await staleCallback(ctx, session);
      return;
    }
    await ctx.answerCbQuery();
    session.wizard = undefined;
    stats.logAction(session.uid, "repeat_search");
    await runSearch(ctx, session, criteria);
  });

  bot.action(/^like:(\d+)$/, async (ctx) => {
    const session = sessionFor(ctx);
    if (!session) return;
    const index = Number(ctx.match[1]);
    const listing = session.results?.at(index);
    if (!listing) {
      await staleCallback(ctx, session);
      return;
    }
    session.wizard = undefined;
    session.lead = startLead(listing, index, new Date(now()));
    stats.logAction(session.uid, "like", { ad_id: listing.id ?? listingIdentity(listing) });
    await ctx.answerCbQuery(t(session.lang, "like_ack"));
    try {
      await ctx.react("❤");
    } catch (err) {
      logger.debug({ uid: session.uid, err_message: errorMessage(err) }, "[BOT] reaction not set");
    }
    await reply(ctx, t(session.lang, "lead_ask_name"));
  });

  bot.action(/^dislike:(\d+)$/, async (ctx) => {
    const session = sessionFor(ctx);
    if (!session) return;
    const index = Number(ctx.match[1]);
    const cursor = session.results;
    if (!cursor || !cursor.at(index)) {
      await staleCallback(ctx, session);
      return;
    }
    stats.logAction(session.uid, "dislike");
    await ctx.answerCbQuery(t(session.lang, "dislike_ack"));
    cursor.seek(index + 1);
    await presentCurrent(ctx, session);
  });

  async function updateCardButtons(ctx: Context, session: Session, index: number, favorite: boolean): Promise<void> {
    const total = session.results?.length ?? 0;
    try {
      await ctx.editMessageReplyMarkup(cardKeyboard(index, total, favorite, session.lang).reply_markup);
    } catch (err) {
      logger.debug({ uid: session.uid, err_message: errorMessage(err) }, "[BOT] card buttons not updated");
    }
  }

  bot.action(/^fav_add:(\d+)$/, async (ctx) => {
    const session = sessionFor(ctx);
    if (!session) return;
    const index = Number(ctx.match[1]);
    const listing = session.results?.at(index);
    if (!listing) {
      await staleCallback(ctx, session);
      return;
    }
    const { favorites, added } = addFavorite(session.favorites, listing, new Date(now()));
    session.favorites = favorites;
    if (!added) {
      await ctx.answerCbQuery(t(session.lang, "fav_exists"));
      return;
    }
    stats.logFavorite(session.uid, "add", listing);
    stats.logAction(session.uid, "favorite_add");
    await ctx.answerCbQuery(t(session.lang, "fav_added"));
    await updateCardButtons(ctx, session, index, true);
  });

  bot.action(/^fav_del:(\d+)$/, async (ctx) => {
    const session = sessionFor(ctx);
    if (!session) return;
    const index = Number(ctx.match[1]);
    const listing: Listing | undefined = session.results?.at(index);
    if (!listing) {
      await staleCallback(ctx, session);
      return;
    }
    const { favorites, removed } = removeFavorite(session.favorites, listingIdentity(listing));
    session.favorites = favorites;
    if (removed) {
      stats.logFavorite(session.uid, "remove", listing);
      stats.logAction(session.uid, "favorite_remove");
    }
    await ctx.answerCbQuery(t(session.lang, "fav_removed"));
    await updateCardButtons(ctx, session, index, false);
  });

  bot.action(/^(prev|next):(\d+)$/, async (ctx) => {
    const session = sessionFor(ctx);
    if (!session) return;
    const index = Number(ctx.match[2]);
    const cursor = session.results;
    if (!cursor || !cursor.at(index)) {
      await staleCallback(ctx, session);
      return;
    }
    await ctx.answerCbQuery();
    cursor.seek(ctx.match[1] === "prev" ? index - 1 : index + 1);
    await presentCurrent(ctx, session);
  });

  bot.on(message("text"), async (ctx) => {
    const session = sessionFor(ctx);
    if (!session) return;
    const text = ctx.message.text;

    if (session.lead) {
      if (!MENU_LABELS.some((key) => isLabel(text, key))) {
        await continueLead(ctx, session, text);
        return;
      }
      // A menu press abandons the pending lead.
      session.lead = undefined;
    }

    if (session.wizard) {
      if (isLabel(text, "btn_home")) {
        session.wizard = undefined;
        await showMenu(ctx, session);
        return;
      }
      const listings = await store.get();
      await applyWizardOutcome(ctx, session, advanceWizard(session.wizard, text, { listings, lang: session.lang }));
      return;
    }

    if (await routeMenu(ctx, session, text)) return;

    await reply(ctx, t(session.lang, "fallback_hint"), mainMenuKeyboard(session.lang));
  });

  bot.catch(async (err: unknown, ctx: Context) => {
    logger.error(
      {
        err_message: errorMessage(err),
        uid: ctx.from?.id,
        update_type: ctx.updateType
      },
      "[BOT] unhandled bot error"
    );
    if (ctx.callbackQuery) {
      try {
        await ctx.answerCbQuery(t(sessions.get(ctx.callbackQuery.from.id)?.lang ?? "ru", "generic_error"));
      } catch (answerErr) {
        logger.debug({ err_message: errorMessage(answerErr) }, "[BOT] callback answer failed");
      }
    }
  });

  return bot;
}
