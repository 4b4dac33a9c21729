import { DEFAULT_LANG, type Lang, type Listing, type QueryCriteria } from "../types.js";
import type { WizardState } from "../wizard/machine.js";
import { ResultCursor } from "./cursor.js";
import { createEmptyFavorites, type FavoritesStore } from "./favorites.js";
import type { LeadDraft } from "./lead.js";

export type Session = {
  uid: number;
  lang: Lang;
  /** Set on first contact; Telegram's language code is only applied until then. */
  langChosen: boolean;
  /** Undefined while idle. */
  wizard?: WizardState;
  results?: ResultCursor;
  favorites: FavoritesStore;
  recentSearches: QueryCriteria[];
  lead?: LeadDraft;
  lastAdAt: number;
  lastAdId?: string;
  touchedAt: number;
};

export const RECENT_SEARCH_LIMIT = 3;

export function createSession(uid: number, now: number = Date.now()): Session {
  return {
    uid,
    lang: DEFAULT_LANG,
    langChosen: false,
    favorites: createEmptyFavorites(),
    recentSearches: [],
    lastAdAt: 0,
    touchedAt: now
  };
}

/** Newest first, without an immediate duplicate, capped at three. */
export function pushRecentSearch(session: Session, criteria: QueryCriteria): void {
  const [latest] = session.recentSearches;
  if (latest && JSON.stringify(latest) === JSON.stringify(criteria)) {
    return;
  }
  session.recentSearches = [criteria, ...session.recentSearches].slice(0, RECENT_SEARCH_LIMIT);
}

export interface SessionStore {
  get(uid: number): Session | undefined;
  put(session: Session): void;
  delete(uid: number): void;
  size(): number;
}

/**
 * Process-local sessions keyed by Telegram user id. With `ttlMs` > 0 a session
 * untouched for longer than the TTL is dropped on its next lookup.
 */
export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<number, Session>();

  constructor(
    private readonly ttlMs = 0,
    private readonly now: () => number = Date.now
  ) {}

  get(uid: number): Session | undefined {
    const existing = this.sessions.get(uid);
    if (!existing) {
      return undefined;
    }
    const now = this.now();
    if (this.ttlMs > 0 && now - existing.touchedAt > this.ttlMs) {
      this.sessions.delete(uid);
      return undefined;
    }
    existing.touchedAt = now;
    return existing;
  }

  put(session: Session): void {
    session.touchedAt = this.now();
    this.sessions.set(session.uid, session);
  }

  delete(uid: number): void {
    this.sessions.delete(uid);
  }

  size(): number {
    return this.sessions.size;
  }
}

/** Replaces the session's result set and rewinds the cursor to the first listing. */
export function showResults(session: Session, listings: readonly Listing[]): ResultCursor {
  const cursor = new ResultCursor(listings);
  session.results = cursor;
  return cursor;
}
