import type { Listing, ListingField, PriceCriterion, QueryCriteria } from "../types.js";
import { digitsOnly, isSkip, norm, normMode, parsePrice, parseRooms } from "./normalize.js";

export type FilterOptions = {
  /** Listings without a price pass every price criterion. */
  zeroPricePasses?: boolean;
};

type PriceBounds = { min?: number; max?: number };

/**
 * Parses a symbolic price range. "500-1000" is inclusive, "1500-", "1500+"
 * and "≥1500" are open-ended above, a bare "1000" is an upper cap. Text
 * without digits is not a range.
 */
export function parsePriceRange(value: string): PriceBounds | undefined {
  const text = value.trim();
  if (text === "" || isSkip(text)) return undefined;
  if (!/\d/.test(text)) return undefined;

  const dash = text.indexOf("-");
  if (dash >= 0) {
    const left = digitsOnly(text.slice(0, dash));
    const right = digitsOnly(text.slice(dash + 1));
    return right === 0 ? { min: left } : { min: left, max: right };
  }

  if (text.startsWith("≥") || text.endsWith("+")) {
    return { min: digitsOnly(text) };
  }

  const cap = parsePrice(text);
  return cap > 0 ? { max: cap } : undefined;
}

function priceBounds(price: PriceCriterion | undefined): PriceBounds | undefined {
  if (!price) return undefined;
  if (price.kind === "range") return parsePriceRange(price.value);
  if (price.min === undefined && price.max === undefined) return undefined;
  return { min: price.min, max: price.max };
}

function matchesRooms(listing: Listing, wanted: string): boolean {
  const need = parseRooms(wanted);
  if (need === undefined) return true;
  const have = parseRooms(listing.rooms);
  if (have === undefined) return false;
  if (wanted.includes("+")) return have >= need;
  if (need === 0.5 || have === 0.5) return need === have;
  return Math.trunc(need) === Math.trunc(have);
}

function matchesPrice(listing: Listing, bounds: PriceBounds, zeroPricePasses: boolean): boolean {
  const price = parsePrice(listing.price);
  if (price === 0 && zeroPricePasses) return true;
  if (bounds.min !== undefined && price < bounds.min) return false;
  if (bounds.max !== undefined && price > bounds.max) return false;
  return true;
}

export function matchesCriteria(listing: Listing, criteria: QueryCriteria, options: FilterOptions = {}): boolean {
  const mode = norm(criteria.mode);
  if (mode && normMode(listing.mode) !== normMode(mode)) return false;

  const city = norm(criteria.city);
  if (city && norm(listing.city) !== city) return false;

  const district = norm(criteria.district);
  if (district && norm(listing.district) !== district) return false;

  const rooms = norm(criteria.rooms);
  if (rooms && !matchesRooms(listing, rooms)) return false;

  const bounds = priceBounds(criteria.price);
  if (bounds && !matchesPrice(listing, bounds, options.zeroPricePasses ?? true)) return false;

  return true;
}

/** Order-preserving filter over the snapshot. */
export function filterListings(
  listings: readonly Listing[],
  criteria: QueryCriteria,
  options: FilterOptions = {}
): Listing[] {
  return listings.filter((listing) => matchesCriteria(listing, criteria, options));
}

/** Most recent first by the raw `published` string; ties keep snapshot order. */
export function sortByPublishedDesc(listings: readonly Listing[]): Listing[] {
  return listings
    .map((listing, index) => ({ listing, index }))
    .sort((a, b) => {
      const left = a.listing.published ?? "";
      const right = b.listing.published ?? "";
      if (left === right) return a.index - b.index;
      return left < right ? 1 : -1;
    })
    .map(({ listing }) => listing);
}

export type ValueCount = { value: string; count: number };

/**
 * Distinct non-empty values of `field` among listings matching `criteria`,
 * most frequent first. Values that differ only by case or spacing are merged
 * under the first spelling seen.
 */
export function countDistinct(
  listings: readonly Listing[],
  field: ListingField,
  criteria: QueryCriteria
): ValueCount[] {
  const counts = new Map<string, ValueCount>();
  for (const listing of listings) {
    const raw = listing[field]?.trim();
    if (!raw || !matchesCriteria(listing, criteria)) continue;
    const key = norm(raw);
    const existing = counts.get(key);
    if (existing) {
      existing.count += 1;
    } else {
      counts.set(key, { value: raw, count: 1 });
    }
  }
  return [...counts.values()].sort((a, b) => b.count - a.count || a.value.toLowerCase().localeCompare(b.value.toLowerCase()));
}
