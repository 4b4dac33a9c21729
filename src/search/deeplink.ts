import type { QueryCriteria } from "../types.js";
import { normMode } from "./normalize.js";

/**
 * Reads `/go` arguments such as `city=Tbilisi&rooms=2&price=500-1000&mode=rent`.
 * Returns undefined when no known key is present.
 */
export function parseDeepLink(payload: string): QueryCriteria | undefined {
  const query = payload.trim().replace(/^\?/, "");
  if (!query) return undefined;

  const params = new URLSearchParams(query);
  const value = (key: string) => params.get(key)?.trim() ?? "";

  const criteria: QueryCriteria = {};
  const mode = normMode(value("mode"));
  if (mode) criteria.mode = mode;
  if (value("city")) criteria.city = value("city");
  if (value("district")) criteria.district = value("district");
  if (value("rooms")) criteria.rooms = value("rooms");
  if (value("price")) criteria.price = { kind: "range", value: value("price") };

  return Object.keys(criteria).length > 0 ? criteria : undefined;
}

/** One-line summary of a search, used for the `/repeat` buttons. */
export function describeCriteria(criteria: QueryCriteria): string {
  const price = criteria.price;
  const priceText =
    price?.kind === "range"
      ? price.value
      : price && (price.min !== undefined || price.max !== undefined)
        ? `${price.min ?? 0}-${price.max ?? "∞"}`
        : "";
  const parts = [criteria.mode, criteria.city, criteria.district, criteria.rooms, priceText].filter(
    (part): part is string => Boolean(part)
  );
  return parts.length > 0 ? parts.join(" · ") : "—";
}
