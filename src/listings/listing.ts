import crypto from "node:crypto";

import { LISTING_FIELDS, type Listing, type ListingField } from "../types.js";

const KNOWN_FIELDS: ReadonlySet<string> = new Set(LISTING_FIELDS);

function isListingField(key: string): key is ListingField {
  return KNOWN_FIELDS.has(key);
}

function cellText(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

/** Maps a header-keyed sheet row onto a Listing; unknown columns and blank cells are dropped. */
export function toListing(row: Record<string, unknown>): Listing {
  const listing: Listing = {};
  for (const [rawKey, rawValue] of Object.entries(row)) {
    const key = rawKey.trim().toLowerCase();
    if (!isListingField(key)) continue;
    const text = cellText(rawValue);
    if (text !== "") listing[key] = text;
  }
  return listing;
}

export function rowsToListings(values: unknown[][]): Listing[] {
  const [header, ...rows] = values;
  if (!header) return [];
  const keys = header.map((cell) => cellText(cell));
  const listings: Listing[] = [];
  for (const row of rows) {
    const record: Record<string, unknown> = {};
    keys.forEach((key, index) => {
      if (key) record[key] = row[index];
    });
    const listing = toListing(record);
    if (Object.keys(listing).length > 0) listings.push(listing);
  }
  return listings;
}

const IDENTITY_FIELDS: readonly ListingField[] = LISTING_FIELDS.filter(
  (field) => field !== "id" && !field.startsWith("description_")
);

/**
 * Identity for favourites. Uses the sheet's `id` column when present, otherwise a
 * hash of the visible fields; two rows with identical visible fields collide.
 */
export function listingIdentity(listing: Listing): string {
  if (listing.id) return `id:${listing.id}`;
  const visible = IDENTITY_FIELDS.map((field) => `${field}=${listing[field] ?? ""}`).join("\u0001");
  return crypto.createHash("sha256").update(visible).digest("hex").slice(0, 16);
}
