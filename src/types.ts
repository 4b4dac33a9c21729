export const LANGS = ["ru", "en", "ka"] as const;
export type Lang = (typeof LANGS)[number];
export const DEFAULT_LANG: Lang = "ru";

export type Mode = "rent" | "sale" | "daily";

export const PHOTO_FIELDS = [
  "photo1",
  "photo2",
  "photo3",
  "photo4",
  "photo5",
  "photo6",
  "photo7",
  "photo8",
  "photo9",
  "photo10"
] as const;
export type PhotoField = (typeof PHOTO_FIELDS)[number];

export const LISTING_FIELDS = [
  "id",
  "mode",
  "city",
  "district",
  "type",
  "rooms",
  "price",
  "published",
  "title_ru",
  "title_en",
  "title_ka",
  "description_ru",
  "description_en",
  "description_ka",
  "phone",
  ...PHOTO_FIELDS
] as const;
export type ListingField = (typeof LISTING_FIELDS)[number];

/**
 * One sheet row. Values are kept verbatim; a blank cell is an absent field.
 */
export type Listing = Partial<Record<ListingField, string>>;

export type PriceCriterion =
  /** Symbolic range such as "500-1000", "1500+" or a bare cap "1000". */
  | { kind: "range"; value: string }
  /** Explicit bounds; an absent side is unbounded. */
  | { kind: "bounds"; min?: number; max?: number };

/** Absent or empty fields are wildcards. */
export type QueryCriteria = {
  mode?: string;
  city?: string;
  district?: string;
  rooms?: string;
  price?: PriceCriterion;
};
