import { listingIdentity } from "../listings/listing.js";
import type { Listing } from "../types.js";

export type FavoriteListing = {
  identity: string;
  listing: Listing;
  addedAt: Date;
};

export type FavoritesStore = {
  items: FavoriteListing[];
};

export function createEmptyFavorites(): FavoritesStore {
  return { items: [] };
}

export function isFavorite(favorites: FavoritesStore, identity: string): boolean {
  return favorites.items.some((item) => item.identity === identity);
}

export function addFavorite(
  favorites: FavoritesStore,
  listing: Listing,
  addedAt: Date = new Date()
): { favorites: FavoritesStore; added: boolean } {
  const identity = listingIdentity(listing);
  if (isFavorite(favorites, identity)) {
    return { favorites, added: false };
  }
  return {
    favorites: {
      ...favorites,
      items: [...favorites.items, { identity, listing, addedAt }]
    },
    added: true
  };
}

export function removeFavorite(
  favorites: FavoritesStore,
  identity: string
): { favorites: FavoritesStore; removed: boolean } {
  const next = favorites.items.filter((item) => item.identity !== identity);
  if (next.length === favorites.items.length) {
    return { favorites, removed: false };
  }
  return {
    favorites: {
      ...favorites,
      items: next
    },
    removed: true
  };
}

/** Adds the listing when absent, removes it when present. */
export function toggleFavorite(
  favorites: FavoritesStore,
  listing: Listing
): { favorites: FavoritesStore; added: boolean } {
  const identity = listingIdentity(listing);
  if (isFavorite(favorites, identity)) {
    return { favorites: removeFavorite(favorites, identity).favorites, added: false };
  }
  return addFavorite(favorites, listing);
}

export function favoriteListings(favorites: FavoritesStore): Listing[] {
  return favorites.items.map((item) => item.listing);
}
