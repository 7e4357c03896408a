export type Money = number;

export type Category = "FAMILY_HOUSE" | "FLAT" | "FARM";

export type ListingKind = "standard" | "prefab";

export interface ListingBase {
  location: string;
  basePrice: Money; // unadjusted asking price
  areaSqm: number;
  roomCount: number; // integer, may be 0
  category: Category;
}

export interface StandardListing extends ListingBase {
  kind: "standard";
}

// Prefabricated (panel) building unit
export interface PrefabListing extends ListingBase {
  kind: "prefab";
  floor: number;
  isInsulated: boolean;
}

export type Listing = StandardListing | PrefabListing;

export interface PricedListing {
  listing: Listing;
  finalPrice: Money; // integral
}

export interface LoadResult {
  source: string;
  processed: number;
  added: number;
  duplicates: number;
  skipped: number; // unknown record types
  malformed: number;
  durationMs: number;
}
