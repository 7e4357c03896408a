import type { Listing, Money, PrefabListing } from "./dto";
import { InvalidDiscountError } from "./errors";
import { formatAmount } from "./format";

// Premium applied on top of the base price in the designated cities
export const LOCATION_PREMIUMS: Readonly<Record<string, number>> = {
  budapest: 1.3,
  debrecen: 1.2,
  nyiregyhaza: 1.15,
};

const LOW_FLOOR_MULTIPLIER = 1.05; // floors 0..2
const TOP_FLOOR_MULTIPLIER = 0.95; // floor 10
const INSULATION_MULTIPLIER = 1.05;

// Digits kept before the integer rounding; drops binary noise such as 57.49999999999999
const PRICE_PRECISION = 6;

/**
 * Comparison key for a location: lower-cased with diacritics stripped,
 * so "Nyíregyháza" and "NYIREGYHAZA" name the same city.
 */
export function locationKey(location: string): string {
  return location
    .trim()
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase();
}

export function sameLocation(a: string, b: string): boolean {
  return locationKey(a) === locationKey(b);
}

export function locationMultiplier(location: string): number {
  return LOCATION_PREMIUMS[locationKey(location)] ?? 1;
}

export function floorMultiplier(floor: number): number {
  if (floor >= 0 && floor <= 2) return LOW_FLOOR_MULTIPLIER;
  if (floor === 10) return TOP_FLOOR_MULTIPLIER;
  return 1;
}

/**
 * Final price of a listing: base price times the location premium and,
 * for prefab units, the floor and insulation adjustments. Rounded once,
 * half-up, after every multiplier has been applied. Never writes back to
 * the listing.
 */
export function finalPrice(listing: Listing): Money {
  let price = listing.basePrice * locationMultiplier(listing.location);

  if (listing.kind === "prefab") {
    price *= floorMultiplier(listing.floor);
    if (listing.isInsulated) {
      price *= INSULATION_MULTIPLIER;
    }
  }

  return Math.round(Number(price.toFixed(PRICE_PRECISION)));
}

export function averageAreaPerRoom(listing: Listing): number {
  return listing.roomCount !== 0 ? listing.areaSqm / listing.roomCount : 0;
}

/**
 * Base price per room. Uses the unadjusted price so units in different
 * cities compare before location premiums.
 */
export function roomPrice(listing: PrefabListing): Money {
  return listing.roomCount !== 0 ? listing.basePrice / listing.roomCount : 0;
}

export function sameFinalPrice(
  a: PrefabListing | null | undefined,
  b: Listing | null | undefined
): boolean {
  if (!a || !b) return false;
  return finalPrice(a) === finalPrice(b);
}

/**
 * Reduce the base price by a percentage in [0, 100], in place
 */
export function applyDiscount(listing: Listing, percentage: number): void {
  if (!Number.isFinite(percentage) || percentage < 0 || percentage > 100) {
    throw new InvalidDiscountError(percentage);
  }
  listing.basePrice = listing.basePrice - listing.basePrice * (percentage / 100);
}

export function describe(listing: Listing): string {
  const base =
    `Listing{location='${listing.location}'` +
    `, basePrice=${formatAmount(listing.basePrice)}` +
    `, areaSqm=${formatAmount(listing.areaSqm)}` +
    `, roomCount=${listing.roomCount}` +
    `, category=${listing.category}}`;

  if (listing.kind === "prefab") {
    return `${base} prefab{floor=${listing.floor}, insulated=${listing.isInsulated}}`;
  }
  return base;
}
