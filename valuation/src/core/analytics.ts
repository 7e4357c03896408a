import type { Listing, Money, PricedListing } from "./dto";
import { averageAreaPerRoom, finalPrice, sameLocation } from "./valuation";

export interface AnalyticsOptions {
  targetCity: string;
}

export interface CityTopListing extends PricedListing {
  averageAreaPerRoom: number;
}

export interface ReportFacts {
  averageBasePrice: Money;
  cheapest: PricedListing | null;
  targetCity: string;
  mostExpensiveInCity: CityTopListing | null;
  totalValuation: Money;
  averageFinalPrice: Money;
  affordableFlats: PricedListing[];
}

export type AnalyticsResult =
  | { kind: "empty" }
  | { kind: "report"; facts: ReportFacts };

function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

// First element wins ties, so results follow iteration order
function pickBy<T>(items: T[], better: (candidate: T, best: T) => boolean): T | null {
  let best: T | null = null;
  for (const item of items) {
    if (best === null || better(item, best)) {
      best = item;
    }
  }
  return best;
}

export function cheapestListing(priced: PricedListing[]): PricedListing | null {
  return pickBy(priced, (c, best) => c.finalPrice < best.finalPrice);
}

export function mostExpensiveIn(
  priced: PricedListing[],
  city: string
): CityTopListing | null {
  const inCity = priced.filter((p) => sameLocation(p.listing.location, city));
  const top = pickBy(inCity, (c, best) => c.finalPrice > best.finalPrice);
  return top ? { ...top, averageAreaPerRoom: averageAreaPerRoom(top.listing) } : null;
}

export function affordableFlats(
  priced: PricedListing[],
  averageFinalPrice: Money
): PricedListing[] {
  return priced.filter(
    (p) => p.listing.category === "FLAT" && p.finalPrice <= averageFinalPrice
  );
}

/**
 * Compute the five report facts over a collection, in its iteration order.
 */
export function analyze(
  listings: readonly Listing[],
  options: AnalyticsOptions
): AnalyticsResult {
  if (listings.length === 0) {
    return { kind: "empty" };
  }

  const priced: PricedListing[] = listings.map((listing) => ({
    listing,
    finalPrice: finalPrice(listing),
  }));

  const averageFinalPrice = mean(priced.map((p) => p.finalPrice));

  return {
    kind: "report",
    facts: {
      averageBasePrice: mean(listings.map((l) => l.basePrice)),
      cheapest: cheapestListing(priced),
      targetCity: options.targetCity,
      mostExpensiveInCity: mostExpensiveIn(priced, options.targetCity),
      totalValuation: priced.reduce((sum, p) => sum + p.finalPrice, 0),
      averageFinalPrice,
      affordableFlats: affordableFlats(priced, averageFinalPrice),
    },
  };
}
