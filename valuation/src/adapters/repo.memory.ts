import type { Listing } from "../core/dto";
import type { ListingRepoPort } from "../core/ports";

const kindOrder = { standard: 0, prefab: 1 } as const;

function compareNumbers(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Total order over listings: (location, basePrice, areaSqm, roomCount,
 * category), then kind with standard first, then the prefab fields.
 */
export function compareListings(a: Listing, b: Listing): number {
  const byBase =
    compareStrings(a.location, b.location) ||
    compareNumbers(a.basePrice, b.basePrice) ||
    compareNumbers(a.areaSqm, b.areaSqm) ||
    compareNumbers(a.roomCount, b.roomCount) ||
    compareStrings(a.category, b.category) ||
    compareNumbers(kindOrder[a.kind], kindOrder[b.kind]);
  if (byBase !== 0) return byBase;

  if (a.kind === "prefab" && b.kind === "prefab") {
    return (
      compareNumbers(a.floor, b.floor) ||
      compareNumbers(Number(a.isInsulated), Number(b.isInsulated))
    );
  }
  return 0;
}

export class MemoryListingRepo implements ListingRepoPort {
  private listings: Listing[] = [];

  add(listing: Listing): boolean {
    // binary search for the insertion point
    let lo = 0;
    let hi = this.listings.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const cmp = compareListings(this.listings[mid], listing);
      if (cmp === 0) return false;
      if (cmp < 0) lo = mid + 1;
      else hi = mid;
    }

    this.listings.splice(lo, 0, { ...listing });
    return true;
  }

  all(): Listing[] {
    return this.listings.map((listing) => ({ ...listing }));
  }

  isEmpty(): boolean {
    return this.listings.length === 0;
  }

  size(): number {
    return this.listings.length;
  }
}
