import type { ReportFacts } from "./analytics";
import { formatAmount, formatWithUnit } from "./format";
import { describe } from "./valuation";

export const REPORT_HEADER = "===== REAL ESTATE VALUATION REPORT =====";

export const EMPTY_COLLECTION_MESSAGE =
  "No properties loaded. Cannot compute analytics.";

export const AREA_UNIT = "m²";

export interface RenderOptions {
  currency: string;
}

export function renderReport(facts: ReportFacts, options: RenderOptions): string {
  const money = (value: number) => formatWithUnit(value, options.currency);
  const lines: string[] = [REPORT_HEADER, ""];

  lines.push(`1. Average base price: ${money(facts.averageBasePrice)}`);

  lines.push(
    facts.cheapest
      ? `2. Cheapest listing final price: ${money(facts.cheapest.finalPrice)}`
      : "2. No cheapest listing available"
  );

  lines.push(
    facts.mostExpensiveInCity
      ? `3. Most expensive listing in ${facts.targetCity} - average area per room: ` +
          `${formatAmount(facts.mostExpensiveInCity.averageAreaPerRoom)} ${AREA_UNIT}`
      : `3. No listings found in ${facts.targetCity}`
  );

  lines.push(`4. Total valuation of all listings: ${money(facts.totalValuation)}`);

  lines.push(
    "",
    `5. Flats at or below the average final price (${money(facts.averageFinalPrice)}):`
  );
  if (facts.affordableFlats.length === 0) {
    lines.push("   No flats found at or below the average final price.");
  } else {
    for (const flat of facts.affordableFlats) {
      lines.push(`   - ${describe(flat.listing)}`);
    }
  }

  return lines.join("\n") + "\n";
}
