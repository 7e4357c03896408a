import type { Listing } from "./dto";

// Line-oriented record source (file, bundled sample data, ...)
export interface SourcePort {
  readonly name: string;
  readLines(): Promise<string[]>;
}

// Collection of valued listings, unique and iterated in key order
export interface ListingRepoPort {
  add(listing: Listing): boolean; // false when an equal listing is already stored
  all(): Listing[];
  isEmpty(): boolean;
  size(): number;
}

// Destination for the rendered report
export interface ReportSinkPort {
  readonly target: string;
  write(report: string): Promise<void>;
}
