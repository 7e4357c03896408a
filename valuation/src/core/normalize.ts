import { z } from "zod";
import type { Category, Listing } from "./dto";
import { MalformedRecordError, UnknownRecordTypeError } from "./errors";

export const FIELD_SEPARATOR = "#";

export type RecordType = "REALESTATE" | "PANEL";

const categoryMap: Record<string, Category> = {
  FAMILYHOUSE: "FAMILY_HOUSE",
  FLAT: "FLAT",
  FARM: "FARM",
};

const numeric = z.string().trim().min(1, "is empty").pipe(z.coerce.number().finite());

const category = z.string().transform((value, ctx): Category => {
  const mapped = categoryMap[value.trim().toUpperCase().replace(/[\s_-]+/g, "")];
  if (!mapped) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `unknown category "${value.trim()}"`,
    });
    return z.NEVER;
  }
  return mapped;
});

const baseFields = z.object({
  location: z.string().trim().min(1, "is empty"),
  basePrice: numeric.pipe(z.number().nonnegative()),
  areaSqm: numeric.pipe(z.number().nonnegative()),
  roomCount: numeric.pipe(z.number().int().nonnegative()),
  category,
});

const prefabFields = baseFields.extend({
  floor: numeric.pipe(z.number().int()),
  isInsulated: z.string().transform((value) => value.trim().toLowerCase() === "yes"),
});

const fieldNames = {
  REALESTATE: ["location", "basePrice", "areaSqm", "roomCount", "category"],
  PANEL: [
    "location",
    "basePrice",
    "areaSqm",
    "roomCount",
    "category",
    "floor",
    "isInsulated",
  ],
} as const satisfies Record<RecordType, readonly string[]>;

function toRecordType(value: string): RecordType | undefined {
  const upper = value.trim().toUpperCase();
  return upper === "REALESTATE" || upper === "PANEL" ? upper : undefined;
}

function zipFields(
  names: readonly string[],
  values: string[]
): Record<string, string> {
  return Object.fromEntries(names.map((name, i) => [name, values[i]]));
}

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  const field = issue?.path.join(".");
  return field ? `${field} ${issue.message}` : issue?.message ?? "invalid record";
}

/**
 * Parse one "#"-delimited input line into a listing.
 *
 *   REALESTATE#city#price#sqm#rooms#category
 *   PANEL#city#price#sqm#rooms#category#floor#insulated
 */
export function parseRecord(line: string, lineNumber: number): Listing {
  const [head, ...values] = line.trim().split(FIELD_SEPARATOR);
  const type = toRecordType(head ?? "");
  if (!type) {
    throw new UnknownRecordTypeError(lineNumber, (head ?? "").trim());
  }

  const names = fieldNames[type];
  if (values.length < names.length) {
    throw new MalformedRecordError(
      lineNumber,
      `expected ${names.length} fields after ${type}, got ${values.length}`
    );
  }

  const raw = zipFields(names, values);

  if (type === "PANEL") {
    const parsed = prefabFields.safeParse(raw);
    if (!parsed.success) {
      throw new MalformedRecordError(lineNumber, firstIssue(parsed.error));
    }
    return { kind: "prefab", ...parsed.data };
  }

  const parsed = baseFields.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedRecordError(lineNumber, firstIssue(parsed.error));
  }
  return { kind: "standard", ...parsed.data };
}

export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}
