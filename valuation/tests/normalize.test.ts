import { describe, expect, it } from "vitest";
import { MalformedRecordError, UnknownRecordTypeError } from "../src/core/errors";
import { isBlankLine, parseRecord } from "../src/core/normalize";

function parseError(line: string, lineNumber = 1): unknown {
  try {
    parseRecord(line, lineNumber);
  } catch (error) {
    return error;
  }
  throw new Error(`expected "${line}" to be rejected`);
}

describe("normalize", () => {
  describe("parseRecord", () => {
    it("should parse a REALESTATE record", () => {
      expect(parseRecord("REALESTATE#Budapest#250000#100#4#FLAT", 1)).toEqual({
        kind: "standard",
        location: "Budapest",
        basePrice: 250000,
        areaSqm: 100,
        roomCount: 4,
        category: "FLAT",
      });
    });

    it("should parse a PANEL record", () => {
      expect(parseRecord("PANEL#Debrecen#120000#35#2#FLAT#0#yes", 1)).toEqual({
        kind: "prefab",
        location: "Debrecen",
        basePrice: 120000,
        areaSqm: 35,
        roomCount: 2,
        category: "FLAT",
        floor: 0,
        isInsulated: true,
      });
    });

    it("should match record types and flags case-insensitively", () => {
      const unit = parseRecord("panel#Budapest#180000#70#3#flat#4#YES", 1);
      expect(unit).toMatchObject({ kind: "prefab", category: "FLAT", isInsulated: true });

      const listing = parseRecord("RealEstate#Budapest#180000#70#3#farm", 1);
      expect(listing).toMatchObject({ kind: "standard", category: "FARM" });
    });

    it("should treat anything but yes as not insulated", () => {
      const unit = parseRecord("PANEL#Budapest#180000#70#3#FLAT#4#no", 1);
      expect(unit).toMatchObject({ isInsulated: false });

      const other = parseRecord("PANEL#Budapest#180000#70#3#FLAT#4#true", 1);
      expect(other).toMatchObject({ isInsulated: false });
    });

    it("should accept the family house spellings", () => {
      for (const spelling of ["FAMILYHOUSE", "familyhouse", "FAMILY_HOUSE", "Family House"]) {
        const listing = parseRecord(`REALESTATE#Debrecen#220000#120#5#${spelling}`, 1);
        expect(listing.category).toBe("FAMILY_HOUSE");
      }
    });

    it("should trim fields and accept decimals", () => {
      expect(parseRecord("  REALESTATE# Szeged # 99999.5 # 45.25 # 2 # FLAT ", 1)).toEqual({
        kind: "standard",
        location: "Szeged",
        basePrice: 99999.5,
        areaSqm: 45.25,
        roomCount: 2,
        category: "FLAT",
      });
    });

    it("should allow zero rooms", () => {
      expect(parseRecord("REALESTATE#Szeged#50000#20#0#FARM", 1).roomCount).toBe(0);
    });

    it("should reject unknown record types", () => {
      const error = parseError("VILLA#Budapest#1#1#1#FLAT", 7);

      expect(error).toBeInstanceOf(UnknownRecordTypeError);
      expect(error).toMatchObject({ lineNumber: 7, recordType: "VILLA" });
    });

    it("should reject records with missing fields", () => {
      const error = parseError("REALESTATE#Budapest#250000", 2);

      expect(error).toBeInstanceOf(MalformedRecordError);
      expect(error).toMatchObject({
        lineNumber: 2,
        reason: "expected 5 fields after REALESTATE, got 2",
      });
    });

    it("should reject a PANEL record without its extra fields", () => {
      const error = parseError("PANEL#Budapest#180000#70#3#FLAT", 4);
      expect(error).toMatchObject({ reason: "expected 7 fields after PANEL, got 5" });
    });

    it.each([
      ["REALESTATE#Budapest#abc#100#4#FLAT", /^basePrice /],
      ["REALESTATE#Budapest##100#4#FLAT", /^basePrice is empty$/],
      ["REALESTATE#Budapest#-5#100#4#FLAT", /^basePrice /],
      ["REALESTATE#Budapest#250000#100#2.5#FLAT", /^roomCount /],
      ["REALESTATE#Budapest#250000#100#-1#FLAT", /^roomCount /],
      ["REALESTATE# #250000#100#4#FLAT", /^location is empty$/],
      ["REALESTATE#Budapest#250000#100#4#CASTLE", /^category unknown category "CASTLE"$/],
      ["PANEL#Budapest#180000#70#3#FLAT#high#no", /^floor /],
    ])("should reject %s", (line, reason) => {
      const error = parseError(line, 3);

      expect(error).toBeInstanceOf(MalformedRecordError);
      expect(error).toMatchObject({ lineNumber: 3, reason: expect.stringMatching(reason) });
    });
  });

  describe("isBlankLine", () => {
    it("should detect whitespace-only lines", () => {
      expect(isBlankLine("")).toBe(true);
      expect(isBlankLine("   \t")).toBe(true);
      expect(isBlankLine("REALESTATE#Budapest#1#1#1#FLAT")).toBe(false);
    });
  });
});
