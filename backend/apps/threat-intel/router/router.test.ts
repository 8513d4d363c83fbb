import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { searchRequestSchema } from "./index";

describe("searchRequestSchema", () => {
  it("fills defaults", () => {
    expect(searchRequestSchema.parse({})).toEqual({
      content_type: "both",
      severity: [],
      days_back: 7,
      max_results: 10,
    });
  });

  it("normalizes and dedups severities", () => {
    const body = searchRequestSchema.parse({ content_type: "cve", severity: ["high", "CRITICAL", " High "] });
    expect(body.severity).toEqual(["High", "Critical"]);
  });

  it("coerces numeric strings", () => {
    const body = searchRequestSchema.parse({ days_back: "3", max_results: "25" });
    expect(body.days_back).toBe(3);
    expect(body.max_results).toBe(25);
  });

  it("rejects unknown severities and out of range values", () => {
    expect(() => searchRequestSchema.parse({ severity: ["severe"] })).toThrow(ZodError);
    expect(() => searchRequestSchema.parse({ max_results: 51 })).toThrow(ZodError);
    expect(() => searchRequestSchema.parse({ days_back: 0 })).toThrow(ZodError);
    expect(() => searchRequestSchema.parse({ content_type: "blog" })).toThrow(ZodError);
  });
});
