import { describe, expect, it } from "vitest";
import { daysBefore, makeCve, makeNews } from "../test-helpers";
import { cveScore, filterForQuery, mergeByUrl, rankAndCap } from "./ranking";

describe("rankAndCap", () => {
  const cves = [
    makeCve({ url: "low", cvssScore: 3, intrigue: 2 }),
    makeCve({ url: "top", cvssScore: 9.8, intrigue: 9 }),
    makeCve({ url: "mid", cvssScore: 7, intrigue: 5 }),
  ];
  const news = [
    makeNews({ url: "n-low", intrigue: 2 }),
    makeNews({ url: "n-high", intrigue: 8 }),
  ];

  it("scores CVEs as 0.6 cvss + 0.4 intrigue", () => {
    expect(cveScore(makeCve({ cvssScore: 10, intrigue: 5 }))).toBeCloseTo(8);
  });

  it("returns only CVEs for cve queries", () => {
    const ranked = rankAndCap(cves, news, "cve", 2);
    expect(ranked.cves.map((c) => c.url)).toEqual(["top", "mid"]);
    expect(ranked.news).toEqual([]);
  });

  it("returns only news for news queries", () => {
    const ranked = rankAndCap(cves, news, "news", 5);
    expect(ranked.cves).toEqual([]);
    expect(ranked.news.map((n) => n.url)).toEqual(["n-high", "n-low"]);
  });

  it("caps each category at half for both, without backfilling", () => {
    const ranked = rankAndCap(cves, [news[0]], "both", 5);
    expect(ranked.cves.map((c) => c.url)).toEqual(["top", "mid"]);
    expect(ranked.news.map((n) => n.url)).toEqual(["n-low"]);
  });

  it("keeps input order among equal scores and does not mutate input", () => {
    const tied = [
      makeCve({ url: "a", cvssScore: 5, intrigue: 5 }),
      makeCve({ url: "b", cvssScore: 5, intrigue: 5 }),
      makeCve({ url: "c", cvssScore: 5, intrigue: 5 }),
    ];
    const first = rankAndCap(tied, [], "cve", 3).cves.map((c) => c.url);
    const second = rankAndCap(tied, [], "cve", 3).cves.map((c) => c.url);
    expect(first).toEqual(["a", "b", "c"]);
    expect(second).toEqual(first);
    expect(tied.map((c) => c.url)).toEqual(["a", "b", "c"]);
  });
});

describe("filterForQuery", () => {
  it("applies the date cutoff to both kinds and severity to CVEs", () => {
    const cutoff = daysBefore(3);
    const filtered = filterForQuery(
      [
        makeCve({ url: "keep", severity: "High", publishedDate: daysBefore(1) }),
        makeCve({ url: "old", severity: "High", publishedDate: daysBefore(5) }),
        makeCve({ url: "low", severity: "Low", publishedDate: daysBefore(1) }),
      ],
      [makeNews({ url: "n-new", publishedDate: daysBefore(1) }), makeNews({ url: "n-old", publishedDate: daysBefore(5) })],
      ["High"],
      cutoff,
    );
    expect(filtered.cves.map((c) => c.url)).toEqual(["keep"]);
    expect(filtered.news.map((n) => n.url)).toEqual(["n-new"]);
  });

  it("keeps every severity when the list is empty", () => {
    const filtered = filterForQuery([makeCve({ severity: "Low" })], [], [], daysBefore(3));
    expect(filtered.cves).toHaveLength(1);
  });
});

describe("mergeByUrl", () => {
  it("keeps the first record seen for each url", () => {
    const merged = mergeByUrl(
      [makeNews({ url: "a", summary: "fresh" })],
      [makeNews({ url: " a ", summary: "stored" }), makeNews({ url: "b" })],
    );
    expect(merged.map((n) => n.summary)).toEqual(["fresh", "A ransomware campaign hit several hospitals."]);
  });
});
