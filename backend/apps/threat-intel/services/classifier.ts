import { z } from "zod";
import { log, errorMessage } from "backend/utils/log";
import {
  UNKNOWN_CVE_ID,
  toSeverity,
  type ClassificationResult,
} from "@shared/types/intel";
import type { LlmClient } from "./llm";

const SOURCE = "classifier";

export const FALLBACK_CLASSIFICATION: Readonly<ClassificationResult> = Object.freeze({
  type: "News",
  cveId: [UNKNOWN_CVE_ID],
  severity: "Medium",
  cvssScore: 5.0,
  summary: "Classification failed - manual review needed",
  intrigue: 3,
  affectedProducts: [UNKNOWN_CVE_ID],
});

const SYSTEM_PROMPT =
  "You are a cybersecurity analyst. You classify security articles and answer only with JSON.";

function buildPrompt(text: string): string {
  return `
Classify the following security article. For every distinct vulnerability it describes, return one JSON object:
{
  "type": "CVE" if the article describes a specific vulnerability with a CVE identifier, otherwise "News",
  "cve_id": ["CVE-YYYY-NNNNN", ...] or ["Unknown"],
  "severity": "Low" | "Medium" | "High" | "Critical",
  "cvss_score": number from 0.0 to 10.0,
  "summary": "Two or three factual sentences in English",
  "intrigue": number from 0 to 10 rating how notable this is for a security team,
  "affected_products": ["product", ...]
}
If the article is general security news, return a single object with "type": "News".

ARTICLE:
${text.substring(0, 6000)}
`;
}

/**
 * Collects every balanced {...} substring of the response, honouring string
 * literals and escapes. Nested objects are part of their parent. A candidate
 * that fails to parse is dropped and the scan resumes inside it.
 */
export function extractJsonObjects(raw: string): Record<string, unknown>[] {
  const objects: Record<string, unknown>[] = [];
  let i = 0;

  while (i < raw.length) {
    if (raw[i] !== "{") {
      i++;
      continue;
    }

    const end = findObjectEnd(raw, i);
    if (end === -1) {
      i++;
      continue;
    }

    try {
      const parsed: unknown = JSON.parse(raw.slice(i, end + 1));
      if (parsed !== null && typeof parsed === "object" && !Array.isArray(parsed)) {
        objects.push(Object.fromEntries(Object.entries(parsed)));
        i = end + 1;
        continue;
      }
    } catch {
      // malformed fragment
    }
    i++;
  }

  return objects;
}

function findObjectEnd(raw: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < raw.length; i++) {
    const ch = raw[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

const score = (fallback: number) =>
  z.coerce.number().catch(fallback).transform((n) => Math.min(10, Math.max(0, n)));

const stringList = z
  .union([z.array(z.unknown()), z.string()])
  .catch([])
  .transform((value) => {
    const items = typeof value === "string" ? value.split(",") : value;
    return items
      .filter((item): item is string | number => typeof item === "string" || typeof item === "number")
      .map((item) => String(item).trim())
      .filter(Boolean);
  });

const UNKNOWN_IDS = new Set(["unknown", "n/a", "none", "null", ""]);

const classificationSchema = z
  .object({
    type: z.string().catch("News"),
    cve_id: stringList,
    severity: z.unknown(),
    cvss_score: score(0),
    summary: z.string().catch(""),
    intrigue: score(0),
    affected_products: stringList,
  })
  .transform((raw): ClassificationResult => {
    const ids = raw.cve_id.filter((id) => !UNKNOWN_IDS.has(id.toLowerCase()));
    const cveId = ids.length > 0 ? ids : [UNKNOWN_CVE_ID];
    // A CVE record always carries a concrete identifier
    const type = raw.type.trim().toUpperCase() === "CVE" && ids.length > 0 ? "CVE" : "News";

    return {
      type,
      cveId,
      severity: toSeverity(raw.severity),
      cvssScore: raw.cvss_score,
      summary: raw.summary.trim(),
      intrigue: raw.intrigue,
      affectedProducts: raw.affected_products,
    };
  });

const KNOWN_KEYS = ["type", "cve_id", "severity", "cvss_score", "summary", "intrigue", "affected_products"];

export function normalizeClassification(raw: Record<string, unknown>): ClassificationResult | null {
  if (!KNOWN_KEYS.some((key) => key in raw)) return null;
  const parsed = classificationSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

const MAX_WRAPPER_DEPTH = 4;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// Wrappers such as {"results": [...]} carry none of the known keys; their values are searched instead
function collectClassifications(value: unknown, depth = 0): ClassificationResult[] {
  if (depth > MAX_WRAPPER_DEPTH) return [];
  if (Array.isArray(value)) {
    return value.flatMap((item) => collectClassifications(item, depth + 1));
  }
  if (!isRecord(value)) return [];

  const result = normalizeClassification(value);
  if (result) return [result];
  return Object.values(value).flatMap((item) => collectClassifications(item, depth + 1));
}

export function parseClassificationResponse(raw: string): ClassificationResult[] {
  const results = extractJsonObjects(raw).flatMap((object) => collectClassifications(object));

  if (results.length === 0) {
    log(`No classification objects found in response (${raw.length} chars)`, SOURCE, "warn");
    return [{ ...FALLBACK_CLASSIFICATION, cveId: [UNKNOWN_CVE_ID], affectedProducts: [UNKNOWN_CVE_ID] }];
  }
  return results;
}

export class Classifier {
  constructor(private readonly llm: LlmClient) {}

  assertReady() {
    this.llm.assertReady();
  }

  /**
   * Empty input and failed LLM calls give []; an unparseable answer gives
   * the single fallback record.
   */
  async classify(text: string): Promise<ClassificationResult[]> {
    if (!text || !text.trim()) {
      return [];
    }

    let raw: string;
    try {
      raw = await this.llm.complete(buildPrompt(text), { system: SYSTEM_PROMPT, temperature: 0 });
    } catch (error) {
      log(`Classification call failed: ${errorMessage(error)}`, SOURCE, "error");
      return [];
    }

    return parseClassificationResponse(raw);
  }
}
