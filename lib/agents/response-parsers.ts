/**
 * Response Parsers
 *
 * Grammars for reading model replies. Every parser returns a tagged
 * ParseResult; callers decide the fallback for an unparseable reply.
 *
 * ICD-10 code syntax: an uppercase letter, two digits, then optionally a
 * decimal point and one or two uppercase letters or digits. Codes are
 * reported in dotted form (E119 becomes E11.9).
 */

import { z } from "zod";
import { ParseResult, parsed, unparseable } from "./types";

/** Finds ICD-10 codes in free text. The lookahead rejects longer codes instead of truncating them. */
const ICD_CODE_SCAN = /\b[A-Z]\d{2}(?:\.?[A-Z0-9]{1,2})?\b(?!\.\w)/g;
const ICD_CODE_SYNTAX = /^[A-Z]\d{2}(?:\.[A-Z0-9]{1,2})?$/;

const CONFIRM_WORDS = ["CONFIRMED", "YES", "VALID", "CORRECT"];
const REJECT_WORDS = ["REJECTED", "NO", "INVALID", "INCORRECT"];
const STANDALONE_FIRST_WORD = /^[^A-Za-z]*([A-Za-z]+)(?:[.!,:]|[ \t]*(?:\n|$))/;
const VERDICT_HEDGES = /\b(?:not|but|however|instead|better|although)\b/i;

export type Verdict = "confirmed" | "rejected";

// Entries that do not match are skipped rather than failing the whole reply.
const codeEntrySchema = z
  .union([z.string(), z.object({ code: z.string() }).transform((entry) => entry.code)])
  .optional()
  .catch(undefined);

const codeListReplySchema = z.object({
  finalCodes: z.array(codeEntrySchema).optional().catch(undefined),
  dxCodes: z.array(codeEntrySchema).optional().catch(undefined),
});

const numericSchema = z.union([z.number(), z.string()]).optional().catch(undefined);

const confidenceReplySchema = z.object({
  score: numericSchema,
  confidence: numericSchema,
  evidence: z.union([z.string(), z.array(z.unknown())]).optional().catch(undefined),
});

export interface ConfidenceReading {
  /** Integer in [0, 100] */
  score: number;
  evidence: string;
}

// ============================================================================
// SHARED HELPERS
// ============================================================================

/**
 * Returns the body of the first Markdown code fence, or the trimmed text when
 * there is none.
 */
export function stripCodeFences(text: string): string {
  const fenced = /```[A-Za-z]*\s*([\s\S]*?)```/.exec(text);
  return fenced ? fenced[1].trim() : text.trim();
}

/**
 * Parses the reply as a JSON object, falling back to the outermost `{...}`
 * span inside surrounding prose.
 */
export function parseJsonObject(text: string): Record<string, unknown> | undefined {
  const stripped = stripCodeFences(text);
  const direct = tryParseObject(stripped);
  if (direct) {
    return direct;
  }

  const start = stripped.indexOf("{");
  const end = stripped.lastIndexOf("}");
  return start >= 0 && end > start ? tryParseObject(stripped.slice(start, end + 1)) : undefined;
}

function tryParseObject(text: string): Record<string, unknown> | undefined {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return undefined;
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(value));
}

// ============================================================================
// ICD-10 CODES
// ============================================================================

export function normalizeIcdCode(raw: string): string {
  const compact = raw.trim().toUpperCase().replace(".", "");
  return compact.length > 3 ? `${compact.slice(0, 3)}.${compact.slice(3)}` : compact;
}

export function isValidIcdSyntax(code: string): boolean {
  return ICD_CODE_SYNTAX.test(code);
}

/**
 * Scans text for ICD-10 codes. Results are normalized and de-duplicated in
 * order of first appearance.
 */
export function scanIcdCodes(text: string): string[] {
  const codes: string[] = [];
  for (const match of text.matchAll(ICD_CODE_SCAN)) {
    const code = normalizeIcdCode(match[0]);
    if (isValidIcdSyntax(code) && !codes.includes(code)) {
      codes.push(code);
    }
  }
  return codes;
}

/**
 * Reads candidate codes from an extraction or refinement reply. A JSON
 * `finalCodes` (or `dxCodes`) array is preferred; otherwise the whole reply is
 * scanned.
 */
export function extractIcdCodes(reply: string, maxCodes: number): ParseResult<string[]> {
  const fromJson = codesFromJson(parseJsonObject(reply));
  const codes = fromJson.length > 0 ? fromJson : scanIcdCodes(reply);

  if (codes.length === 0) {
    return unparseable("no ICD-10 codes found in reply");
  }
  return parsed(codes.slice(0, maxCodes));
}

function codesFromJson(json: Record<string, unknown> | undefined): string[] {
  const reply = json ? codeListReplySchema.safeParse(json) : undefined;
  if (!reply?.success) {
    return [];
  }

  const codes: string[] = [];
  for (const raw of reply.data.finalCodes ?? reply.data.dxCodes ?? []) {
    if (raw === undefined) continue;
    for (const code of scanIcdCodes(raw.toUpperCase())) {
      if (!codes.includes(code)) {
        codes.push(code);
      }
    }
  }
  return codes;
}

// ============================================================================
// VALIDATION VERDICTS
// ============================================================================

/**
 * An explicit REJECTED anywhere rejects. Otherwise the first word decides when
 * it stands alone (followed by punctuation or the end of the line), and a
 * reply containing CONFIRMED confirms. A confirmation is only accepted when
 * the reply carries no hedge such as "but" or "not". Anything else is
 * unparseable.
 */
export function parseVerdict(reply: string): ParseResult<Verdict> {
  const cleaned = stripCodeFences(reply);
  if (cleaned.length === 0) {
    return unparseable("empty validation reply");
  }
  if (/\bREJECTED\b/i.test(cleaned)) {
    return parsed("rejected");
  }

  const firstWord = STANDALONE_FIRST_WORD.exec(cleaned)?.[1]?.toUpperCase();
  if (firstWord !== undefined && REJECT_WORDS.includes(firstWord)) {
    return parsed("rejected");
  }

  const confirms =
    (firstWord !== undefined && CONFIRM_WORDS.includes(firstWord)) || /\bCONFIRMED\b/i.test(cleaned);
  if (confirms && !VERDICT_HEDGES.test(cleaned)) {
    return parsed("confirmed");
  }
  return unparseable(`no verdict in validation reply: ${cleaned.slice(0, 80)}`);
}

// ============================================================================
// CONFIDENCE SCORES
// ============================================================================

const FREE_TEXT_SCORE_PATTERNS = [
  /\b(?:score|confidence)\b[^0-9\-\n]{0,20}(-?\d+(?:\.\d+)?)/i,
  /(-?\d+(?:\.\d+)?)\s*\/\s*100\b/,
  /(-?\d+(?:\.\d+)?)\s*%/,
];

export function clampScore(value: number): number {
  return Math.min(100, Math.max(0, Math.round(value)));
}

/**
 * JSON `score` (or `confidence`) as a number or numeric string, with
 * `evidence` as a string or a list joined by "; ". Free text falls back to a
 * score label, `N/100` or `N%`, read with ICD-10 codes removed, and takes
 * evidence from an `Evidence:` label or the first double-quoted span.
 */
export function parseConfidence(reply: string): ParseResult<ConfidenceReading> {
  const json = parseJsonObject(reply);
  const structured = json ? confidenceReplySchema.safeParse(json) : undefined;
  if (structured?.success) {
    const score = toNumber(structured.data.score ?? structured.data.confidence);
    if (score !== undefined) {
      return parsed({ score: clampScore(score), evidence: toEvidence(structured.data.evidence) });
    }
  }

  const text = stripCodeFences(reply);
  // Digits inside an ICD-10 code are never the score.
  const withoutCodes = text.replace(ICD_CODE_SCAN, " ");
  for (const pattern of FREE_TEXT_SCORE_PATTERNS) {
    const match = pattern.exec(withoutCodes);
    const score = match ? toNumber(match[1]) : undefined;
    if (score !== undefined) {
      return parsed({ score: clampScore(score), evidence: evidenceFromText(text) });
    }
  }

  return unparseable("no confidence score in reply");
}

function toNumber(value: number | string | undefined): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string") {
    const match = /-?\d+(?:\.\d+)?/.exec(value);
    return match ? Number(match[0]) : undefined;
  }
  return undefined;
}

function toEvidence(value: unknown): string {
  if (typeof value === "string") {
    return value.trim();
  }
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string => typeof item === "string")
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
      .join("; ");
  }
  return "";
}

function evidenceFromText(text: string): string {
  const labelled = /\bevidence\b\s*[:\-]\s*(.+)/i.exec(text);
  if (labelled) {
    return labelled[1].trim().replace(/^"(.*)"$/, "$1");
  }
  const quoted = /"([^"]+)"/.exec(text);
  return quoted ? quoted[1].trim() : "";
}
