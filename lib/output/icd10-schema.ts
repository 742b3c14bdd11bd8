/**
 * ICD-10 concept schema
 *
 * Converts an output record into the concept document consumed by downstream
 * chart review tools. Chart-level fields the pipeline does not know are filled
 * with fixed placeholders.
 */

import type { OutputEntry, OutputRecord } from "../agents/types";
import type { IcdDescriptionService } from "../services/service-types";

export interface Icd10EvidenceAttribute {
  type: "evidence";
  score: number;
  relationshipScore: number;
  text: string;
}

export interface Icd10Concept {
  Description: string;
  Code: string;
  hccCode: string;
  Score: number;
}

export interface Icd10SchemaEntry {
  Text: string;
  disease: string;
  Category: string;
  Type: string;
  Score: number;
  Attributes: Icd10EvidenceAttribute[];
  Traits: Array<{ Name: string; Score: number }>;
  ICD10CMConcepts: Icd10Concept[];
  DOS: string;
  Provider: string;
  PlaceOfService: string;
  SignatureProvider: string;
  NoteType: string;
  PageNumbers: number[];
}

export type Icd10SchemaDocument = Record<string, Record<string, { ICD10Codes: Icd10SchemaEntry[] }>>;

const TEXT_WORD_LIMIT = 10;
const DEFAULT_RELATIONSHIP_SCORE = 50;
const DEFAULT_HCC_CODE = "24";

const CHART_PLACEHOLDERS = {
  DOS: "01-01-2020",
  Provider: "Unknown Provider",
  PlaceOfService: "Unknown",
  SignatureProvider: "Unknown",
  NoteType: "Unknown",
} as const;

export function toIcd10SchemaEntry(entry: OutputEntry, descriptions: IcdDescriptionService): Icd10SchemaEntry {
  const description = descriptions.describe(entry.code);
  const words = entry.evidence.split(/\s+/).filter((word) => word.length > 0);

  return {
    Text: words.length > 0 ? words.slice(0, TEXT_WORD_LIMIT).join(" ") : "No text provided",
    disease: description,
    Category: "General",
    Type: "Default",
    Score: entry.confidence,
    Attributes: [
      {
        type: "evidence",
        score: entry.confidence,
        relationshipScore: DEFAULT_RELATIONSHIP_SCORE,
        text: entry.evidence || "No evidence provided",
      },
    ],
    Traits: [{ Name: "default", Score: entry.confidence }],
    ICD10CMConcepts: [
      { Description: description, Code: entry.code, hccCode: DEFAULT_HCC_CODE, Score: entry.confidence },
    ],
    ...CHART_PLACEHOLDERS,
    PageNumbers: [],
  };
}

export function convertToIcd10Schema(record: OutputRecord, descriptions: IcdDescriptionService): Icd10SchemaDocument {
  const document: Icd10SchemaDocument = {};
  for (const [summaryId, byModel] of Object.entries(record)) {
    document[summaryId] = {};
    for (const [label, entries] of Object.entries(byModel)) {
      document[summaryId][label] = {
        ICD10Codes: entries.map((entry) => toIcd10SchemaEntry(entry, descriptions)),
      };
    }
  }
  return document;
}
