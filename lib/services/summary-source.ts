/**
 * Summary Sources
 *
 * Turns a reference into the immutable Summary a pipeline run works on:
 * literal text, a file on disk (plain text or a retrieval JSON document) or a
 * semantic search against an OpenAI vector store.
 */

import { createHash } from "crypto";
import * as fs from "fs";
import * as path from "path";
import OpenAI from "openai";
import { z } from "zod";

import { ERROR_CODES, Summary } from "../agents/types";
import type { SummarySource } from "./service-types";

export class SummaryIngestionError extends Error {
  public readonly code = ERROR_CODES.INGESTION_FAILED;
  public readonly reference: string;

  constructor(message: string, reference: string) {
    super(message);
    this.name = "SummaryIngestionError";
    this.reference = reference;
  }
}

/**
 * Content-derived id: the first 16 hex characters of the SHA-256 of the text.
 */
export function summaryIdFor(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex").slice(0, 16);
}

export function createSummary(text: string, reference: string, id?: string): Summary {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new SummaryIngestionError(`Summary from ${describeReference(reference)} is empty`, reference);
  }
  return Object.freeze({ id: id ?? summaryIdFor(trimmed), text: trimmed });
}

function describeReference(reference: string): string {
  return reference.length > 60 ? `'${reference.slice(0, 57)}...'` : `'${reference}'`;
}

// ============================================================================
// TEXT
// ============================================================================

export class TextSummarySource implements SummarySource {
  readonly kind = "text";

  async fetchSummary(reference: string): Promise<Summary> {
    return createSummary(reference, reference);
  }
}

// ============================================================================
// FILE
// ============================================================================

const ragDocumentSchema = z.object({
  chartId: z.union([z.string().min(1), z.number()]).optional(),
  content: z.array(z.object({ summary: z.string() }).passthrough()).optional(),
  summaryInfo: z.array(z.object({ text: z.string() }).passthrough()).optional(),
});

export type RagDocument = z.infer<typeof ragDocumentSchema>;

/**
 * Extracts the summary text from a retrieval output document. Both shapes the
 * retrieval backend emits are accepted: `summaryInfo[].text`, which wins
 * whenever the key is present, and `content[].summary`.
 */
export function summaryFromRagDocument(document: unknown, reference: string): Summary {
  const result = ragDocumentSchema.safeParse(document);
  if (!result.success) {
    throw new SummaryIngestionError(
      `Retrieval document ${describeReference(reference)} has an unexpected shape: ${result.error.issues[0]?.message ?? "invalid"}`,
      reference,
    );
  }

  const rag = result.data;
  const parts = rag.summaryInfo
    ? rag.summaryInfo.map((item) => item.text)
    : rag.content?.map((item) => item.summary) ?? [];
  const text = parts.map((part) => part.trim()).filter((part) => part.length > 0).join("\n");
  return createSummary(text, reference, rag.chartId === undefined ? undefined : String(rag.chartId));
}

export class FileSummarySource implements SummarySource {
  readonly kind = "file";

  async fetchSummary(reference: string): Promise<Summary> {
    let content: string;
    try {
      content = await fs.promises.readFile(reference, "utf8");
    } catch (error) {
      throw new SummaryIngestionError(
        `Cannot read summary file ${describeReference(reference)}: ${error instanceof Error ? error.message : String(error)}`,
        reference,
      );
    }

    if (path.extname(reference).toLowerCase() !== ".json") {
      return createSummary(content, reference);
    }

    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      throw new SummaryIngestionError(
        `Summary file ${describeReference(reference)} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        reference,
      );
    }
    return summaryFromRagDocument(document, reference);
  }
}

// ============================================================================
// VECTOR STORE
// ============================================================================

export interface VectorStoreSearchResult {
  content: Array<{ type: string; text: string }>;
}

/**
 * The slice of the `openai` client used for vector store search.
 */
export interface VectorStoreSearchClient {
  search(vectorStoreId: string, body: { query: string; max_num_results?: number }): Promise<{ data: VectorStoreSearchResult[] }>;
}

export function createVectorStoreSearchClient(apiKey: string, baseURL?: string): VectorStoreSearchClient {
  const openai = new OpenAI({ apiKey, baseURL });
  return {
    search: async (vectorStoreId, body) => {
      const page = await openai.vectorStores.search(vectorStoreId, body);
      return { data: page.data };
    },
  };
}

export class VectorStoreSummarySource implements SummarySource {
  readonly kind = "vector-store";

  constructor(
    private readonly client: VectorStoreSearchClient,
    private readonly vectorStoreId: string,
    private readonly maxResults = 5,
  ) {}

  async fetchSummary(reference: string): Promise<Summary> {
    let results: VectorStoreSearchResult[];
    try {
      const response = await this.client.search(this.vectorStoreId, {
        query: reference,
        max_num_results: this.maxResults,
      });
      results = response.data;
    } catch (error) {
      throw new SummaryIngestionError(
        `Vector store search for ${describeReference(reference)} failed: ${error instanceof Error ? error.message : String(error)}`,
        reference,
      );
    }

    const chunks = results.flatMap((result) =>
      result.content.filter((part) => part.type === "text").map((part) => part.text.trim()),
    );
    return createSummary(chunks.filter((chunk) => chunk.length > 0).join("\n"), reference);
  }
}
