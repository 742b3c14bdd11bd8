import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  FileSummarySource,
  SummaryIngestionError,
  TextSummarySource,
  VectorStoreSearchClient,
  VectorStoreSummarySource,
  createSummary,
  summaryFromRagDocument,
  summaryIdFor,
} from '../lib/services/summary-source';

describe('summary ids', () => {
  it('derives a 16 character hex id from the trimmed text', () => {
    const summary = createSummary('  Chest pain on exertion.\n', 'inline');

    expect(summary.text).toBe('Chest pain on exertion.');
    expect(summary.id).toBe(summaryIdFor('Chest pain on exertion.'));
    expect(summary.id).toMatch(/^[0-9a-f]{16}$/);
  });

  it('produces a frozen summary', () => {
    expect(Object.isFrozen(createSummary('Cough.', 'inline'))).toBe(true);
  });

  it('rejects blank text', () => {
    expect(() => createSummary(' \n\t', 'blank.txt')).toThrow(SummaryIngestionError);
    expect(() => createSummary('', 'blank.txt')).toThrow("Summary from 'blank.txt' is empty");
  });
});

describe('TextSummarySource', () => {
  it('uses the reference itself as the summary text', async () => {
    const summary = await new TextSummarySource().fetchSummary('Fever and productive cough.');

    expect(summary.text).toBe('Fever and productive cough.');
  });
});

describe('summaryFromRagDocument', () => {
  it('joins content summaries and takes the chart id', () => {
    const summary = summaryFromRagDocument(
      { chartId: 1042, content: [{ summary: 'Hypertension.', page: 1 }, { summary: ' On lisinopril. ' }] },
      'chart.json',
    );

    expect(summary).toEqual({ id: '1042', text: 'Hypertension.\nOn lisinopril.' });
  });

  it('accepts the summaryInfo shape', () => {
    const summary = summaryFromRagDocument({ summaryInfo: [{ text: 'Migraine without aura.' }] }, 'chart.json');

    expect(summary.text).toBe('Migraine without aura.');
    expect(summary.id).toBe(summaryIdFor('Migraine without aura.'));
  });

  it('prefers summaryInfo when a document carries both shapes', () => {
    const summary = summaryFromRagDocument(
      { chartId: 'c2', content: [], summaryInfo: [{ text: 'Type 2 diabetes mellitus.' }] },
      'chart.json',
    );

    expect(summary).toEqual({ id: 'c2', text: 'Type 2 diabetes mellitus.' });
  });

  it('rejects documents with the wrong shape', () => {
    expect(() => summaryFromRagDocument({ content: 'not a list' }, 'chart.json')).toThrow(SummaryIngestionError);
  });

  it('rejects documents without any summary text', () => {
    expect(() => summaryFromRagDocument({ chartId: 'c1', content: [] }, 'chart.json')).toThrow(
      "Summary from 'chart.json' is empty",
    );
  });
});

describe('FileSummarySource', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'icd-summary-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads plain text files', async () => {
    const file = path.join(dir, 'summary.txt');
    fs.writeFileSync(file, 'Type 2 diabetes mellitus.\n');

    const summary = await new FileSummarySource().fetchSummary(file);

    expect(summary.text).toBe('Type 2 diabetes mellitus.');
  });

  it('reads retrieval JSON documents', async () => {
    const file = path.join(dir, 'chart.json');
    fs.writeFileSync(file, JSON.stringify({ chartId: 'chart-7', content: [{ summary: 'Asthma.' }] }));

    const summary = await new FileSummarySource().fetchSummary(file);

    expect(summary).toEqual({ id: 'chart-7', text: 'Asthma.' });
  });

  it('reports invalid JSON', async () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{"content": [');

    await expect(new FileSummarySource().fetchSummary(file)).rejects.toThrow(/is not valid JSON/);
  });

  it('reports missing files', async () => {
    await expect(new FileSummarySource().fetchSummary(path.join(dir, 'missing.txt'))).rejects.toThrow(
      SummaryIngestionError,
    );
  });
});

describe('VectorStoreSummarySource', () => {
  const client = (data: Awaited<ReturnType<VectorStoreSearchClient['search']>>['data']): VectorStoreSearchClient & {
    queries: string[];
  } => {
    const queries: string[] = [];
    return {
      queries,
      search: async (_vectorStoreId, body) => {
        queries.push(body.query);
        return { data };
      },
    };
  };

  it('joins the text chunks of every result', async () => {
    const fake = client([
      { content: [{ type: 'text', text: 'Chronic kidney disease stage 3a.' }] },
      { content: [{ type: 'image', text: 'ignored' }, { type: 'text', text: ' eGFR 52. ' }] },
    ]);

    const summary = await new VectorStoreSummarySource(fake, 'vs_test').fetchSummary('kidney function');

    expect(fake.queries).toEqual(['kidney function']);
    expect(summary.text).toBe('Chronic kidney disease stage 3a.\neGFR 52.');
  });

  it('fails when the search finds nothing', async () => {
    await expect(new VectorStoreSummarySource(client([]), 'vs_test').fetchSummary('nothing')).rejects.toThrow(
      "Summary from 'nothing' is empty",
    );
  });

  it('wraps search errors', async () => {
    const failing: VectorStoreSearchClient = {
      search: async () => Promise.reject(new Error('vector store not found')),
    };

    await expect(new VectorStoreSummarySource(failing, 'vs_test').fetchSummary('query')).rejects.toThrow(
      "Vector store search for 'query' failed: vector store not found",
    );
  });
});
