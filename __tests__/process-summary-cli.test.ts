import { parseArgs } from '../scripts/process-summary';

describe('process-summary arguments', () => {
  it('takes a file reference', () => {
    expect(parseArgs(['summary.txt'])).toEqual({ reference: 'summary.txt', query: false, out: undefined, schema: undefined });
  });

  it('takes a vector store query with an output file and schema', () => {
    expect(parseArgs(['--query', 'chest pain', '--out', 'out.json', '--schema', 'icd10'])).toEqual({
      reference: 'chest pain',
      query: true,
      out: 'out.json',
      schema: 'icd10',
    });
  });

  it('requires a reference', () => {
    expect(() => parseArgs([])).toThrow(/^Usage: /);
  });

  it('rejects a flag without its value', () => {
    expect(() => parseArgs(['summary.txt', '--out'])).toThrow(/^--out needs a value\./);
    expect(() => parseArgs(['--query', '--out', 'x.json'])).toThrow(/^--query needs a value\./);
  });

  it('rejects unknown schemas and extra arguments', () => {
    expect(() => parseArgs(['a.txt', '--schema', 'fhir'])).toThrow("Unknown schema 'fhir'.");
    expect(() => parseArgs(['a.txt', 'b.txt'])).toThrow("Unexpected argument 'b.txt'.");
    expect(() => parseArgs(['a.txt', '--verbose'])).toThrow("Unexpected argument '--verbose'.");
  });
});
