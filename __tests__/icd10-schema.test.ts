import { convertToIcd10Schema, toIcd10SchemaEntry } from '../lib/output/icd10-schema';
import { StaticIcdDescriptionService } from '../lib/services/icd-description-service';

describe('ICD-10 concept schema', () => {
  const descriptions = new StaticIcdDescriptionService();

  it('looks descriptions up without regard to case or the dot', () => {
    expect(descriptions.describe('e119')).toBe(descriptions.describe('E11.9'));
    expect(Object.getOwnPropertyNames(StaticIcdDescriptionService.prototype)).not.toContain('has');
  });

  it('fills the concept entry from the code, its description and the evidence', () => {
    const entry = toIcd10SchemaEntry(
      {
        code: 'E11.9',
        confidence: 92,
        evidence: 'Patient is a 58 year old with type 2 diabetes mellitus without complications',
      },
      descriptions,
    );

    expect(entry).toEqual({
      Text: 'Patient is a 58 year old with type 2 diabetes',
      disease: 'Type 2 diabetes mellitus without complications',
      Category: 'General',
      Type: 'Default',
      Score: 92,
      Attributes: [
        {
          type: 'evidence',
          score: 92,
          relationshipScore: 50,
          text: 'Patient is a 58 year old with type 2 diabetes mellitus without complications',
        },
      ],
      Traits: [{ Name: 'default', Score: 92 }],
      ICD10CMConcepts: [
        { Description: 'Type 2 diabetes mellitus without complications', Code: 'E11.9', hccCode: '24', Score: 92 },
      ],
      DOS: '01-01-2020',
      Provider: 'Unknown Provider',
      PlaceOfService: 'Unknown',
      SignatureProvider: 'Unknown',
      NoteType: 'Unknown',
      PageNumbers: [],
    });
  });

  it('uses placeholders when evidence is empty and the code is unknown', () => {
    const entry = toIcd10SchemaEntry({ code: 'Q99.8', confidence: 0, evidence: '' }, descriptions);

    expect(entry.Text).toBe('No text provided');
    expect(entry.disease).toBe('Description not found');
    expect(entry.Attributes[0].text).toBe('No evidence provided');
  });

  it('converts every model of every summary', () => {
    const document = convertToIcd10Schema(
      { s1: { A: [{ code: 'I10', confidence: 80, evidence: 'hypertension' }], B: [] } },
      descriptions,
    );

    expect(Object.keys(document.s1)).toEqual(['A', 'B']);
    expect(document.s1.A.ICD10Codes.map((entry) => entry.ICD10CMConcepts[0].Description)).toEqual([
      'Essential (primary) hypertension',
    ]);
    expect(document.s1.B.ICD10Codes).toEqual([]);
  });
});
