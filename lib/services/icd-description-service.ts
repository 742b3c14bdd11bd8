import descriptionTable from "../../data/icd10-descriptions.json";
import { DESCRIPTION_NOT_FOUND } from "../agents/types";
import type { IcdDescriptionService } from "./service-types";

const DEFAULT_DESCRIPTIONS: Readonly<Record<string, string>> = descriptionTable;

/**
 * Static ICD-10-CM description lookup. Codes are matched in dotted form, and
 * undotted input (`E119`) is accepted as well.
 */
export class StaticIcdDescriptionService implements IcdDescriptionService {
  private readonly descriptions: Map<string, string>;

  constructor(descriptions: Readonly<Record<string, string>> = DEFAULT_DESCRIPTIONS) {
    this.descriptions = new Map(
      Object.entries(descriptions).map(([code, description]) => [toLookupKey(code), description]),
    );
  }

  describe(code: string): string {
    return this.descriptions.get(toLookupKey(code)) ?? DESCRIPTION_NOT_FOUND;
  }
}

function toLookupKey(code: string): string {
  return code.trim().toUpperCase().replace(".", "");
}
