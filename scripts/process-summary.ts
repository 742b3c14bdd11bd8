#!/usr/bin/env tsx

/**
 * Runs the ICD-10 coding pipeline on one summary and prints the output record.
 *
 * Usage:
 *   tsx scripts/process-summary.ts <summary.txt|rag-output.json> [--out <file>] [--schema icd10]
 *   tsx scripts/process-summary.ts --query "<search text>" [--out <file>] [--schema icd10]
 */

import * as fs from 'fs';
import dotenv from 'dotenv';
import { serializeOutputRecord } from '../lib/agents/schema-assembler';
import { ConfigurationError, loadPipelineConfig } from '../lib/config/pipeline-config';
import { convertToIcd10Schema } from '../lib/output/icd10-schema';
import { initializeServices } from '../lib/services/service-registry';
import { FileSummarySource, SummaryIngestionError } from '../lib/services/summary-source';
import { IcdCodingPipeline } from '../lib/workflow/pipeline-orchestrator';

export interface CliOptions {
  reference: string;
  query: boolean;
  out?: string;
  schema?: 'icd10';
}

const USAGE = 'Usage: process-summary <file> | --query <text> [--out <file>] [--schema icd10]';

export function parseArgs(argv: readonly string[]): CliOptions {
  let reference: string | undefined;
  let query = false;
  let out: string | undefined;
  let schema: 'icd10' | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--query':
        query = true;
        reference = requireValue(argv, ++i, arg);
        break;
      case '--out':
        out = requireValue(argv, ++i, arg);
        break;
      case '--schema': {
        const value = requireValue(argv, ++i, arg);
        if (value !== 'icd10') {
          throw new Error(`Unknown schema '${value}'. ${USAGE}`);
        }
        schema = value;
        break;
      }
      default:
        if (arg.startsWith('--') || reference !== undefined) {
          throw new Error(`Unexpected argument '${arg}'. ${USAGE}`);
        }
        reference = arg;
    }
  }

  if (reference === undefined) {
    throw new Error(USAGE);
  }
  return { reference, query, out, schema };
}

function requireValue(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`${flag} needs a value. ${USAGE}`);
  }
  return value;
}

async function main(): Promise<void> {
  dotenv.config({ path: '.env.local' });

  let options: CliOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 2;
    return;
  }

  try {
    const config = loadPipelineConfig();
    if (options.query && !config.vectorStoreId) {
      throw new ConfigurationError(['--query needs ICD_VECTOR_STORE_ID to be set']);
    }

    const services = initializeServices(config, options.query ? {} : { summarySource: new FileSummarySource() });
    const pipeline = new IcdCodingPipeline(services);
    const { record, report } = await pipeline.processReference(options.reference);

    const output = options.schema === 'icd10'
      ? `${JSON.stringify(convertToIcd10Schema(record, services.descriptions), null, 2)}\n`
      : serializeOutputRecord(record);

    if (options.out) {
      await fs.promises.writeFile(options.out, output, 'utf8');
      console.error(`Wrote ${options.out}`);
    } else {
      process.stdout.write(output);
    }

    for (const error of report.errors) {
      console.error(`[${error.code ?? 'ERROR'}] ${error.message}`);
    }
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof SummaryIngestionError) {
      console.error(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
