#!/usr/bin/env tsx

/**
 * Environment Validation Script
 *
 * Checks that the pipeline configuration is complete, then runs a
 * connection test against every configured model.
 */

import dotenv from 'dotenv';
import { ConfigurationError, loadPipelineConfig, PipelineConfig } from '../lib/config/pipeline-config';
import { initializeServices } from '../lib/services/service-registry';

dotenv.config({ path: '.env.local' });

function maskSecret(value: string): string {
  return value.length > 8 ? `${value.substring(0, 4)}...` : '***';
}

function validateEnvironment(): PipelineConfig {
  console.log('🔍 Validating pipeline configuration...\n');

  const config = loadPipelineConfig();

  console.log('📋 Models:');
  for (const model of config.models) {
    console.log(`✅ ${model.label}: ${model.provider}:${model.model}`);
  }

  console.log('\n🔑 Credentials:');
  for (const [provider, credentials] of Object.entries(config.credentials)) {
    console.log(`✅ ${provider}: ${maskSecret(credentials.apiKey)}${credentials.baseURL ? ` (${credentials.baseURL})` : ''}`);
  }

  console.log('\n⚙️  Settings:');
  console.log(`✅ validator: ${config.validatorModel ?? 'source model'}`);
  console.log(`✅ scorer: ${config.scorerModel ?? 'source model'}`);
  console.log(`✅ request timeout: ${config.requestTimeoutMs}ms`);
  console.log(`✅ max codes per model: ${config.maxCodesPerModel}`);
  console.log(`✅ parallel models: ${config.parallelModels}`);
  if (config.vectorStoreId) {
    console.log(`✅ vector store: ${config.vectorStoreId}`);
  }

  return config;
}

async function testModelConnections(config: PipelineConfig): Promise<boolean> {
  console.log('\n🤖 Testing model connections...');

  const registry = initializeServices(config);
  const errors = await registry.validateServices();
  for (const error of errors) {
    console.log(`❌ ${error.message}`);
  }
  if (errors.length === 0) {
    console.log(`✅ ${registry.models.length} model(s) reachable`);
  }
  return errors.length === 0;
}

async function main(): Promise<void> {
  let config: PipelineConfig;
  try {
    config = validateEnvironment();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.log(`\n❌ ${error.message}`);
      console.log('\n💡 Add the missing variables to .env.local or the file named by ICD_PIPELINE_CONFIG.');
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  if (!(await testModelConnections(config))) {
    process.exitCode = 1;
    return;
  }
  console.log('\n🎉 All validations passed!');
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
