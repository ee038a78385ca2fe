#!/usr/bin/env node
/**
 * Example: loading parley.toml and inspecting the provider cascade
 */

import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadAndValidateConfig, validateConfig, loadTomlFile } from '@parley/config';
import { createProviderChain } from '@parley/llm-proxy';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

function main(): void {
  const configPath = path.join(__dirname, '..', 'parley.toml.example');
  console.log(`Loading config from: ${configPath}\n`);

  const { warnings } = validateConfig(loadTomlFile(configPath));
  for (const warning of warnings) {
    console.log(`  warning: ${warning}`);
  }

  const config = loadAndValidateConfig({ configPath, applyEnv: true });

  console.log(`\n${config.parley.name} ${config.parley.version}\n`);

  console.log('Provider cascade:');
  for (const tier of createProviderChain(config.llm)) {
    const limits = [
      tier.maxTokens !== undefined ? `max_tokens=${tier.maxTokens}` : null,
      tier.temperature !== undefined ? `temperature=${tier.temperature}` : null,
    ].filter((part): part is string => part !== null);
    console.log(`  ${tier.label.padEnd(9)} ${tier.adapter.name}/${tier.model} ${limits.join(' ')}`);
  }

  console.log('\nTools:');
  console.log(`  echo  ${config.tools?.echo?.enabled === false ? 'disabled' : 'enabled'}`);
  const infra = config.tools?.infra;
  console.log(
    `  mcp   ${infra?.enabled ? 'enabled' : 'disabled'}${infra?.endpoint ? ` -> ${infra.endpoint}` : ' (emulated)'}`
  );

  console.log(`\nStatus port: ${config.runtime?.status_port ?? 8081}`);
}

try {
  main();
} catch (error) {
  console.error('Failed to load configuration:', error);
  process.exit(1);
}
