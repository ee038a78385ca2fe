/**
 * Gateway Service Entry Point
 */
import { loadAndValidateConfig } from '@parley/config';
import { createGatewayFromConfig } from './bootstrap.js';

async function start(): Promise<void> {
  const configPath = process.env.PARLEY_CONFIG_PATH ?? process.env.PARLEY_CONFIG;
  const config = loadAndValidateConfig({ configPath });

  const { gateway } = createGatewayFromConfig(config);
  gateway.setupSignalHandlers();
  await gateway.start();
}

start().catch((error) => {
  console.error('[Gateway] Fatal error', error);
  process.exit(1);
});
