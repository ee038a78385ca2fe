/**
 * Main CLI program definition using Commander.js
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function readVersion(): string {
  const packagePath = join(__dirname, '../package.json');
  if (!existsSync(packagePath)) return '0.0.0';

  const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
  if (packageJson && typeof packageJson === 'object' && 'version' in packageJson) {
    const { version } = packageJson;
    if (typeof version === 'string') return version;
  }
  return '0.0.0';
}

const version = readVersion();

export function createProgram(): Command {
  const program = new Command();

  program
    .name('parley')
    .description('Parley - conversational request orchestration')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('-c, --config <path>', 'Path to parley.toml')
    .option('--verbose', 'Enable verbose output')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts();
      if (opts.verbose) {
        process.env.LOG_LEVEL = 'debug';
      }
    });

  const configCmd = program.command('config').description('Configuration management');

  configCmd
    .command('validate')
    .description('Validate parley.toml configuration')
    .action(async () => {
      const { validateCommand } = await import('./commands/config/validate.js');
      await validateCommand(program.opts());
    });

  program
    .command('status')
    .description('Show the status of a running gateway')
    .option('--url <url>', 'Gateway status endpoint', 'http://127.0.0.1:8081/status')
    .action(async (options: { url: string }) => {
      const { statusCommand } = await import('./commands/status.js');
      await statusCommand({ ...program.opts(), ...options });
    });

  program
    .command('chat')
    .description('Chat with an in-process gateway from the terminal')
    .option('--user <id>', 'Sender id to chat as', 'cli-user')
    .option('--admin', 'Chat with the admin role regardless of assistant.admin_users')
    .action(async (options: { user: string; admin?: boolean }) => {
      const { chatCommand } = await import('./commands/chat.js');
      await chatCommand({ ...program.opts(), ...options });
    });

  return program;
}

/**
 * Get CLI version
 */
export function getVersion(): string {
  return version;
}
