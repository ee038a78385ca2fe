/**
 * Maps natural phrasing onto command-service syntax.
 */

export type CommandCategory = 'applications' | 'databases' | 'deployments' | 'general';

const COMMAND_ALIASES: ReadonlyArray<readonly [string, string]> = [
  ['list apps', '/mcp apps'],
  ['show apps', '/mcp apps'],
  ['get deployments', '/mcp apps'],
  ['show databases', '/db SELECT datname FROM pg_database'],
  ['list databases', '/db SELECT datname FROM pg_database'],
];

const CATEGORY_KEYWORDS: ReadonlyArray<readonly [CommandCategory, readonly string[]]> = [
  ['applications', ['app']],
  ['databases', ['database', 'db']],
  ['deployments', ['deploy']],
];

/**
 * Known phrases map to fixed commands; slash commands pass through;
 * anything else is sent as an /mcp command.
 */
export function formatCommand(command: string): string {
  const trimmed = command.trim();
  const lower = trimmed.toLowerCase();

  for (const [phrase, mapped] of COMMAND_ALIASES) {
    if (lower.includes(phrase)) {
      return mapped;
    }
  }

  if (trimmed.startsWith('/')) {
    return trimmed;
  }

  return `/mcp ${trimmed}`;
}

export function classifyCommand(command: string): CommandCategory {
  const lower = command.toLowerCase();
  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (keywords.some((keyword) => lower.includes(keyword))) {
      return category;
    }
  }
  return 'general';
}
