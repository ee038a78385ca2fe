/**
 * Custom error types for the Parley CLI
 */

export class CLIError extends Error {
  public details?: unknown;

  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number = 1,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'CLIError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigNotFoundError extends CLIError {
  constructor(searchedPaths: string[]) {
    const pathList = searchedPaths.map((p) => `  - ${p}`).join('\n');
    super(
      'No parley.toml configuration file found',
      'CONFIG_NOT_FOUND',
      2,
      `Create parley.toml in the current directory, or set PARLEY_CONFIG to its location.\n\nSearched paths:\n${pathList}`
    );
  }
}

export class ConfigValidationError extends CLIError {
  constructor(errors: string[]) {
    super(
      `Configuration validation failed: ${errors.join(', ')}`,
      'CONFIG_VALIDATION_FAILED',
      2,
      'Check your parley.toml file for errors. Run: parley config validate'
    );
    this.details = errors;
  }
}

export class GatewayUnreachableError extends CLIError {
  constructor(url: string, reason: string) {
    super(
      `Cannot reach the gateway status endpoint at ${url}: ${reason}`,
      'GATEWAY_UNREACHABLE',
      3,
      'Start the gateway, or point --url at its status port (runtime.status_port).'
    );
  }
}

export class StatusRequestError extends CLIError {
  constructor(url: string, status: number) {
    super(`Status endpoint ${url} answered HTTP ${status}`, 'STATUS_REQUEST_FAILED', 3);
  }
}
