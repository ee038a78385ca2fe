/**
 * parley config validate command
 */

import { loadTomlFile, validateConfig } from '@parley/config';
import { findConfigFileOrThrow } from '../../core/config-discovery.js';
import { OutputFormatter, prettyOutput } from '../../core/output.js';
import { getVersion } from '../../cli.js';
import { ConfigValidationError } from '../../core/errors.js';

interface ValidateOptions {
  json?: boolean;
  config?: string;
}

export async function validateCommand(options: ValidateOptions): Promise<void> {
  const output = new OutputFormatter(options.json ?? false, 'config validate', getVersion());

  try {
    const configPath = findConfigFileOrThrow(options.config);
    output.setConfigPath(configPath);

    if (!options.json) {
      prettyOutput.info(`Validating configuration: ${configPath}`);
    }

    const result = validateConfig(loadTomlFile(configPath));

    if (!result.valid) {
      throw new ConfigValidationError(result.errors);
    }

    if (options.json) {
      output.success({
        config_path: configPath,
        valid: true,
        warnings: result.warnings,
      });
    } else {
      prettyOutput.success('Configuration is valid');
      for (const warning of result.warnings) {
        prettyOutput.warn(warning);
      }
      prettyOutput.blank();
      prettyOutput.keyValue('Config path', configPath);
    }
  } catch (error) {
    output.error(error);
  }
}
