/**
 * Infrastructure command tool
 *
 * Runs commands against the infrastructure command service (applications,
 * databases, deployments). Every run is gated behind user confirmation.
 */

import { Type, type Static } from '@sinclair/typebox';
import { ToolService, type ToolServiceOptions } from '@parley/tool-base';
import { ParleyErrorCodes, errorMessage, type ToolExecutionContext, type ToolOutput } from '@parley/types';
import {
  EmulatedCommandExecutor,
  type CommandExecutor,
} from './command-executor.js';
import { classifyCommand, formatCommand } from './command-formatter.js';

export const InfraCommandParamsSchema = Type.Object({
  command: Type.String({
    minLength: 1,
    description: "Command to run, e.g. 'list apps', 'show databases' or '/mcp apps'",
  }),
  filters: Type.Optional(
    Type.Record(Type.String(), Type.Unknown(), {
      default: {},
      description: 'Extra filters passed to the command service',
    })
  ),
});

export type InfraCommandParams = Static<typeof InfraCommandParamsSchema>;

export interface InfraCommandToolOptions extends ToolServiceOptions {
  executor?: CommandExecutor;
}

export class InfraCommandTool extends ToolService<typeof InfraCommandParamsSchema> {
  readonly name = 'mcp';
  readonly description =
    'Run infrastructure commands that manage applications, databases and deployments';
  readonly parameters = InfraCommandParamsSchema;
  override readonly requiresConfirmation = true;
  override readonly estimatedTime = '5-30 seconds';

  private readonly executor: CommandExecutor;

  constructor(options: InfraCommandToolOptions = {}) {
    super(options);
    this.executor = options.executor ?? new EmulatedCommandExecutor();
  }

  override getConfirmationMessage(params: Record<string, unknown>): string {
    const command = typeof params.command === 'string' ? params.command : '';
    return [
      'This infrastructure command needs your confirmation.',
      '',
      `Command: ${formatCommand(command)}`,
      `Category: ${classifyCommand(command)}`,
      `Estimated time: ${this.estimatedTime}`,
      '',
      'Reply yes to run it or no to cancel.',
    ].join('\n');
  }

  async execute(params: InfraCommandParams, context: ToolExecutionContext): Promise<ToolOutput> {
    const command = formatCommand(params.command);
    const category = classifyCommand(params.command);

    this.logger.info(`Running command for ${context.userId ?? 'unknown user'}: ${command}`);

    try {
      const execution = await this.executor.execute(command, context);

      if (!execution.success) {
        return this.fail(
          ParleyErrorCodes.TOOL_FAILED,
          execution.error ?? 'Command service reported an unknown error',
          { category }
        );
      }

      return this.ok(
        {
          command,
          response: execution.response ?? 'Command completed',
          result: execution.data ?? null,
        },
        { category, emulated: execution.emulated ?? false }
      );
    } catch (error) {
      this.logger.error(`Command failed: ${command}`, error);
      return this.fail(ParleyErrorCodes.TOOL_FAILED, `Command failed: ${errorMessage(error)}`, {
        category,
      });
    }
  }
}
