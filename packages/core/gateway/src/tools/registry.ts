/**
 * Tool Registry
 *
 * Holds the registered tools with their enable flags and dispatches calls:
 * lookup, enable check, parameter validation with defaults, then execution
 * inside a boundary that turns throws into failure results.
 */

import {
  ParleyErrorCodes,
  errorMessage,
  type LLMToolDefinition,
  type ToolError,
  type ToolExecutionContext,
  type ToolInfo,
  type ToolOutput,
  type ToolResult,
  type TraceSink,
} from '@parley/types';
import type { ToolService } from '@parley/tool-base';
import { createLogger, type Logger } from '@parley/utils';

interface RegisteredTool {
  tool: ToolService;
  enabled: boolean;
}

export interface ToolRegistryOptions {
  tracer?: TraceSink;
  logger?: Logger;
  now?: () => number;
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly tracer?: TraceSink;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: ToolRegistryOptions = {}) {
    this.tracer = options.tracer;
    this.logger = options.logger ?? createLogger('tools');
    this.now = options.now ?? Date.now;
  }

  register(tool: ToolService, enabled = true): void {
    if (this.tools.has(tool.name)) {
      this.logger.warn(`Replacing registered tool '${tool.name}'`);
    }
    this.tools.set(tool.name, { tool, enabled });
    this.logger.info(`Registered tool '${tool.name}' v${tool.version} (${enabled ? 'enabled' : 'disabled'})`);
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  enable(name: string): boolean {
    return this.setEnabled(name, true);
  }

  disable(name: string): boolean {
    return this.setEnabled(name, false);
  }

  isEnabled(name: string): boolean {
    return this.tools.get(name)?.enabled ?? false;
  }

  get(name: string): ToolService | undefined {
    return this.tools.get(name)?.tool;
  }

  list(onlyEnabled = false): ToolService[] {
    return [...this.tools.values()]
      .filter((entry) => !onlyEnabled || entry.enabled)
      .map((entry) => entry.tool);
  }

  hasEnabledTools(): boolean {
    return [...this.tools.values()].some((entry) => entry.enabled);
  }

  /** Catalog of enabled tools for tool-capable providers */
  getToolDefinitions(): LLMToolDefinition[] {
    return this.list(true).map((tool) => tool.toDefinition());
  }

  getInfo(): ToolInfo[] {
    return [...this.tools.values()].map(({ tool, enabled }) => ({
      ...tool.metadata,
      enabled,
    }));
  }

  async execute(
    name: string,
    rawParameters: unknown,
    context: ToolExecutionContext = {}
  ): Promise<ToolResult> {
    const startedAt = this.now();
    const entry = this.tools.get(name);

    if (!entry) {
      return this.finish(name, undefined, startedAt, context, {
        success: false,
        error: { code: ParleyErrorCodes.NOT_FOUND, message: `Tool '${name}' not found` },
      });
    }

    const { tool } = entry;
    if (!entry.enabled) {
      return this.finish(name, tool, startedAt, context, {
        success: false,
        error: { code: ParleyErrorCodes.TOOL_DISABLED, message: `Tool '${name}' is disabled` },
      });
    }

    const validation = tool.validate(rawParameters);
    if (!validation.valid) {
      return this.finish(name, tool, startedAt, context, {
        success: false,
        error: {
          code: ParleyErrorCodes.INVALID_PARAMETERS,
          message: validation.message,
          field: validation.field,
        },
      });
    }

    let output: ToolOutput;
    try {
      output = await tool.execute(validation.params, context);
    } catch (error) {
      this.logger.error(`Tool '${name}' threw: ${errorMessage(error)}`);
      output = {
        success: false,
        error: {
          code: ParleyErrorCodes.TOOL_FAILED,
          message: `Tool '${name}' failed: ${errorMessage(error)}`,
        },
      };
    }

    return this.finish(name, tool, startedAt, context, output);
  }

  private finish(
    name: string,
    tool: ToolService | undefined,
    startedAt: number,
    context: ToolExecutionContext,
    output: ToolOutput
  ): ToolResult {
    const durationMs = this.now() - startedAt;
    const error: ToolError | undefined =
      output.success || output.error
        ? output.error
        : { code: ParleyErrorCodes.TOOL_FAILED, message: `Tool '${name}' reported failure` };

    const result: ToolResult = {
      success: output.success,
      data: output.data,
      error,
      metadata: {
        ...output.metadata,
        toolName: name,
        toolVersion: tool?.version,
        durationMs,
      },
    };

    if (context.traceId) {
      this.tracer?.event(context.traceId, 'tool', 'tool_execution', {
        durationMs,
        success: result.success,
        error: result.error ? `${result.error.code}: ${result.error.message}` : undefined,
        detail: { tool: name },
      });
    }
    return result;
  }

  private setEnabled(name: string, enabled: boolean): boolean {
    const entry = this.tools.get(name);
    if (!entry) return false;

    entry.enabled = enabled;
    this.logger.info(`Tool '${name}' ${enabled ? 'enabled' : 'disabled'}`);
    return true;
  }
}
