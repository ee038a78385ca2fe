import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Type } from '@sinclair/typebox';
import { ToolService } from '@parley/tool-base';
import { ParleyErrorCodes, type ToolOutput } from '@parley/types';
import { EchoTool } from '@parley/tool-echo';
import { InfraCommandTool } from '@parley/tool-infra';
import { noopLogger } from '@parley/utils';
import { RequestTracer } from '../tracing/request-tracer.js';
import { ToolRegistry } from './registry.js';

const ExplodeParams = Type.Object({});

class ExplodingTool extends ToolService<typeof ExplodeParams> {
  readonly name = 'explode';
  readonly description = 'Always throws';
  readonly parameters = ExplodeParams;

  async execute(): Promise<ToolOutput> {
    throw new Error('kaboom');
  }
}

describe('ToolRegistry', () => {
  let current: number;
  let registry: ToolRegistry;

  beforeEach(() => {
    current = 1_000;
    registry = new ToolRegistry({ logger: noopLogger, now: () => current });
    registry.register(new EchoTool({ logger: noopLogger }));
  });

  it('should execute a tool and stamp the metadata', async () => {
    const result = await registry.execute('echo', { message: 'Hello', uppercase: true });

    expect(result).toEqual({
      success: true,
      data: { echo: 'HELLO', original: 'Hello', uppercase: true },
      error: undefined,
      metadata: { messageLength: 5, toolName: 'echo', toolVersion: '1.0.0', durationMs: 0 },
    });
  });

  it('should report unknown tools as not found', async () => {
    const result = await registry.execute('nope', {});

    expect(result.success).toBe(false);
    expect(result.error).toEqual({ code: ParleyErrorCodes.NOT_FOUND, message: "Tool 'nope' not found" });
    expect(result.metadata.toolName).toBe('nope');
    expect(result.metadata.toolVersion).toBeUndefined();
  });

  it('should refuse disabled tools without invoking them', async () => {
    const tool = new InfraCommandTool({ logger: noopLogger });
    const spy = vi.spyOn(tool, 'execute');
    registry.register(tool, false);

    const result = await registry.execute('mcp', { command: 'list apps' });

    expect(result.success).toBe(false);
    expect(result.error?.code).toBe(ParleyErrorCodes.TOOL_DISABLED);
    expect(spy).not.toHaveBeenCalled();
  });

  it('should name the offending field for invalid parameters', async () => {
    const result = await registry.execute('echo', { uppercase: true });

    expect(result.success).toBe(false);
    expect(result.error?.code).toBe(ParleyErrorCodes.INVALID_PARAMETERS);
    expect(result.error?.field).toBe('message');
  });

  it('should apply schema defaults before execution', async () => {
    const result = await registry.execute('echo', { message: 'hi' });

    expect(result.data).toEqual({ echo: 'hi', original: 'hi', uppercase: false });
  });

  it('should convert throws into failure results', async () => {
    registry.register(new ExplodingTool({ logger: noopLogger }));

    const result = await registry.execute('explode', {});

    expect(result.success).toBe(false);
    expect(result.error).toEqual({
      code: ParleyErrorCodes.TOOL_FAILED,
      message: "Tool 'explode' failed: kaboom",
    });
    expect(result.metadata.toolVersion).toBe('1.0.0');
  });

  it('should toggle tools and expose only enabled ones to providers', () => {
    registry.register(new InfraCommandTool({ logger: noopLogger }), false);

    expect(registry.getToolDefinitions().map((d) => d.name)).toEqual(['echo']);
    expect(registry.enable('mcp')).toBe(true);
    expect(registry.isEnabled('mcp')).toBe(true);
    expect(registry.getToolDefinitions().map((d) => d.name)).toEqual(['echo', 'mcp']);
    expect(registry.disable('missing')).toBe(false);
    expect(registry.list(true)).toHaveLength(2);

    expect(registry.unregister('echo')).toBe(true);
    expect(registry.get('echo')).toBeUndefined();
  });

  it('should describe registered tools for operators', () => {
    registry.register(new InfraCommandTool({ logger: noopLogger }), false);

    expect(registry.getInfo()).toEqual([
      {
        name: 'echo',
        description: 'Echo a message back, optionally in upper case',
        version: '1.0.0',
        requiresConfirmation: false,
        estimatedTime: 'instant',
        enabled: true,
      },
      {
        name: 'mcp',
        description: 'Run infrastructure commands that manage applications, databases and deployments',
        version: '1.0.0',
        requiresConfirmation: true,
        estimatedTime: '5-30 seconds',
        enabled: false,
      },
    ]);
  });

  it('should trace dispatches that carry a trace id', async () => {
    const tracer = new RequestTracer({ logger: noopLogger });
    const traced = new ToolRegistry({ tracer, logger: noopLogger });
    traced.register(new EchoTool({ logger: noopLogger }), false);
    const traceId = tracer.begin('u1');

    await traced.execute('echo', { message: 'x' }, { userId: 'u1', traceId });

    const events = tracer.getTrace(traceId)?.events ?? [];
    expect(events).toHaveLength(1);
    expect(events[0]?.step).toBe('tool_execution');
    expect(events[0]?.success).toBe(false);
    expect(events[0]?.error).toBe("PARLEY_ERR_TOOL_DISABLED: Tool 'echo' is disabled");
  });
});
