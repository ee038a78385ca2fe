import { describe, it, expect } from 'vitest';
import { noopLogger } from '@parley/utils';
import { EchoTool } from './echo-tool.js';

describe('EchoTool', () => {
  const tool = new EchoTool({ logger: noopLogger });

  it('should upper-case when asked', async () => {
    const result = await tool.execute({ message: 'Hello', uppercase: true });
    expect(result).toEqual({
      success: true,
      data: { echo: 'HELLO', original: 'Hello', uppercase: true },
      metadata: { messageLength: 5 },
    });
  });

  it('should echo unchanged by default', async () => {
    const validation = tool.validate({ message: 'Hello' });
    expect(validation).toEqual({ valid: true, params: { message: 'Hello', uppercase: false } });
    if (validation.valid) {
      const result = await tool.execute(validation.params);
      expect(result.data).toEqual({ echo: 'Hello', original: 'Hello', uppercase: false });
    }
  });

  it('should require a message', () => {
    const validation = tool.validate({ uppercase: true });
    expect(validation.valid).toBe(false);
    if (!validation.valid) {
      expect(validation.field).toBe('message');
    }
  });

  it('should reject a non-boolean uppercase flag', () => {
    const validation = tool.validate({ message: 'hi', uppercase: 'yes' });
    expect(validation.valid).toBe(false);
    if (!validation.valid) {
      expect(validation.field).toBe('uppercase');
    }
  });

  it('should not require confirmation', () => {
    expect(tool.metadata.requiresConfirmation).toBe(false);
    expect(tool.metadata.version).toBe('1.0.0');
  });
});
