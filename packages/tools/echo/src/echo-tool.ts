/**
 * Echo Tool
 *
 * Returns the message it was given, optionally upper-cased. Used to check
 * the dispatch path end to end.
 */

import { Type, type Static } from '@sinclair/typebox';
import { ToolService } from '@parley/tool-base';
import type { ToolOutput } from '@parley/types';

export const EchoParamsSchema = Type.Object({
  message: Type.String({ description: 'Text to echo back' }),
  uppercase: Type.Optional(
    Type.Boolean({ default: false, description: 'Convert the text to upper case' })
  ),
});

export type EchoParams = Static<typeof EchoParamsSchema>;

export class EchoTool extends ToolService<typeof EchoParamsSchema> {
  readonly name = 'echo';
  readonly description = 'Echo a message back, optionally in upper case';
  readonly parameters = EchoParamsSchema;
  override readonly estimatedTime = 'instant';

  async execute(params: EchoParams): Promise<ToolOutput> {
    const echo = params.uppercase ? params.message.toUpperCase() : params.message;
    this.logger.debug(`Echoing ${params.message.length} characters`);

    return this.ok(
      {
        echo,
        original: params.message,
        uppercase: params.uppercase ?? false,
      },
      { messageLength: params.message.length }
    );
  }
}
