/**
 * Inbound message schema
 *
 * Transports hand the gateway an already-parsed message in this shape.
 */

import { Type, type Static } from '@sinclair/typebox';

export const SenderRoleSchema = Type.Union([Type.Literal('admin'), Type.Literal('user')], {
  description: 'Role assigned to the sender by the transport',
});

export const SenderSchema = Type.Object(
  {
    id: Type.String({ minLength: 1, description: 'Platform user id' }),
    name: Type.Optional(Type.String()),
    role: SenderRoleSchema,
  },
  { $id: 'Sender' }
);

export const InboundMessageSchema = Type.Object(
  {
    id: Type.String({ minLength: 1, description: 'Platform message id' }),
    text: Type.String({ description: 'Message text' }),
    sender: SenderSchema,
    conversationId: Type.String({ minLength: 1 }),
    sessionId: Type.Optional(Type.String()),
    timestamp: Type.String({ description: 'ISO 8601 receive time' }),
    metadata: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  },
  {
    $id: 'InboundMessage',
    description: 'Chat message handed to the gateway by a transport',
  }
);

export type SenderRole = Static<typeof SenderRoleSchema>;
export type Sender = Static<typeof SenderSchema>;
export type InboundMessage = Static<typeof InboundMessageSchema>;
