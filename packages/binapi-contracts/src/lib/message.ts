/**
 * Message and Data Type Descriptors
 *
 * A message travels with its own descriptor: the name the peer knows it by,
 * the CRC of its definition, and its kind. Name and CRC together identify a
 * message definition on the wire.
 */

import type { ReadonlyDeep } from 'type-fest';

// ============================================================================
// Descriptors
// ============================================================================

export type MessageType = 'request' | 'reply' | 'event' | 'other';

/**
 * Any protocol message. Payload fields sit beside the descriptor fields.
 */
export interface Message {
  readonly messageName: string;
  readonly crc: string;
  readonly messageType: MessageType;
}

export interface DataType {
  readonly typeName: string;
  readonly crc: string;
}

export type MessageFields<M extends Message> = Omit<M, keyof Message>;

const descriptorKeys: ReadonlySet<string> = new Set(['messageName', 'crc', 'messageType']);

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Identity of a message definition, as the peer's message table keys it.
 */
export const messageKey = (msg: ReadonlyDeep<Message>): string => `${msg.messageName}_${msg.crc}`;

export const isSameDefinition = (a: ReadonlyDeep<Message>, b: ReadonlyDeep<Message>): boolean =>
  messageKey(a) === messageKey(b);

/**
 * Payload fields of a message, without its descriptor.
 */
export const payloadOf = (msg: ReadonlyDeep<Message>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(msg).filter(([key]) => !descriptorKeys.has(key)));

/**
 * Creates a factory for one message definition.
 *
 * @example
 * ```typescript
 * const ControlPing = defineMessage<{ readonly pid: number }>({
 *   messageName: 'control_ping',
 *   crc: '51077d14',
 *   messageType: 'request',
 * });
 * const ping = ControlPing({ pid: 0 });
 * ```
 */
export const defineMessage =
  <F extends object>(definition: ReadonlyDeep<Message>) =>
  (fields: F): F & Message => ({
    ...fields,
    messageName: definition.messageName,
    crc: definition.crc,
    messageType: definition.messageType,
  });
