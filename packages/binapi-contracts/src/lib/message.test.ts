import { describe, expect, it } from '@effect/vitest';
import { defineMessage, isSameDefinition, messageKey, payloadOf } from './message';

const LinkState = defineMessage<{ readonly ifName: string; readonly up: boolean }>({
  messageName: 'link_state',
  crc: '0x0000abcd',
  messageType: 'event',
});

describe('message descriptors', () => {
  it('should build messages carrying the descriptor beside the payload', () => {
    expect(LinkState({ ifName: 'eth0', up: true })).toEqual({
      ifName: 'eth0',
      up: true,
      messageName: 'link_state',
      crc: '0x0000abcd',
      messageType: 'event',
    });
  });

  it('should key a message by name and CRC', () => {
    expect(messageKey(LinkState({ ifName: 'eth0', up: true }))).toBe('link_state_0x0000abcd');
  });

  it('should treat messages of one definition as the same regardless of payload', () => {
    expect(
      isSameDefinition(LinkState({ ifName: 'eth0', up: true }), LinkState({ ifName: 'lo', up: false }))
    ).toBe(true);
  });

  it('should tell definitions with a different CRC apart', () => {
    const Revised = defineMessage<{ readonly ifName: string; readonly up: boolean }>({
      messageName: 'link_state',
      crc: '0x0000abce',
      messageType: 'event',
    });

    expect(
      isSameDefinition(LinkState({ ifName: 'eth0', up: true }), Revised({ ifName: 'eth0', up: true }))
    ).toBe(false);
  });

  it('should strip the descriptor from the payload', () => {
    expect(payloadOf(LinkState({ ifName: 'eth1', up: false }))).toEqual({
      ifName: 'eth1',
      up: false,
    });
  });
});
