import { describe, expect, it } from '@effect/vitest';
import { Effect, pipe } from 'effect';
import { defineMessage } from '@binapi/contracts';
import { JsonMessageCodec } from './json-codec';

const InterfaceDetails = defineMessage<{ readonly ifName: string; readonly mtu: number }>({
  messageName: 'sw_interface_details',
  crc: '0x6c221fc7',
  messageType: 'reply',
});

const Counters = defineMessage<{ readonly packets: bigint }>({
  messageName: 'interface_counters',
  crc: '0x00000abc',
  messageType: 'event',
});

const bytes = (text: string) => new TextEncoder().encode(text);

const template = InterfaceDetails({ ifName: '', mtu: 0 });

describe('JsonMessageCodec', () => {
  it.effect('should encode only the payload fields', () =>
    pipe(
      JsonMessageCodec.encode(InterfaceDetails({ ifName: 'eth0', mtu: 1500 })),
      Effect.map((data) => {
        expect(new TextDecoder().decode(data)).toBe('{"ifName":"eth0","mtu":1500}');
      })
    )
  );

  it.effect('should fail with EncodeError when the payload is not serializable', () =>
    pipe(
      JsonMessageCodec.encode(Counters({ packets: 10n })),
      Effect.flip,
      Effect.map((error) => {
        expect(error._tag).toBe('EncodeError');
        expect(error.message).toBe('cannot encode interface_counters');
      })
    )
  );

  it.effect('should decode into a copy of the target', () =>
    pipe(
      JsonMessageCodec.decode(bytes('{"ifName":"eth1","mtu":9000}'), template),
      Effect.map((decoded) => {
        expect(decoded).toEqual(InterfaceDetails({ ifName: 'eth1', mtu: 9000 }));
        expect(template).toEqual(InterfaceDetails({ ifName: '', mtu: 0 }));
      })
    )
  );

  it.effect('should ignore fields the target does not declare', () =>
    pipe(
      JsonMessageCodec.decode(bytes('{"ifName":"lo","mtu":65536,"extra":true}'), template),
      Effect.map((decoded) => {
        expect(decoded).toEqual(InterfaceDetails({ ifName: 'lo', mtu: 65536 }));
      })
    )
  );

  it.effect('should reject a field of the wrong type', () =>
    pipe(
      JsonMessageCodec.decode(bytes('{"ifName":"lo","mtu":"large"}'), template),
      Effect.flip,
      Effect.map((error) => {
        expect(error.message).toBe(
          'field mtu of sw_interface_details is missing or has the wrong type'
        );
      })
    )
  );

  it.effect('should reject a missing field', () =>
    pipe(
      JsonMessageCodec.decode(bytes('{"mtu":1500}'), template),
      Effect.flip,
      Effect.map((error) => {
        expect(error.message).toBe(
          'field ifName of sw_interface_details is missing or has the wrong type'
        );
      })
    )
  );

  it.effect('should reject bytes that are not JSON', () =>
    pipe(
      JsonMessageCodec.decode(bytes('not json'), template),
      Effect.flip,
      Effect.map((error) => {
        expect(error._tag).toBe('DecodeError');
        expect(error.message).toBe('payload of sw_interface_details is not a JSON object');
      })
    )
  );
});
