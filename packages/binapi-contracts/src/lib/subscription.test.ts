import { describe, expect, it } from '@effect/vitest';
import { Effect, Queue, pipe } from 'effect';
import type { MessageDecoder } from './collaborators';
import { DecodeError } from './errors';
import { defineMessage } from './message';
import { makeSubscription } from './subscription';

const Counter = defineMessage<{ readonly count: number }>({
  messageName: 'counter',
  crc: '0x00000010',
  messageType: 'event',
});
type Counter = ReturnType<typeof Counter>;

// Reads the first byte of the payload as the count.
const firstByteDecoder: MessageDecoder = {
  decode: (data, into) => Effect.succeed({ ...into, count: data[0] ?? -1 }),
};

const failingDecoder: MessageDecoder = {
  decode: (_data, into) =>
    Effect.fail(new DecodeError({ messageName: into.messageName, message: 'truncated payload' })),
};

describe('makeSubscription', () => {
  it.effect('should use the factory as the template', () => {
    const factory = () => Counter({ count: 0 });
    return pipe(
      Queue.bounded<Counter>(1),
      Effect.map((queue) => makeSubscription(queue, factory)),
      Effect.map((subscription) => {
        expect(subscription.template()).toEqual(Counter({ count: 0 }));
        expect(subscription.messageFactory).toBe(factory);
      })
    );
  });

  it.effect('should decode into a fresh message and offer it to the queue', () =>
    pipe(
      Queue.bounded<Counter>(2),
      Effect.flatMap((queue) =>
        pipe(
          makeSubscription(queue, () => Counter({ count: 0 })).deliver(
            Uint8Array.of(7),
            firstByteDecoder
          ),
          Effect.flatMap((delivered) =>
            pipe(
              Queue.take(queue),
              Effect.map((received) => ({ delivered, received }))
            )
          )
        )
      ),
      Effect.map(({ delivered, received }) => {
        expect(delivered).toBe(true);
        expect(received).toEqual(Counter({ count: 7 }));
      })
    )
  );

  it.effect('should drop notifications while the queue is full', () =>
    pipe(
      Queue.bounded<Counter>(1),
      Effect.flatMap((queue) => {
        const subscription = makeSubscription(queue, () => Counter({ count: 0 }));
        return pipe(
          Effect.all([
            subscription.deliver(Uint8Array.of(1), firstByteDecoder),
            subscription.deliver(Uint8Array.of(2), firstByteDecoder),
          ]),
          Effect.flatMap((results) =>
            pipe(
              Queue.takeAll(queue),
              Effect.map((queued) => ({ results, queued: Array.from(queued) }))
            )
          )
        );
      }),
      Effect.map(({ results, queued }) => {
        expect(results).toEqual([true, false]);
        expect(queued).toEqual([Counter({ count: 1 })]);
      })
    )
  );

  it.effect('should drop notifications once the queue is shut down', () =>
    pipe(
      Queue.bounded<Counter>(1),
      Effect.tap((queue) => Queue.shutdown(queue)),
      Effect.flatMap((queue) =>
        makeSubscription(queue, () => Counter({ count: 0 })).deliver(
          Uint8Array.of(3),
          firstByteDecoder
        )
      ),
      Effect.map((delivered) => {
        expect(delivered).toBe(false);
      })
    )
  );

  it.effect('should fail with the decoder error and queue nothing', () =>
    pipe(
      Queue.bounded<Counter>(1),
      Effect.flatMap((queue) =>
        pipe(
          makeSubscription(queue, () => Counter({ count: 0 })).deliver(
            Uint8Array.of(4),
            failingDecoder
          ),
          Effect.flip,
          Effect.flatMap((error) =>
            pipe(
              Queue.size(queue),
              Effect.map((size) => ({ error, size }))
            )
          )
        )
      ),
      Effect.map(({ error, size }) => {
        expect(error._tag).toBe('DecodeError');
        expect(error.message).toBe('truncated payload');
        expect(size).toBe(0);
      })
    )
  );
});
