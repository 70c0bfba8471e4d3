/**
 * @fileoverview RpcServer / RpcClient / LoopbackTransport Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import { RETRIES_ROLE, REQUEST_ID_KEY, ContextBindingFilter } from '../../../src/application/filters/index.js';
import {
  MethodClient,
  RpcClient,
  RpcServer,
  UnknownMethodError,
  decodeCall,
  encodeCall,
  serveIface,
} from '../../../src/application/rpc/index.js';
import { BroadcastKey, utf8Codec } from '../../../src/domain/context/index.js';
import { RETRIES_KEY_ID } from '../../../src/domain/retries/index.js';
import {
  RejectedError,
  RemoteError,
  RetryBudgetExhaustedError,
  TransportClosedError,
} from '../../../src/domain/rpc/index.js';
import { BroadcastContext } from '../../../src/infrastructure/context/index.js';
import { makeNoopLogger } from '../../../src/infrastructure/logging/index.js';
import { MetricsRegistry, MetricsStatsReceiver } from '../../../src/infrastructure/metrics/index.js';
import { LoopbackTransport, encodeSuccess } from '../../../src/infrastructure/rpc/index.js';
import { decodeEnvelope, encodeEnvelope } from '../../../src/infrastructure/wire/index.js';
import { FlakyTransport, RecordingTransport } from '../../support/transports.js';

const TENANT = new BroadcastKey<string>('com.example.Tenant', utf8Codec);
const NOTE = new BroadcastKey<string>('com.example.Note', utf8Codec);
const logger = makeNoopLogger();

describe('RpcServer', () => {
  it('should answer a frame with no context', async () => {
    const server = new RpcServer(async (payload) => Buffer.from(payload.toString().toUpperCase()), { logger });

    const reply = await server.receive(encodeEnvelope({ contexts: [], payload: Buffer.from('hi') }));

    expect(reply).toEqual(encodeSuccess(Buffer.from('HI')));
  });

  it('should answer a malformed frame with an EnvelopeFormatError reply', async () => {
    const server = new RpcServer(async (payload) => payload, { logger });
    const client = new RpcClient(
      { dispatch: (frame) => server.receive(frame.subarray(0, 1)), close: async () => undefined },
      { logger },
    );

    await expect(client.call(Buffer.from('x'))).rejects.toMatchObject({
      remoteName: 'EnvelopeFormatError',
    });
  });

  it('should run the handler in the restored scope only', async () => {
    const server = new RpcServer(async () => Buffer.from(BroadcastContext.get(TENANT) ?? 'none'), {
      keys: [TENANT],
      logger,
    });
    const frame = encodeEnvelope({
      contexts: [{ key: Buffer.from('com.example.Tenant'), value: Buffer.from('blue') }],
      payload: Buffer.alloc(0),
    });

    // The scope the server happens to be called from is replaced, not merged
    const reply = await BroadcastContext.let(TENANT, 'caller-side', () => server.receive(frame));

    expect(reply).toEqual(encodeSuccess(Buffer.from('blue')));
  });

  it('should run server filters inside the restored scope', async () => {
    const server = new RpcServer(async () => Buffer.from(BroadcastContext.get(REQUEST_ID_KEY) ?? 'none'), {
      logger,
      filters: [new ContextBindingFilter({ generateRequestId: () => 'req-1' })],
    });

    const reply = await server.receive(encodeEnvelope({ contexts: [], payload: Buffer.alloc(0) }));

    expect(reply).toEqual(encodeSuccess(Buffer.from('req-1')));
  });

  it('should reject requests after close and wait for in-flight ones', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const server = new RpcServer(
      async (payload) => {
        await gate;
        return payload;
      },
      { logger },
    );
    const client = new RpcClient(new LoopbackTransport(server), {
      logger,
      retries: { policy: { maxRetries: 0 } },
    });

    const inFlight = client.call(Buffer.from('first'));
    await new Promise((resolve) => setImmediate(resolve));
    expect(server.pending).toBe(1);

    let closed = false;
    const closing = server.close().then(() => {
      closed = true;
    });

    const refused = await client
      .withStack((stack) => stack.remove(RETRIES_ROLE))
      .call(Buffer.from('second'))
      .catch((error: unknown) => error);
    expect(refused).toBeInstanceOf(RejectedError);
    expect(closed).toBe(false);

    release();
    await expect(inFlight).resolves.toEqual(Buffer.from('first'));
    await closing;
    expect(closed).toBe(true);
  });

  it('should record server stats under srv/<label>', async () => {
    const registry = new MetricsRegistry();
    const stats = new MetricsStatsReceiver(registry, { logger });
    const server = new RpcServer(
      async (payload) => {
        if (payload.length === 0) throw new Error('empty');
        return payload;
      },
      { label: 'echo', stats, logger },
    );
    const client = new RpcClient(new LoopbackTransport(server), { logger });

    await client.call(Buffer.from('a'));
    await client.call(Buffer.alloc(0)).catch(() => undefined);

    const sample = await registry.sample();
    expect(sample['srv/echo/requests']).toBe(2);
    expect(sample['srv/echo/success']).toBe(1);
    expect(sample['srv/echo/failures']).toBe(1);
    expect(sample['srv/echo/failures/Error']).toBe(1);
    expect(sample['srv/echo/pending']).toBe(0);
  });
});

describe('RpcClient', () => {
  it('should send the broadcast entries of the calling scope', async () => {
    const transport = new RecordingTransport(encodeSuccess(Buffer.alloc(0)));
    const client = new RpcClient(transport, { logger });

    await BroadcastContext.let(TENANT, 'blue', () => client.call(Buffer.from('payload')));

    const [frame] = transport.frames;
    if (frame === undefined) throw new Error('nothing sent');
    const envelope = decodeEnvelope(frame);
    expect(envelope.contexts.map((c) => [c.key.toString(), c.value.toString('hex')])).toEqual([
      ['com.example.Tenant', Buffer.from('blue').toString('hex')],
      [RETRIES_KEY_ID, '00000000'],
    ]);
    expect(envelope.payload.toString()).toBe('payload');
  });

  it('should deliver the other entries when one is too long to frame', async () => {
    const server = new RpcServer(async () => Buffer.from(BroadcastContext.get(TENANT) ?? 'absent'), {
      keys: [TENANT, NOTE],
      logger,
    });
    const client = new RpcClient(new LoopbackTransport(server), { logger });

    const reply = await BroadcastContext.let(TENANT, 'kept', () =>
      BroadcastContext.let(NOTE, 'x'.repeat(70000), () => client.call(Buffer.alloc(0))),
    );

    expect(reply.toString()).toBe('kept');
  });

  it('should send no retry count without a retry module', async () => {
    const transport = new RecordingTransport(encodeSuccess(Buffer.alloc(0)));
    const client = new RpcClient(transport, { logger }).withStack((stack) => stack.remove(RETRIES_ROLE));

    await client.call(Buffer.from('payload'));

    const [frame] = transport.frames;
    if (frame === undefined) throw new Error('nothing sent');
    expect(decodeEnvelope(frame).contexts).toEqual([]);
  });

  it('should retry write failures through the stack', async () => {
    const server = new RpcServer(async (payload) => payload, { logger });
    const transport = new FlakyTransport(new LoopbackTransport(server), 2);
    const client = new RpcClient(transport, { logger });

    await expect(client.call(Buffer.from('eventually'))).resolves.toEqual(Buffer.from('eventually'));
    expect(transport.dispatched).toBe(3);
  });

  it('should give up when every attempt fails', async () => {
    const server = new RpcServer(async (payload) => payload, { logger });
    const transport = new FlakyTransport(new LoopbackTransport(server), 10);
    const client = new RpcClient(transport, { logger, retries: { policy: { maxRetries: 1 } } });

    await expect(client.call(Buffer.from('never'))).rejects.toBeInstanceOf(RetryBudgetExhaustedError);
    expect(transport.dispatched).toBe(2);
  });

  it('should fail fast on a closed transport', async () => {
    const transport = new LoopbackTransport(new RpcServer(async (payload) => payload, { logger }));
    const client = new RpcClient(transport, { logger });

    await client.close();

    expect(transport.isClosed).toBe(true);
    await expect(client.call(Buffer.from('late'))).rejects.toBeInstanceOf(TransportClosedError);
  });
});

describe('Method codec', () => {
  const iface = serveIface({
    async query(x) {
      return x + x;
    },
    shout: (x) => x.toUpperCase(),
  });

  it('should round-trip a call description', () => {
    expect(decodeCall(encodeCall({ method: 'query', arg: 'ok' }))).toEqual({ method: 'query', arg: 'ok' });
  });

  it('should dispatch by method name', async () => {
    const client = new MethodClient(new RpcClient(new LoopbackTransport(new RpcServer(iface, { logger })), { logger }));

    await expect(client.call('query', 'ok')).resolves.toBe('okok');
    await expect(client.call('shout', 'ok')).resolves.toBe('OK');
  });

  it('should reject unknown and inherited method names', async () => {
    await expect(iface(encodeCall({ method: 'missing', arg: '' }))).rejects.toBeInstanceOf(UnknownMethodError);
    await expect(iface(encodeCall({ method: 'toString', arg: '' }))).rejects.toThrow(
      "Unknown method 'toString'",
    );
  });

  it('should surface an unknown method to the caller as RemoteError', async () => {
    const client = new MethodClient(new RpcClient(new LoopbackTransport(new RpcServer(iface, { logger })), { logger }));

    await expect(client.call('missing', '')).rejects.toThrow(
      new RemoteError('UnknownMethodError', "Unknown method 'missing'"),
    );
  });
});
