/**
 * @fileoverview Reply Codec Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import { EnvelopeFormatError, ScopeLeakError } from '../../../src/domain/context/index.js';
import { RejectedError, RemoteError } from '../../../src/domain/rpc/index.js';
import {
  decodeReply,
  encodeFailure,
  encodeSuccess,
  toErrorBody,
} from '../../../src/infrastructure/rpc/index.js';
import { encodeEnvelope } from '../../../src/infrastructure/wire/index.js';

describe('Reply codec', () => {
  it('should frame a success with no context and status 0', () => {
    expect(encodeSuccess(Buffer.from('ok'))).toEqual(Buffer.from([0x00, 0x00, 0x00, 0x6f, 0x6b]));
  });

  it('should return the payload of a success', () => {
    expect(decodeReply(encodeSuccess(Buffer.from('okok'))).toString()).toBe('okok');
  });

  it('should surface a handler failure as RemoteError', () => {
    const frame = encodeFailure(new TypeError('bad input'));

    expect(() => decodeReply(frame)).toThrow(new RemoteError('TypeError', 'bad input'));
    expect(() => decodeReply(frame)).toThrow(RemoteError);
  });

  it('should carry the name of library errors', () => {
    const frame = encodeFailure(new ScopeLeakError('test'));

    let caught: unknown;
    try {
      decodeReply(frame);
    } catch (error) {
      caught = error;
    }

    expect(caught).toMatchObject({ remoteName: 'ScopeLeakError' });
  });

  it('should rebuild a rejection so it stays retryable', () => {
    const frame = encodeFailure(new RejectedError('server is closed'));

    let caught: unknown;
    try {
      decodeReply(frame);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(RejectedError);
    expect(caught).toMatchObject({ reason: 'server is closed', retryable: true });
  });

  it('should describe non-Error failures', () => {
    expect(toErrorBody('plain string')).toEqual({ name: 'Error', message: 'plain string' });
  });

  it('should refuse an unknown status byte', () => {
    const frame = encodeEnvelope({ contexts: [], payload: Buffer.from([0x07]) });

    expect(() => decodeReply(frame)).toThrow(EnvelopeFormatError);
  });

  it('should refuse an error body that is not the expected JSON', () => {
    const frame = encodeEnvelope({
      contexts: [],
      payload: Buffer.concat([Buffer.from([0x01]), Buffer.from('{"name":1}')]),
    });

    expect(() => decodeReply(frame)).toThrow(/unreadable error body/);
  });
});
