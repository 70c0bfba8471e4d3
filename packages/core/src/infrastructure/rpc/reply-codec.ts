/**
 * @fileoverview Reply Codec - Success/Failure Reply Frames
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/rpc
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Replies use the same envelope as requests (with no context entries). The
 * envelope payload starts with a status byte:
 *
 * ```
 * 0x00 <reply payload>
 * 0x01 <JSON {"name","message","reason"?}>
 * ```
 */

import { z } from 'zod';

import { EnvelopeFormatError } from '../../domain/context';
import { RejectedError, RemoteError } from '../../domain/rpc';
import { decodeEnvelope, encodeEnvelope } from '../wire';

const STATUS_OK = 0x00;
const STATUS_ERROR = 0x01;

const ErrorBodySchema = z.object({
  name: z.string(),
  message: z.string(),
  reason: z.string().optional(),
});

export type ErrorBody = z.infer<typeof ErrorBodySchema>;

/**
 * Describe a failure for the wire. Only name, message and (for rejections)
 * the reason cross the boundary.
 */
export function toErrorBody(error: unknown): ErrorBody {
  if (error instanceof RejectedError) {
    return { name: error.name, message: error.message, reason: error.reason };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Error', message: String(error) };
}

export function encodeSuccess(payload: Buffer): Buffer {
  return encodeEnvelope({ contexts: [], payload: Buffer.concat([Buffer.from([STATUS_OK]), payload]) });
}

export function encodeFailure(error: unknown): Buffer {
  const body = Buffer.from(JSON.stringify(toErrorBody(error)), 'utf8');
  return encodeEnvelope({ contexts: [], payload: Buffer.concat([Buffer.from([STATUS_ERROR]), body]) });
}

/**
 * Unpack a reply frame.
 *
 * @returns The reply payload on success
 * @throws RejectedError when the server refused the request
 * @throws RemoteError for any other server-side failure
 * @throws EnvelopeFormatError when the frame is malformed
 */
export function decodeReply(frame: Buffer): Buffer {
  const { payload } = decodeEnvelope(frame);
  const status = payload[0];
  const body = payload.subarray(1);

  if (status === STATUS_OK) {
    return body;
  }
  if (status !== STATUS_ERROR) {
    throw new EnvelopeFormatError(`unknown reply status ${String(status)}`, 0);
  }

  let parsed: ErrorBody;
  try {
    parsed = ErrorBodySchema.parse(JSON.parse(body.toString('utf8')));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new EnvelopeFormatError(`unreadable error body: ${reason}`, 1);
  }

  if (parsed.name === 'RejectedError' && parsed.reason !== undefined) {
    throw new RejectedError(parsed.reason);
  }
  throw new RemoteError(parsed.name, parsed.message);
}
