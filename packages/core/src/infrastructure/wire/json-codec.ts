/**
 * @fileoverview JSON Codec - Schema-Validated Structured Context Values
 *
 * @packageDocumentation
 * @module @threadline/core/infrastructure/wire
 * @license Apache-2.0
 */

import { type z } from 'zod';

import { type IContextCodec } from '../../domain/context';

/**
 * A codec for structured values: JSON on the wire, validated against
 * `schema` on the way in.
 *
 * @example
 * ```typescript
 * const Tenant = z.object({ id: z.string(), tier: z.enum(['free', 'pro']) });
 * const TENANT = new BroadcastKey('acme.Tenant', jsonCodec(Tenant));
 * ```
 */
export function jsonCodec<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
): IContextCodec<z.infer<TSchema>> {
  return {
    marshal: (value) => Buffer.from(JSON.stringify(schema.parse(value)), 'utf8'),
    unmarshal: (buf) => schema.parse(JSON.parse(buf.toString('utf8'))),
  };
}
