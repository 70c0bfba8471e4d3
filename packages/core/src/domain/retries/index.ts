/**
 * @fileoverview Domain Retries Module Exports
 *
 * @packageDocumentation
 * @module @threadline/core/domain/retries
 * @license Apache-2.0
 */

export { Retries, RETRIES_KEY, RETRIES_KEY_ID } from './retries';
