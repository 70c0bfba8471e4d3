/**
 * @fileoverview Domain Routing Module Exports
 *
 * @packageDocumentation
 * @module @threadline/core/domain/routing
 * @license Apache-2.0
 */

export { Dtab, Dentry, Path, Prefix, DtabParseError } from './dtab';
export { DTAB_LOCAL_KEY, DTAB_KEY_ID } from './dtab-key';
