/**
 * @fileoverview Dtab - Delegation Table for Request-Scoped Routing Overrides
 *
 * @packageDocumentation
 * @module @threadline/core/domain/routing
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A Dtab is an ordered list of rewrite rules (`Dentry`) of the form
 * `prefix=>replacement`. Resolving a logical name walks the rules from the
 * first to the last and applies the first one whose prefix matches.
 *
 * ```
 * Dtab.read('/svc/users=>/zk/users-canary;/svc=>/zk')
 *
 * lookup('/svc/users/read')  -> /zk/users-canary/read   (first rule)
 * lookup('/svc/billing')     -> /zk/billing             (second rule)
 * lookup('/other')           -> undefined
 * ```
 *
 * The textual form round-trips: `Dtab.read(dtab.show())` equals `dtab`.
 *
 * @version 1.0.0
 */

import { ThreadlineError } from '../context/context.errors';

const SEGMENT_PATTERN = /^[A-Za-z0-9_:.#$%-]+$/;
const WILDCARD = '*';

/**
 * Thrown when a path, rule or table cannot be parsed.
 */
export class DtabParseError extends ThreadlineError {
  public readonly input: string;

  constructor(input: string, reason: string) {
    super(`Cannot parse '${input}': ${reason}`);
    this.input = input;
  }
}

function readSegments(input: string, allowWildcard: boolean): string[] {
  const text = input.trim();
  if (!text.startsWith('/')) {
    throw new DtabParseError(input, "paths must start with '/'");
  }
  if (text === '/') {
    return [];
  }

  const segments = text.slice(1).split('/');
  for (const segment of segments) {
    if (allowWildcard && segment === WILDCARD) continue;
    if (!SEGMENT_PATTERN.test(segment)) {
      throw new DtabParseError(input, `invalid segment '${segment}'`);
    }
  }
  return segments;
}

function showSegments(segments: readonly string[]): string {
  return segments.length === 0 ? '/' : `/${segments.join('/')}`;
}

/**
 * A slash-separated logical or concrete name.
 */
export class Path {
  static readonly empty = new Path([]);

  readonly segments: readonly string[];

  constructor(segments: readonly string[]) {
    this.segments = Object.freeze([...segments]);
  }

  static read(input: string): Path {
    return new Path(readSegments(input, false));
  }

  get isEmpty(): boolean {
    return this.segments.length === 0;
  }

  concat(other: Path): Path {
    return new Path([...this.segments, ...other.segments]);
  }

  drop(count: number): Path {
    return new Path(this.segments.slice(count));
  }

  equals(other: Path): boolean {
    return (
      this.segments.length === other.segments.length &&
      this.segments.every((segment, i) => segment === other.segments[i])
    );
  }

  show(): string {
    return showSegments(this.segments);
  }

  toString(): string {
    return `Path(${this.show()})`;
  }
}

/**
 * A path prefix that may contain `*` segments matching any single segment.
 */
export class Prefix {
  readonly segments: readonly string[];

  constructor(segments: readonly string[]) {
    this.segments = Object.freeze([...segments]);
  }

  static read(input: string): Prefix {
    return new Prefix(readSegments(input, true));
  }

  matches(path: Path): boolean {
    if (path.segments.length < this.segments.length) {
      return false;
    }
    return this.segments.every(
      (segment, i) => segment === WILDCARD || segment === path.segments[i],
    );
  }

  show(): string {
    return showSegments(this.segments);
  }
}

/**
 * A single rewrite rule.
 */
export class Dentry {
  readonly prefix: Prefix;
  readonly dst: Path;

  constructor(prefix: Prefix, dst: Path) {
    this.prefix = prefix;
    this.dst = dst;
  }

  /**
   * Parse `prefix=>dst`. Whitespace around either side is ignored.
   */
  static read(input: string): Dentry {
    const parts = input.split('=>');
    if (parts.length !== 2) {
      throw new DtabParseError(input, "expected exactly one '=>'");
    }
    const [prefix = '', dst = ''] = parts;
    return new Dentry(Prefix.read(prefix), Path.read(dst));
  }

  /**
   * Rewrite `path` if the prefix matches: the replacement followed by the
   * unmatched remainder of the path.
   */
  rewrite(path: Path): Path | undefined {
    if (!this.prefix.matches(path)) {
      return undefined;
    }
    return this.dst.concat(path.drop(this.prefix.segments.length));
  }

  show(): string {
    return `${this.prefix.show()}=>${this.dst.show()}`;
  }
}

/**
 * Dtab - an immutable, ordered rule list. Earlier rules win.
 *
 * @example Layering a request override over an inherited one
 * ```typescript
 * const inherited = Dtab.read('/svc=>/zk');
 * const override = Dtab.read('/svc/users=>/zk/users-canary');
 *
 * const effective = override.concat(inherited);
 * effective.lookup(Path.read('/svc/users'))?.show();   // '/zk/users-canary'
 * effective.lookup(Path.read('/svc/billing'))?.show(); // '/zk/billing'
 * ```
 */
export class Dtab {
  static readonly empty = new Dtab([]);

  readonly dentries: readonly Dentry[];

  constructor(dentries: readonly Dentry[]) {
    this.dentries = Object.freeze([...dentries]);
  }

  /**
   * Parse rules separated by `;` or `,`. Empty input yields {@link Dtab.empty}.
   *
   * @throws DtabParseError if any rule is malformed
   */
  static read(input: string): Dtab {
    const rules = input
      .split(/[;,]/)
      .map((rule) => rule.trim())
      .filter((rule) => rule.length > 0);
    return rules.length === 0 ? Dtab.empty : new Dtab(rules.map((rule) => Dentry.read(rule)));
  }

  get isEmpty(): boolean {
    return this.dentries.length === 0;
  }

  get size(): number {
    return this.dentries.length;
  }

  /**
   * This table's rules followed by `other`'s, so this table shadows `other`
   * and `other` remains the fallback.
   */
  concat(other: Dtab): Dtab {
    if (other.isEmpty) return this;
    if (this.isEmpty) return other;
    return new Dtab([...this.dentries, ...other.dentries]);
  }

  /**
   * Resolve `path` through the first matching rule.
   */
  lookup(path: Path): Path | undefined {
    for (const dentry of this.dentries) {
      const rewritten = dentry.rewrite(path);
      if (rewritten) return rewritten;
    }
    return undefined;
  }

  equals(other: Dtab): boolean {
    return this.show() === other.show();
  }

  /** Canonical text form, rules joined with `;`. */
  show(): string {
    return this.dentries.map((dentry) => dentry.show()).join(';');
  }

  toString(): string {
    return `Dtab(${this.show()})`;
  }
}
