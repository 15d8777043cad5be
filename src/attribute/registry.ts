/* src/attribute/registry.ts
 * Per-object attribute store: named, kind-checked values with an independent
 * default, read-only gating of direct sets, and introspection.
 *
 * Every operation validates all of its inputs before it mutates anything, so a
 * failing call leaves the registry exactly as it was.
 */
import {
  BatchSyntaxError,
  DuplicateAttributeError,
  InvalidKindError,
  ReadOnlyViolationError,
  UnknownAttributeError,
} from '@/errors';
import { createLogger, type Logger } from '@/log/logger';
import { tabulate } from '@/util/tabulate';

import {
  ALL,
  ATTRIBUTE_KINDS,
  ATTRIBUTE_PROPS,
  type AllAttributes,
  type AttributeDescriptor,
  type AttributeKind,
  type AttributeProp,
  type AttributeTarget,
} from './types';

export type AttributeRegistryOptions = {
  /** Type name of the owning object; recorded as ownerClass. */
  owner: string;
  logger?: Logger;
};

const isKind = (k: unknown): k is AttributeKind =>
  typeof k === 'string' &&
  Object.prototype.hasOwnProperty.call(ATTRIBUTE_KINDS, k);

const isProp = (p: unknown): p is AttributeProp =>
  typeof p === 'string' && ATTRIBUTE_PROPS.some((f) => f === p);

export const isPublicName = (name: string): boolean => !name.startsWith('_');

const byName = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export class AttributeRegistry implements AttributeTarget {
  readonly owner: string;
  private readonly attrs = new Map<string, AttributeDescriptor>();
  private captured: string[] = [];
  private logger: Logger;

  constructor(opts: AttributeRegistryOptions) {
    this.owner = opts.owner;
    this.logger = opts.logger ?? createLogger({ scope: opts.owner });
  }

  /** Replace the diagnostics logger (e.g. once the owner has built its own). */
  useLogger(logger: Logger): void {
    this.logger = logger;
  }

  /**
   * Create a typed attribute. Booleans are normalised to 0/1; an undefined
   * boolean value or default becomes 0 with a warning.
   *
   * @returns Snapshot of the new descriptor.
   */
  define(
    name: string,
    kind: AttributeKind,
    value?: unknown,
    dflt?: unknown,
  ): AttributeDescriptor {
    if (typeof name !== 'string' || name.length === 0)
      throw new BatchSyntaxError('define(NAME, KIND, [VALUE], [DEFAULT])');
    if (this.attrs.has(name)) throw new DuplicateAttributeError(name);
    if (!isKind(kind))
      throw new InvalidKindError(
        `type [${String(kind)}] does not exist, try: { ${Object.keys(ATTRIBUTE_KINDS).sort().join(', ')} }`,
      );

    const descriptor: AttributeDescriptor = {
      name,
      kind,
      value: kind === 'handle' ? value : this.check(name, kind, value),
      default: kind === 'handle' ? value : this.check(name, kind, dflt),
      readOnly: false,
      ownerClass: this.owner,
    };
    this.attrs.set(name, descriptor);
    this.logger.trace(`defined attribute [${name}] kind [${kind}]`);
    return { ...descriptor };
  }

  has(name: string): boolean {
    return this.attrs.has(name);
  }

  get(name: string): unknown {
    return this.lookup(name).value;
  }

  /**
   * Set the current value (and the default, when one is passed).
   * Fails on read-only attributes.
   *
   * @returns The stored value.
   */
  set(name: string, value: unknown, dflt?: unknown): unknown {
    const attr = this.lookup(name);
    if (attr.readOnly) throw new ReadOnlyViolationError(name);

    const nextValue = this.check(name, attr.kind, value);
    const nextDefault =
      dflt === undefined ? attr.default : this.check(name, attr.kind, dflt);

    attr.value = nextValue;
    attr.default = nextDefault;
    return nextValue;
  }

  default(name: string): unknown {
    return this.lookup(name).default;
  }

  /** value := default, for the named attributes or ALL; ignores read-only. */
  reset(first: string | AllAttributes, ...rest: string[]): number {
    const targets = this.select('reset', first, rest);
    for (const attr of targets) attr.value = attr.default;
    return targets.length;
  }

  /** default := value, for the named attributes or ALL; ignores read-only. */
  sync(first: string | AllAttributes, ...rest: string[]): number {
    const targets = this.select('sync', first, rest);
    for (const attr of targets) attr.default = attr.value;
    return targets.length;
  }

  /** Mark attributes read-only; returns the count touched. */
  ro(first: string | AllAttributes, ...rest: string[]): number {
    const targets = this.select('ro', first, rest);
    for (const attr of targets) attr.readOnly = true;
    return targets.length;
  }

  /** Mark attributes read-write; returns the count touched. */
  rw(first: string | AllAttributes, ...rest: string[]): number {
    const targets = this.select('rw', first, rest);
    for (const attr of targets) attr.readOnly = false;
    return targets.length;
  }

  /**
   * The value as `set` would store it (booleans normalised to 0/1), without
   * storing it. Throws InvalidKindError when the kind rejects the value.
   */
  normalise(name: string, value: unknown): unknown {
    return this.check(name, this.lookup(name).kind, value);
  }

  isReadOnly(name: string): boolean {
    return this.lookup(name).readOnly;
  }

  kind(name: string): AttributeKind {
    return this.lookup(name).kind;
  }

  /** Read one metadata field of an attribute. */
  prop<P extends AttributeProp>(name: string, field: P): AttributeDescriptor[P] {
    const attr = this.lookup(name);
    if (!isProp(field))
      throw new BatchSyntaxError(
        `invalid property [${String(field)}] for attribute [${name}], try: { ${ATTRIBUTE_PROPS.join(', ')} }`,
      );
    return attr[field];
  }

  /** Delete an attribute; returns its final state. */
  remove(name: string): AttributeDescriptor {
    const attr = this.lookup(name);
    this.attrs.delete(name);
    this.captured = this.captured.filter((n) => n !== name);
    return { ...attr };
  }

  descriptor(name: string): AttributeDescriptor {
    return { ...this.lookup(name) };
  }

  /** All defined names (public and private), sorted. */
  names(): string[] {
    return [...this.attrs.keys()].sort(byName);
  }

  /**
   * Sorted public attribute names. With `verbose`, also logs a table of every
   * descriptor at info level, cells truncated to `maxlen`.
   */
  list(verbose = false, maxlen?: number): string[] {
    if (verbose) {
      const records = this.names().map((n) => this.descriptor(n));
      for (const line of tabulate(records, { sort: 'name', maxlen }))
        this.logger.info(line);
    }
    return this.names().filter(isPublicName);
  }

  /** Display form: the owning type name followed by the public names. */
  describe(): string[] {
    return [this.owner, ...this.list()];
  }

  /** Freeze the current public names as the inheritable set. */
  capture(): number {
    this.captured = this.list();
    return this.captured.length;
  }

  inheritable(): string[] {
    return [...this.captured];
  }

  private lookup(name: string): AttributeDescriptor {
    if (typeof name !== 'string' || name.length === 0)
      throw new BatchSyntaxError('attribute name required');
    const attr = this.attrs.get(name);
    if (!attr) throw new UnknownAttributeError(name);
    return attr;
  }

  private select(
    verb: string,
    first: string | AllAttributes,
    rest: string[],
  ): AttributeDescriptor[] {
    if (first === ALL) return this.names().map((n) => this.lookup(n));
    if (typeof first !== 'string')
      throw new BatchSyntaxError(`${verb}(NAME, ...)`);
    return [first, ...rest].map((n) => this.lookup(n));
  }

  private check(name: string, kind: AttributeKind, v: unknown): unknown {
    if (kind !== 'bool') return v;
    if (v === undefined) {
      this.logger.warn(`attribute [${name}] boolean undefined, defaulting`);
      return 0;
    }
    if (v === 0 || v === '0' || v === false) return 0;
    if (v === 1 || v === '1' || v === true) return 1;
    throw new InvalidKindError(
      `attribute [${name}] value is not boolean [${String(v)}], try: { 0, 1 }`,
    );
  }
}
