/* src/lov/registry.ts
 * List-of-values (LoV) registry: named classes of valid keys with
 * descriptions, shared by reference between every executive that is handed
 * the same instance. Assignment helpers validate membership and then write
 * through the target's attribute surface.
 */
import type { AttributeTarget } from '@/attribute/types';
import { BatchSyntaxError, UnknownClassError, UnknownKeyError } from '@/errors';
import { createLogger, type Logger } from '@/log/logger';

import { mathRandom, type RandomSource, shuffle } from './random';

export type LovMapping = Readonly<Record<string, string>>;

export type LovRegistryOptions = {
  random?: RandomSource;
  logger?: Logger;
};

const sorted = (keys: Iterable<string>): string[] =>
  [...keys].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

export class LovRegistry {
  private readonly classes_ = new Map<string, Map<string, string>>();
  private readonly source: RandomSource;
  private readonly logger: Logger;

  constructor(opts: LovRegistryOptions = {}) {
    this.source = opts.random ?? mathRandom;
    this.logger = opts.logger ?? createLogger({ scope: 'lov' });
  }

  /**
   * Register a class, or merge into an existing one (key union; on an
   * overlapping key the description from this call wins).
   *
   * @returns Entry count after registration.
   */
  register(lovClass: string, mapping: LovMapping): number {
    if (!lovClass) throw new BatchSyntaxError('register(CLASS, MAPPING)');
    if (typeof mapping !== 'object' || mapping === null || Array.isArray(mapping))
      throw new BatchSyntaxError('register(CLASS, MAPPING) must pass a mapping');

    const existing = this.classes_.get(lovClass);
    const next = new Map(existing ?? []);
    for (const [key, description] of Object.entries(mapping))
      next.set(key, description);

    this.logger.debug(`${existing ? 'merging' : 'registering'} ${lovClass}`);
    this.classes_.set(lovClass, next);
    return next.size;
  }

  /** Remove a class; returns its entry count beforehand (0 when unknown). */
  clear(lovClass: string): number {
    const existing = this.classes_.get(lovClass);
    if (!existing) return 0;
    this.classes_.delete(lovClass);
    return existing.size;
  }

  has(lovClass: string): boolean {
    return this.classes_.has(lovClass);
  }

  classes(): string[] {
    return sorted(this.classes_.keys());
  }

  keys(lovClass: string): string[] {
    return sorted(this.entriesOf(lovClass).keys());
  }

  entries(lovClass: string): Array<[string, string]> {
    const entries = this.entriesOf(lovClass);
    return this.keys(lovClass).map((k) => [k, entries.get(k) ?? '']);
  }

  lookup(lovClass: string, key: string): string {
    const description = this.entriesOf(lovClass).get(key);
    if (description === undefined) return this.fail(lovClass, key);
    return description;
  }

  /** Throws UnknownKey (or UnknownClass) unless value is a member. */
  validate(lovClass: string, value: string): void {
    if (!this.entriesOf(lovClass).has(value)) this.fail(lovClass, value);
  }

  /** Set the attribute to a uniformly chosen member; returns the value. */
  random(lovClass: string, target: AttributeTarget, attr: string): string {
    const [value] = shuffle(this.keys(lovClass), this.source);
    if (value === undefined) throw new UnknownKeyError(lovClass, '(none)', []);
    this.validate(lovClass, value);
    this.logger.info(`randomising attribute [${attr}] to [${value}]`);
    target.set(attr, value);
    return value;
  }

  /**
   * Set the attribute to key only when it currently holds no value
   * (undefined or null).
   *
   * @returns The attribute's value after the call.
   */
  conditionalDefault(
    lovClass: string,
    target: AttributeTarget,
    attr: string,
    key: string,
  ): unknown {
    this.validate(lovClass, key);
    const current = target.get(attr);
    if (current !== undefined && current !== null) {
      this.logger.info(`skipping attribute default for [${attr}]`);
      return current;
    }
    this.logger.info(`defaulting attribute [${attr}] to [${key}]`);
    target.set(attr, key);
    return key;
  }

  /** Validate key, then set the attribute unconditionally. */
  forceSet(
    lovClass: string,
    target: AttributeTarget,
    attr: string,
    key: string,
  ): string {
    this.validate(lovClass, key);
    this.logger.info(`setting [${attr}] to [${key}]`);
    target.set(attr, key);
    return key;
  }

  private entriesOf(lovClass: string): Map<string, string> {
    const entries = this.classes_.get(lovClass);
    if (!entries) throw new UnknownClassError(lovClass);
    return entries;
  }

  private fail(lovClass: string, key: string): never {
    throw new UnknownKeyError(lovClass, key, this.keys(lovClass));
  }
}

let shared: LovRegistry | undefined;

/**
 * Application-wide registry: created on first use, replaced only by
 * resetSharedLovRegistry (test fixtures).
 */
export const sharedLovRegistry = (): LovRegistry => {
  shared ??= new LovRegistry();
  return shared;
};

export const resetSharedLovRegistry = (next?: LovRegistry): void => {
  shared = next;
};
