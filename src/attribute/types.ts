// src/attribute/types.ts

/**
 * Attribute kinds:
 * - `any`: unconstrained value,
 * - `bool`: 0 or 1,
 * - `handle`: an opaque collaborator (the logger); stored as-is and never copied.
 */
export type AttributeKind = 'any' | 'bool' | 'handle';

export const ATTRIBUTE_KINDS: Readonly<Record<AttributeKind, string>> = {
  any: 'Attribute can take any value',
  bool: 'Attribute takes a boolean value [0, 1]',
  handle: 'An opaque handle (e.g. the logger) associated with the object',
};

export type AttributeDescriptor = {
  name: string;
  kind: AttributeKind;
  /** Current value; `undefined` means unset. */
  value: unknown;
  default: unknown;
  readOnly: boolean;
  /** Type name that defined the attribute (diagnostic only). */
  ownerClass: string;
};

export type AttributeProp = keyof AttributeDescriptor;

export const ATTRIBUTE_PROPS: readonly AttributeProp[] = [
  'default',
  'kind',
  'name',
  'ownerClass',
  'readOnly',
  'value',
];

/** Selects every defined attribute in reset/sync. */
export const ALL: unique symbol = Symbol('batch-exec.all');
export type AllAttributes = typeof ALL;

/** Read/write surface used by the LoV helpers and the clone engine. */
export type AttributeTarget = {
  get: (name: string) => unknown;
  set: (name: string, value: unknown, dflt?: unknown) => unknown;
};
