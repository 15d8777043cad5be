/* src/errors.ts
 * Failure taxonomy shared by the registries and the executive.
 * Registries throw these; the executive decides (via its fatal flag)
 * whether a failure escalates or degrades to a warning.
 */

export type BatchErrorCode =
  | 'SYNTAX'
  | 'DUPLICATE_ATTRIBUTE'
  | 'UNKNOWN_ATTRIBUTE'
  | 'READ_ONLY'
  | 'INVALID_KIND'
  | 'UNKNOWN_CLASS'
  | 'UNKNOWN_KEY'
  | 'FATAL';

export class BatchError extends Error {
  readonly code: BatchErrorCode;

  constructor(code: BatchErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BatchError';
    this.code = code;
  }
}

/** A required argument was missing or malformed. */
export class BatchSyntaxError extends BatchError {
  constructor(message: string) {
    super('SYNTAX', `SYNTAX ${message}`);
    this.name = 'BatchSyntaxError';
  }
}

export class DuplicateAttributeError extends BatchError {
  readonly attribute: string;

  constructor(attribute: string) {
    super('DUPLICATE_ATTRIBUTE', `attribute [${attribute}] already exists`);
    this.name = 'DuplicateAttributeError';
    this.attribute = attribute;
  }
}

export class UnknownAttributeError extends BatchError {
  readonly attribute: string;

  constructor(attribute: string) {
    super('UNKNOWN_ATTRIBUTE', `attribute [${attribute}] does not exist`);
    this.name = 'UnknownAttributeError';
    this.attribute = attribute;
  }
}

export class ReadOnlyViolationError extends BatchError {
  readonly attribute: string;

  constructor(attribute: string) {
    super('READ_ONLY', `attribute [${attribute}] is read-only`);
    this.name = 'ReadOnlyViolationError';
    this.attribute = attribute;
  }
}

export class InvalidKindError extends BatchError {
  constructor(message: string) {
    super('INVALID_KIND', message);
    this.name = 'InvalidKindError';
  }
}

export class UnknownClassError extends BatchError {
  readonly lovClass: string;

  constructor(lovClass: string) {
    super('UNKNOWN_CLASS', `no such LoV exists [${lovClass}]`);
    this.name = 'UnknownClassError';
    this.lovClass = lovClass;
  }
}

export class UnknownKeyError extends BatchError {
  readonly lovClass: string;
  readonly key: string;
  readonly members: readonly string[];

  constructor(lovClass: string, key: string, members: readonly string[]) {
    super(
      'UNKNOWN_KEY',
      `LoV [${lovClass}] contains no such value [${key}] [${members.join(', ')}]`,
    );
    this.name = 'UnknownKeyError';
    this.lovClass = lovClass;
    this.key = key;
    this.members = members;
  }
}

/** Raised by the executive when a failure occurs with fatal mode on. */
export class FatalError extends BatchError {
  constructor(message: string, cause?: unknown) {
    super('FATAL', `FATAL ${message}`, cause === undefined ? undefined : { cause });
    this.name = 'FatalError';
  }
}

export const isBatchError = (e: unknown): e is BatchError =>
  e instanceof BatchError;
