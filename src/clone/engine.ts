/* src/clone/engine.ts
 * Bulk attribute copy between two registries.
 * - inherit: the target's captured inheritable set; read-only targets fail.
 * - clone: the target's current public attributes, under a ClonePolicy.
 * Handle attributes (the logger) are never copied. All source reads, kind
 * checks and read-only checks happen before the first write.
 */
import type { AttributeRegistry } from '@/attribute/registry';
import type { AttributeTarget } from '@/attribute/types';
import { ReadOnlyViolationError } from '@/errors';
import { createLogger, type Logger } from '@/log/logger';

/**
 * How read-only destination attributes are treated:
 * - `normal`: abort the copy,
 * - `force`: make writable, copy, restore read-only,
 * - `skip`: leave untouched and exclude from the count.
 */
export type ClonePolicy = 'normal' | 'force' | 'skip';

export const CLONE_POLICIES: readonly ClonePolicy[] = ['normal', 'force', 'skip'];

type CopyStep = { name: string; value: unknown; readOnly: boolean };

const planCopy = (
  target: AttributeRegistry,
  source: AttributeTarget,
  names: readonly string[],
): CopyStep[] =>
  names
    .filter((name) => target.kind(name) !== 'handle')
    .map((name) => ({
      name,
      value: target.normalise(name, source.get(name)),
      readOnly: target.isReadOnly(name),
    }));

const fallbackLogger = (): Logger => createLogger({ scope: 'clone' });

/** Copy the target's inheritable attributes from source; returns the count. */
export const inherit = (
  target: AttributeRegistry,
  source: AttributeTarget,
  logger: Logger = fallbackLogger(),
): number => {
  const steps = planCopy(target, source, target.inheritable());
  const blocked = steps.find((s) => s.readOnly);
  if (blocked) throw new ReadOnlyViolationError(blocked.name);

  for (const step of steps) target.set(step.name, step.value);
  logger.info(`inherited ${steps.length} attributes`);
  return steps.length;
};

/** Copy the target's public attributes from source; returns the count copied. */
export const clone = (
  target: AttributeRegistry,
  source: AttributeTarget,
  policy: ClonePolicy = 'normal',
  logger: Logger = fallbackLogger(),
): number => {
  const steps = planCopy(target, source, target.list());
  if (policy === 'normal') {
    const blocked = steps.find((s) => s.readOnly);
    if (blocked) throw new ReadOnlyViolationError(blocked.name);
  }

  let changed = 0;
  for (const step of steps) {
    if (step.readOnly && policy === 'skip') {
      logger.info(`skipping read-only attribute change on [${step.name}]`);
      continue;
    }
    if (step.readOnly) {
      logger.info(`forcing read-only attribute change on [${step.name}]`);
      target.rw(step.name);
      try {
        target.set(step.name, step.value);
      } finally {
        target.ro(step.name);
      }
    } else {
      target.set(step.name, step.value);
    }
    changed++;
  }
  logger.info(`cloned ${changed} attributes`);
  return changed;
};
