// src/exec/host.ts
import type { AttributeRegistry } from '@/attribute/registry';
import type { Logger } from '@/log/logger';

/** Sentinel returned by non-fatal failures. */
export type Coughed = -1;
export const COUGHED: Coughed = -1;

export const isCoughed = (v: unknown): v is Coughed => v === COUGHED;

/** Executive surface the shell/filesystem/platform helpers rely on. */
export type ExecHost = {
  readonly log: Logger;
  readonly attrs: AttributeRegistry;
  readonly platform: NodeJS.Platform;
  readonly env: NodeJS.ProcessEnv;
  readonly echo: boolean;
  /** Escalate (fatal) or warn and return the sentinel. */
  cough: (msg: string, cause?: unknown) => Coughed;
  /** String value of an attribute ('' when unset). */
  text: (name: string) => string;
};
