/* src/util/tabulate.ts
 * Render records with fixed keys as aligned, borderless columns.
 * Column order: sort key first, remaining keys alphabetically.
 */
import { table } from 'table';

import { paint } from '@/util/color';
import { trunc } from '@/util/text';

export type TabulateOptions = {
  /** Key used to order rows (and placed first). Default "name". */
  sort?: string;
  /** Truncate cell text beyond this many characters. Default 30. */
  maxlen?: number;
};

export const UNDEF = '(undef)';

const cellText = (v: unknown): string | undefined => {
  if (v === undefined || v === null) return undefined;
  if (typeof v === 'string') return v;
  if (typeof v === 'number' || typeof v === 'boolean' || typeof v === 'bigint')
    return String(v);
  if (typeof v === 'symbol') return v.toString();
  if (typeof v === 'function') return '[function]';
  try {
    return JSON.stringify(v) ?? String(v);
  } catch {
    return '[object]';
  }
};

/** Column headers for a record set (empty for no records). */
export const tabulateHeader = (
  records: ReadonlyArray<Record<string, unknown>>,
  sort = 'name',
): string[] => {
  const first = records[0];
  if (!first) return [];
  const keys = Object.keys(first).sort();
  return keys.includes(sort) ? [sort, ...keys.filter((k) => k !== sort)] : keys;
};

/**
 * Tabulate records; returns one string per line (header first).
 * Missing values render as "(undef)".
 */
export const tabulate = (
  records: ReadonlyArray<Record<string, unknown>>,
  opts: TabulateOptions = {},
): string[] => {
  const sort = opts.sort ?? 'name';
  const maxlen = opts.maxlen ?? 30;
  const header = tabulateHeader(records, sort);
  if (header.length === 0) return [];

  const rows = records.map((rec) =>
    header.map((k) => {
      const text = cellText(rec[k]);
      return text === undefined
        ? UNDEF
        : // table rejects control characters inside cells
          // eslint-disable-next-line no-control-regex
          trunc(text, maxlen).replace(/[\u0000-\u001F\u007F]/g, ' ');
    }),
  );
  const sortIdx = header.indexOf(sort);
  if (sortIdx >= 0) {
    rows.sort((a, b) => {
      const x = a[sortIdx] ?? '';
      const y = b[sortIdx] ?? '';
      return x < y ? -1 : x > y ? 1 : 0;
    });
  }

  const rendered = table([header.map((h) => paint('heading', h)), ...rows], {
    border: {
      topBody: ``,
      topJoin: ``,
      topLeft: ``,
      topRight: ``,
      bottomBody: ``,
      bottomJoin: ``,
      bottomLeft: ``,
      bottomRight: ``,
      bodyLeft: ``,
      bodyRight: ``,
      bodyJoin: ``,
      joinBody: ``,
      joinLeft: ``,
      joinRight: ``,
      joinJoin: ``,
    },
    drawHorizontalLine: () => false,
    columnDefault: { alignment: 'left' },
  });
  return rendered
    .split('\n')
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);
};
