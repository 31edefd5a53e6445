import { describe, it, expect } from 'vitest';
import {
  formatNdjson,
  formatOutput,
  formatTable,
  formatters,
  isOutputFormat,
  type TableColumn,
} from '../../../cli/lib/output.js';

const COLUMNS: readonly TableColumn[] = [
  { key: 'id', header: 'Id' },
  { key: 'status', header: 'Status', formatter: formatters.dash },
  { key: 'count', header: 'N', align: 'right' },
];

describe('formatTable', () => {
  it('pads columns to their widest cell', () => {
    const table = formatTable(
      [
        { id: 'a', status: 'queued', count: 5 },
        { id: 'bb', status: null, count: 12 },
      ],
      COLUMNS
    );

    expect(table.split('\n')).toEqual([
      'Id | Status |  N',
      '---+--------+---',
      'a  | queued |  5',
      'bb | -      | 12',
    ]);
  });

  it('truncates cells wider than a fixed width', () => {
    const table = formatTable([{ id: 'abcdef' }], [{ key: 'id', header: 'Id', width: 4 }]);

    expect(table.split('\n')[2]).toBe('abc~');
  });

  it('renders objects as JSON', () => {
    const table = formatTable([{ id: { a: 1 } }], [{ key: 'id', header: 'Id' }]);

    expect(table.split('\n')[2]).toBe('{"a":1}');
  });

  it('says so when there is nothing to show', () => {
    expect(formatTable([], COLUMNS)).toBe('No entries found.');
  });
});

describe('formatters', () => {
  it('truncates with an ellipsis', () => {
    expect(formatters.truncate(10)('abcdefghijkl')).toBe('abcdefg...');
    expect(formatters.truncate(10)('short')).toBe('short');
    expect(formatters.truncate(10)(undefined)).toBe('');
  });

  it('dashes empty values', () => {
    expect(formatters.dash('')).toBe('-');
    expect(formatters.dash(0)).toBe('0');
  });
});

describe('formatOutput', () => {
  const rows = [{ id: 'a' }, { id: 'b' }];

  it('writes one JSON document per line for ndjson', () => {
    expect(formatOutput(rows, 'ndjson', COLUMNS)).toBe('{"id":"a"}\n{"id":"b"}');
    expect(formatNdjson([])).toBe('');
  });

  it('pretty prints json', () => {
    expect(formatOutput([{ id: 'a' }], 'json', COLUMNS)).toBe('[\n  {\n    "id": "a"\n  }\n]');
  });

  it('recognizes the supported formats', () => {
    expect(isOutputFormat('ndjson')).toBe(true);
    expect(isOutputFormat('yaml')).toBe(false);
  });
});
