import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { createProgram } from '../../src/cli/index.js';
import { formatOutput } from '../../src/cli/utils/output.js';
import { createTempDir, removeTempDir, writeTree } from '../fixtures/tmp-dir.js';

describe('formatOutput', () => {
  it('should pretty-print JSON by default', () => {
    expect(formatOutput({ total: 1 })).toBe('{\n  "total": 1\n}');
  });

  it('should render a run summary as a table', () => {
    const output = formatOutput(
      { total: 2, succeeded: 1, failed: 1, failures: [{ path: 'a.md', code: 'E7001', message: 'boom' }] },
      'table'
    );

    expect(output).toBe(
      ['total: 2 | succeeded: 1 | failed: 1', '', 'path | code  | message', '-----+-------+--------', 'a.md | E7001 | boom   '].join(
        '\n'
      )
    );
  });

  it('should note an empty list', () => {
    expect(formatOutput({ total: 0, failures: [] }, 'table')).toBe('total: 0\n\n(no results)');
  });

  it('should render plain objects as key-value lines', () => {
    expect(formatOutput({ a: 1, b: undefined, c: 'x' }, 'table')).toBe('a: 1\nc: x');
  });
});

describe('CLI program', () => {
  let root: string;
  let log: MockInstance<typeof console.log>;

  beforeEach(async () => {
    root = await createTempDir();
    log = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    log.mockRestore();
    await removeTempDir(root);
  });

  it('should register the translate, segment and config commands', () => {
    const names = createProgram().commands.map((c) => c.name());
    expect(names).toEqual(['translate', 'segment', 'config']);
  });

  it('should list chunks for a document without generation requests', async () => {
    const file = await writeTree(root, 'doc.md', '---\ntitle: T\n---\n\n# One\n\ntext\n\n# Two\n\nmore\n');

    await createProgram().parseAsync(['segment', file], { from: 'user' });

    expect(log).toHaveBeenCalledTimes(1);
    const printed: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(printed).toMatchObject({
      file,
      estimator: 'cl100k_base',
      sections: 2,
      splitSections: 0,
      chunks: [
        { index: 0, section: 0, split: false, firstLine: '# One' },
        { index: 1, section: 1, split: false, firstLine: '# Two' },
      ],
    });
  });

  it('should hide sensitive values in the config listing', async () => {
    await createProgram().parseAsync(['config'], { from: 'user' });

    const printed: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(printed).toMatchObject({
      options: expect.arrayContaining([
        expect.objectContaining({ envKey: 'MD_DIGEST_API_KEY', value: '(hidden)' }),
        expect.objectContaining({ envKey: 'MD_DIGEST_CHUNK_TOKENS', value: 8000 }),
      ]),
    });
  });
});
