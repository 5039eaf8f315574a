import { describe, it, expect } from 'vitest';
import {
  MarkdownSegmenter,
  splitSections,
} from '../../src/services/chunking/markdown-segmenter.js';
import { CharEstimator } from '../../src/services/chunking/token-estimator.js';
import { ErrorCodes, MdDigestError } from '../../src/core/errors.js';

describe('splitSections', () => {
  it('should return no sections for an empty body', () => {
    expect(splitSections('')).toEqual([]);
  });

  it('should start a section at each heading', () => {
    const body = 'intro\n# A\ntext a\n## B\ntext b';

    expect(splitSections(body).map((s) => s.content)).toEqual([
      'intro\n',
      '# A\ntext a\n',
      '## B\ntext b',
    ]);
  });

  it('should not start an empty section for a leading heading', () => {
    const sections = splitSections('# Title\nbody\n');
    expect(sections).toEqual([{ index: 0, content: '# Title\nbody\n' }]);
  });

  it('should split consecutive headings', () => {
    expect(splitSections('# A\n## B\ntext\n').map((s) => s.content)).toEqual(['# A\n', '## B\ntext\n']);
  });

  it('should only treat 1-6 hashes followed by whitespace as headings', () => {
    const body = 'para\n#hashtag\n####### seven\n###### six\n';
    expect(splitSections(body).map((s) => s.content)).toEqual([
      'para\n#hashtag\n####### seven\n',
      '###### six\n',
    ]);
  });

  it('should reproduce the body when sections are concatenated', () => {
    const body = 'lead\n\n# One\n\ntext\n\n## Two\n\nmore text\n\n### Three\nlast';
    expect(
      splitSections(body)
        .map((s) => s.content)
        .join('')
    ).toBe(body);
  });
});

describe('MarkdownSegmenter', () => {
  const estimator = new CharEstimator();

  it('should keep sections within budget as single chunks', () => {
    const segmenter = new MarkdownSegmenter({ tokenBudget: 100, overlapTokens: 10 }, estimator);
    const { chunks, stats } = segmenter.segment('# A\nshort\n# B\nalso short\n');

    expect(chunks).toEqual([
      { index: 0, sectionIndex: 0, content: '# A\nshort\n', tokenEstimate: 3, overlapPrevious: 0, split: false },
      { index: 1, sectionIndex: 1, content: '# B\nalso short\n', tokenEstimate: 4, overlapPrevious: 0, split: false },
    ]);
    expect(stats.splitSections).toBe(0);
  });

  it('should window oversized sections with overlap', () => {
    const segmenter = new MarkdownSegmenter({ tokenBudget: 10, overlapTokens: 2 }, estimator);
    const section = 'x'.repeat(100);

    const { chunks, stats } = segmenter.segment(section);

    expect(chunks).toHaveLength(3);
    expect(chunks.map((c) => c.overlapPrevious)).toEqual([0, 2, 2]);
    expect(chunks.every((c) => c.split && c.sectionIndex === 0)).toBe(true);
    expect(chunks.map((c) => c.tokenEstimate)).toEqual([10, 10, 9]);
    expect(stats).toEqual({
      totalSections: 1,
      totalChunks: 3,
      splitSections: 1,
      maxChunkTokens: 10,
      totalTokens: 25,
    });
  });

  it('should number chunks across sections in document order', () => {
    const segmenter = new MarkdownSegmenter({ tokenBudget: 10, overlapTokens: 0 }, estimator);
    const body = 'small\n# Big\n' + 'y'.repeat(60);

    const { chunks } = segmenter.segment(body);

    expect(chunks.map((c) => [c.index, c.sectionIndex])).toEqual([
      [0, 0],
      [1, 1],
      [2, 1],
    ]);
  });

  it('should yield nothing for an empty body', () => {
    const segmenter = new MarkdownSegmenter({}, estimator);
    expect(segmenter.segment('').chunks).toEqual([]);
  });

  it('should default to an 8000 token budget with 200 overlap', () => {
    expect(new MarkdownSegmenter({}, estimator).getConfig()).toEqual({
      tokenBudget: 8000,
      overlapTokens: 200,
    });
  });

  it('should reject overlap not below budget', () => {
    let caught: unknown;
    try {
      new MarkdownSegmenter({ tokenBudget: 10, overlapTokens: 10 }, estimator);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MdDigestError);
    expect(caught).toMatchObject({ code: ErrorCodes.INVALID_PARAMETER });
  });

  it('should reject a non-positive budget', () => {
    expect(() => new MarkdownSegmenter({ tokenBudget: 0, overlapTokens: 0 }, estimator)).toThrow(
      /tokenBudget/
    );
  });

  it('should reject a negative overlap', () => {
    expect(() => new MarkdownSegmenter({ tokenBudget: 10, overlapTokens: -1 }, estimator)).toThrow(
      /overlapTokens/
    );
  });
});
