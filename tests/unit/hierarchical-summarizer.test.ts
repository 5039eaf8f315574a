import { describe, it, expect } from 'vitest';
import {
  HierarchicalSummarizer,
  truncateToChars,
} from '../../src/services/summarization/hierarchical-summarizer.js';
import type { TranslatedChunk } from '../../src/services/translation/chunk-translator.js';
import { FakeGenerationClient } from '../fixtures/fake-generation-client.js';

function translated(texts: string[]): TranslatedChunk[] {
  return texts.map((text, index) => ({ index, sectionIndex: index, source: text, translated: text }));
}

describe('truncateToChars', () => {
  it('should leave text within the cap untouched', () => {
    expect(truncateToChars('12345', 5)).toBe('12345');
  });

  it('should replace the last kept code point with an ellipsis', () => {
    expect(truncateToChars('1234567', 5)).toBe('1234…');
  });

  it('should count code points', () => {
    expect(truncateToChars('😀😀😀', 2)).toBe('😀…');
  });
});

describe('HierarchicalSummarizer', () => {
  it('should make no requests when there are no chunks', async () => {
    const client = new FakeGenerationClient();
    const summarizer = new HierarchicalSummarizer(client, { maxChars: 200, temperature: 1, hardCap: true });

    expect(await summarizer.summarize([])).toEqual({ levelOne: [], finalSummary: '' });
    expect(client.requests).toHaveLength(0);
  });

  it('should summarize each chunk, then compress the summaries', async () => {
    let n = 0;
    const client = new FakeGenerationClient((req) =>
      req.task === 'summarize-chunk' ? `S${++n}` : 'final'
    );
    const summarizer = new HierarchicalSummarizer(client, { maxChars: 200, temperature: 1, hardCap: true });

    const result = await summarizer.summarize(translated(['段一', '段二']));

    expect(result).toEqual({ levelOne: ['S1', 'S2'], finalSummary: 'final' });
    expect(client.tasks()).toEqual(['summarize-chunk', 'summarize-chunk', 'summarize-final']);
    expect(client.requests[0]?.prompt).toBe('请用不超过 400 字总结以下段落，不要添加任何额外内容：\n\n段一');
    expect(client.requests[2]?.prompt).toBe(
      '以下是多段摘要，请综合压缩为不超过 200 字，不要添加任何额外内容：\n\nS1\nS2'
    );
    expect(client.requests.every((r) => r.temperature === 1)).toBe(true);
  });

  it('should truncate over-long output when the hard cap is on', async () => {
    const client = new FakeGenerationClient((req) =>
      req.task === 'summarize-chunk' ? 'abcdefghijkl' : '1234567'
    );
    const summarizer = new HierarchicalSummarizer(client, { maxChars: 5, temperature: 1, hardCap: true });

    const result = await summarizer.summarize(translated(['text']));

    expect(result).toEqual({ levelOne: ['abcdefghi…'], finalSummary: '1234…' });
    expect(client.requests[1]?.prompt.endsWith('\n\nabcdefghi…')).toBe(true);
  });

  it('should keep over-long output when the hard cap is off', async () => {
    const client = new FakeGenerationClient((req) =>
      req.task === 'summarize-chunk' ? 'abcdefghijkl' : '1234567'
    );
    const summarizer = new HierarchicalSummarizer(client, { maxChars: 5, temperature: 1, hardCap: false });

    const result = await summarizer.summarize(translated(['text']));

    expect(result).toEqual({ levelOne: ['abcdefghijkl'], finalSummary: '1234567' });
  });
});
