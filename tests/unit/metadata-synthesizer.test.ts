import { describe, it, expect } from 'vitest';
import { MetadataSynthesizer, parseTags } from '../../src/services/metadata/metadata-synthesizer.js';
import { FakeGenerationClient } from '../fixtures/fake-generation-client.js';

describe('parseTags', () => {
  it('should split on commas, 、 and newlines', () => {
    expect(parseTags('AI, 芯片、机器人\n监管')).toEqual(['AI', '芯片', '机器人', '监管']);
  });

  it('should split on full-width commas and bullets', () => {
    expect(parseTags('• 芯片\r\n• 出口管制，半导体')).toEqual(['芯片', '出口管制', '半导体']);
  });

  it('should drop empty entries and later duplicates', () => {
    expect(parseTags(',, AI，AI ,芯片,\n')).toEqual(['AI', '芯片']);
  });

  it('should return nothing for blank input', () => {
    expect(parseTags('  \n ')).toEqual([]);
  });
});

describe('MetadataSynthesizer', () => {
  const options = { temperature: 1, descriptionMaxChars: 50 };
  const summary = { levelOne: ['一段', '二段'], finalSummary: '最终' };

  it('should request tags then a description', async () => {
    const client = new FakeGenerationClient((req) => (req.task === 'tags' ? 'AI、芯片' : '一句话'));
    const synthesizer = new MetadataSynthesizer(client, options);

    const metadata = await synthesizer.synthesize(summary);

    expect(metadata).toEqual({ tags: ['AI', '芯片'], description: '一句话' });
    expect(client.tasks()).toEqual(['tags', 'description']);
    expect(client.requests[0]?.prompt.endsWith('\n\n最终\n\n一段\n\n二段')).toBe(true);
    expect(client.requests[1]?.prompt).toBe('基于以下最终摘要，用一句话（≤50字）写一个简介：\n\n最终');
  });

  it('should replace existing tags and set the description', async () => {
    const client = new FakeGenerationClient((req) => (req.task === 'tags' ? 'new' : 'desc'));
    const synthesizer = new MetadataSynthesizer(client, options);
    const frontMatter = { title: 'T', tags: ['old'] };

    const result = await synthesizer.apply(frontMatter, summary);

    expect(result).toEqual({ title: 'T', tags: ['new'], description: 'desc' });
    expect(frontMatter.tags).toEqual(['old']);
  });

  it('should keep existing tags when the response has none', async () => {
    const client = new FakeGenerationClient((req) => (req.task === 'tags' ? ' ,、\n' : 'desc'));
    const synthesizer = new MetadataSynthesizer(client, options);

    const result = await synthesizer.apply({ tags: ['old'] }, summary);

    expect(result).toEqual({ tags: ['old'], description: 'desc' });
  });

  it('should skip both requests for an empty final summary', async () => {
    const client = new FakeGenerationClient();
    const synthesizer = new MetadataSynthesizer(client, options);
    const frontMatter = { tags: ['old'] };

    const result = await synthesizer.apply(frontMatter, { levelOne: [], finalSummary: '' });

    expect(result).toEqual({ tags: ['old'] });
    expect(client.requests).toHaveLength(0);
  });
});
