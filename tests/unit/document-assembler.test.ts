import { describe, it, expect } from 'vitest';
import { assembleDocument } from '../../src/services/document/document-assembler.js';

describe('assembleDocument', () => {
  it('should place the attribution line before the summary when a link is present', () => {
    const output = assembleDocument({
      frontMatter: { title: 'T' },
      link: 'https://example.com/post',
      summary: '摘要内容',
      body: '正文\n',
      attributionLabel: 'deepseek',
    });

    expect(output).toBe(
      '---\ntitle: T\n---\n\n' +
        '*[源信息](https://example.com/post)经过deepseek翻译并总结*\n\n' +
        '## 摘要：\n\n摘要内容\n\n---\n\n正文\n'
    );
  });

  it('should omit the attribution line without a link', () => {
    const output = assembleDocument({
      frontMatter: { title: 'T' },
      link: undefined,
      summary: 'S',
      body: 'B',
      attributionLabel: 'deepseek',
    });

    expect(output).toBe('---\ntitle: T\n---\n\n## 摘要：\n\nS\n\n---\n\nB');
  });

  it('should start with the front-matter delimiter and put the summary before the body', () => {
    const output = assembleDocument({
      frontMatter: {},
      link: undefined,
      summary: '',
      body: 'BODY',
      attributionLabel: 'x',
    });

    expect(output.startsWith('---\n')).toBe(true);
    expect(output.indexOf('## 摘要：')).toBeLessThan(output.indexOf('BODY'));
  });
});
