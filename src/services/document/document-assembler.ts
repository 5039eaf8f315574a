/**
 * Document Assembler
 */

import { serializeFrontMatter } from '../front-matter/front-matter.js';
import type { FrontMatter } from '../front-matter/types.js';

export interface AssembleDocumentInput {
  frontMatter: FrontMatter;
  link: string | undefined;
  summary: string;
  body: string;
  attributionLabel: string;
}

/**
 * Compose the output document: front matter, optional attribution line,
 * summary block, separator, translated body.
 */
export function assembleDocument(input: AssembleDocumentInput): string {
  const { frontMatter, link, summary, body, attributionLabel } = input;
  const attribution = link ? `*[源信息](${link})经过${attributionLabel}翻译并总结*\n\n` : '';

  return (
    `---\n${serializeFrontMatter(frontMatter)}\n---\n\n` +
    attribution +
    `## 摘要：\n\n${summary}\n\n---\n\n` +
    body
  );
}
