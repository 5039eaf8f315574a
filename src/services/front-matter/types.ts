/**
 * Front-matter mapping. Insertion order is the serialization order.
 */
export type FrontMatter = Record<string, unknown>;

export interface MarkdownDocument {
  frontMatter: FrontMatter;
  body: string;
}
