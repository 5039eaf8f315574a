/**
 * Front-matter split and serialization
 */

import yaml from 'js-yaml';
import { createComponentLogger } from '../../utils/logger.js';
import { createFrontMatterError } from '../../core/errors.js';
import type { FrontMatter, MarkdownDocument } from './types.js';

const logger = createComponentLogger('front-matter');

const OPENING = '---\n';
const CLOSING = '\n---';

function isMapping(value: unknown): value is FrontMatter {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function parseBlock(block: string): FrontMatter {
  let parsed: unknown;
  try {
    parsed = yaml.load(block);
  } catch (error) {
    const warning = createFrontMatterError(error instanceof Error ? error.message : String(error));
    logger.warn({ code: warning.code, reason: warning.context?.reason }, 'Ignoring malformed front matter');
    return {};
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isMapping(parsed)) {
    const warning = createFrontMatterError(`expected a mapping, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`);
    logger.warn({ code: warning.code, reason: warning.context?.reason }, 'Ignoring non-mapping front matter');
    return {};
  }
  return parsed;
}

/**
 * Split a document into its front-matter mapping and body.
 * The block runs from the opening `---` line to the next `\n---`; leading
 * newlines after the closing delimiter are dropped from the body.
 */
export function splitFrontMatter(text: string): MarkdownDocument {
  if (!text.startsWith(OPENING)) {
    return { frontMatter: {}, body: text };
  }

  const end = text.indexOf(CLOSING, OPENING.length);
  if (end === -1) {
    return { frontMatter: {}, body: text };
  }

  const block = text.slice(OPENING.length, end);
  const body = text.slice(end + CLOSING.length).replace(/^\n+/, '');

  return { frontMatter: parseBlock(block), body };
}

/**
 * Dump a mapping as YAML: keys in insertion order, no line folding, trailing newline trimmed
 */
export function serializeFrontMatter(frontMatter: FrontMatter): string {
  if (Object.keys(frontMatter).length === 0) {
    return '';
  }
  return yaml
    .dump(frontMatter, { sortKeys: false, lineWidth: -1, noRefs: true })
    .replace(/\n+$/, '');
}
