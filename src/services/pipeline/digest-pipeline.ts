/**
 * Digest Pipeline
 *
 * Per document: read, split front matter, transform front matter, segment,
 * translate, summarize, synthesize metadata, assemble, write, mark.
 * Documents are processed one after another; a failed document is recorded,
 * left unmarked, and the run continues.
 */

import { mkdir, readFile } from 'node:fs/promises';
import type { Config } from '../../config/index.js';
import { createFileSystemError } from '../../core/errors.js';
import { createComponentLogger } from '../../utils/logger.js';
import { mapError } from '../../utils/error-mapper.js';
import { MarkdownSegmenter } from '../chunking/markdown-segmenter.js';
import { createTokenEstimator } from '../chunking/token-estimator.js';
import type { GenerationClient } from '../generation/types.js';
import { createGenerationClient } from '../generation/openai.client.js';
import { ChunkTranslator, joinTranslated } from '../translation/chunk-translator.js';
import { HierarchicalSummarizer } from '../summarization/hierarchical-summarizer.js';
import { MetadataSynthesizer } from '../metadata/metadata-synthesizer.js';
import { splitFrontMatter } from '../front-matter/front-matter.js';
import { FrontMatterTransformer } from '../front-matter/front-matter-transformer.js';
import { assembleDocument } from '../document/document-assembler.js';
import { findSourceDocuments } from '../file-sync/walk.js';
import { markAsProcessed, mirrorPath, writeOutput } from '../file-sync/marker.js';
import type { DigestPipelineOptions, DocumentFailure, ProcessResult, RunSummary } from './types.js';

const logger = createComponentLogger('pipeline');

export class DigestPipeline {
  private readonly frontMatterTransformer: FrontMatterTransformer;
  private readonly translator: ChunkTranslator;
  private readonly summarizer: HierarchicalSummarizer;
  private readonly metadata: MetadataSynthesizer;

  constructor(
    client: GenerationClient,
    private readonly segmenter: MarkdownSegmenter,
    private readonly options: DigestPipelineOptions
  ) {
    this.frontMatterTransformer = new FrontMatterTransformer(client, {
      targetLanguage: options.targetLanguage,
      temperature: options.translationTemperature,
    });
    this.translator = new ChunkTranslator(client, {
      targetLanguage: options.targetLanguage,
      temperature: options.translationTemperature,
    });
    this.summarizer = new HierarchicalSummarizer(client, {
      maxChars: options.summaryMaxChars,
      temperature: options.summaryTemperature,
      hardCap: options.summaryHardCap,
    });
    this.metadata = new MetadataSynthesizer(client, {
      temperature: options.summaryTemperature,
      descriptionMaxChars: options.descriptionMaxChars,
    });
  }

  async processDocument(sourcePath: string): Promise<ProcessResult> {
    let text: string;
    try {
      text = await readFile(sourcePath, 'utf-8');
    } catch (error) {
      throw createFileSystemError('read', sourcePath, error);
    }

    const document = splitFrontMatter(text);
    const { frontMatter, link } = await this.frontMatterTransformer.transform(document.frontMatter);

    const { chunks, stats } = this.segmenter.segment(document.body);
    logger.info(
      { path: sourcePath, chunks: stats.totalChunks, sections: stats.totalSections, tokens: stats.totalTokens },
      'Document segmented'
    );

    const translated = await this.translator.translateChunks(chunks);
    const body = joinTranslated(translated);
    const summary = await this.summarizer.summarize(translated);
    const enriched = await this.metadata.apply(frontMatter, summary);

    const output = assembleDocument({
      frontMatter: enriched,
      link,
      summary: summary.finalSummary,
      body,
      attributionLabel: this.options.attributionLabel,
    });

    const outputPath = mirrorPath(sourcePath, this.options.sourceDir, this.options.outputDir);
    await writeOutput(outputPath, output);
    const markedPath = await markAsProcessed(sourcePath, this.options.markerPrefix);

    return { sourcePath, outputPath, markedPath, chunkCount: chunks.length };
  }

  async run(): Promise<RunSummary> {
    const { sourceDir, outputDir, markerPrefix } = this.options;

    try {
      await mkdir(outputDir, { recursive: true });
    } catch (error) {
      throw createFileSystemError('write', outputDir, error);
    }

    const sources = await findSourceDocuments(sourceDir, markerPrefix);
    logger.info({ sourceDir, outputDir, documents: sources.length }, 'Starting run');

    const failures: DocumentFailure[] = [];
    let succeeded = 0;

    for (const sourcePath of sources) {
      const startedAt = Date.now();
      try {
        const result = await this.processDocument(sourcePath);
        succeeded++;
        logger.info(
          { path: sourcePath, output: result.outputPath, chunks: result.chunkCount, durationMs: Date.now() - startedAt },
          'Document processed'
        );
      } catch (error) {
        const mapped = mapError(error);
        failures.push({ path: sourcePath, code: mapped.code, message: mapped.message });
        logger.error({ path: sourcePath, code: mapped.code, error: mapped.message }, 'Document failed');
      }
    }

    const summary: RunSummary = {
      total: sources.length,
      succeeded,
      failed: failures.length,
      failures,
    };
    logger.info({ total: summary.total, succeeded, failed: summary.failed }, 'Run complete');
    return summary;
  }
}

/**
 * Build the pipeline and its collaborators from config. Directory overrides win over config paths.
 */
export function createDigestPipeline(
  config: Config,
  overrides: { sourceDir?: string; outputDir?: string; client?: GenerationClient } = {}
): DigestPipeline {
  const client =
    overrides.client ??
    createGenerationClient({
      apiKey: config.generation.apiKey,
      baseUrl: config.generation.baseUrl,
      model: config.generation.model,
      timeoutMs: config.generation.timeoutMs,
      debug: config.logging.debug,
    });
  const segmenter = new MarkdownSegmenter(
    { tokenBudget: config.chunking.tokenBudget, overlapTokens: config.chunking.overlapTokens },
    createTokenEstimator(config.chunking.tokenizer)
  );

  return new DigestPipeline(client, segmenter, {
    sourceDir: overrides.sourceDir ?? config.paths.sourceDir,
    outputDir: overrides.outputDir ?? config.paths.outputDir,
    markerPrefix: config.output.markerPrefix,
    attributionLabel: config.output.attributionLabel,
    targetLanguage: config.generation.targetLanguage,
    translationTemperature: config.generation.translationTemperature,
    summaryTemperature: config.generation.summaryTemperature,
    summaryMaxChars: config.summary.maxChars,
    summaryHardCap: config.summary.hardCap,
    descriptionMaxChars: config.summary.descriptionMaxChars,
  });
}
