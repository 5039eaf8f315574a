export interface ProcessResult {
  sourcePath: string;
  outputPath: string;
  markedPath: string;
  chunkCount: number;
}

export interface DocumentFailure {
  path: string;
  code: string;
  message: string;
}

export interface RunSummary {
  total: number;
  succeeded: number;
  failed: number;
  failures: DocumentFailure[];
}

export interface DigestPipelineOptions {
  sourceDir: string;
  outputDir: string;
  markerPrefix: string;
  attributionLabel: string;
  targetLanguage: string;
  translationTemperature: number;
  summaryTemperature: number;
  summaryMaxChars: number;
  summaryHardCap: boolean;
  descriptionMaxChars: number;
}
