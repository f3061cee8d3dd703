import { categorizeRadar, summarizeCategories } from './analysis/radar-categorizer';
import { matchSensors } from './analysis/cross-sensor-matcher';
import { sortChronologically } from './analysis/sorting';
import { buildTimeline } from './analysis/timeline';
import { LogIngestor } from './ingest/log-ingestor';
import type { AnalysisResult, IngestResult, WarningHandler } from './types';

export interface AnalyzeOptions {
  inputDir: string;
  sort?: boolean;
  onWarning?: WarningHandler;
}

/**
 * Categorises and cross-checks detections that are already in memory.
 */
export function analyzeDetections(ingest: IngestResult, sort = false): AnalysisResult {
  // optional chronological order
  const radar = sort ? sortChronologically(ingest.radar) : ingest.radar;
  const image = sort ? sortChronologically(ingest.image) : ingest.image;
  const ordered: IngestResult = { ...ingest, radar, image };

  // categories, sensor cross-check and timeline all read the same ordered lists
  return {
    ingest: ordered,
    categories: categorizeRadar(radar),
    comparison: matchSensors(radar, image),
    timeline: buildTimeline(radar, image)
  };
}

export async function analyzeLogs(options: AnalyzeOptions): Promise<AnalysisResult> {
  const ingestor = new LogIngestor(options.onWarning);

  // Ingest
  console.log(`📂 Reading logs from: ${options.inputDir}`);
  const ingest = await ingestor.ingestFolder(options.inputDir);

  // Ingest summary
  const { stats } = ingest;
  console.log(`✅ ${stats.radar} radar / ${stats.image} image detections from ${stats.files} file(s)`);
  if (stats.failedFiles > 0) {
    console.log(`   - unreadable files: ${stats.failedFiles}`);
  }
  if (stats.droppedWithoutTimestamp > 0) {
    console.log(`   - dropped before any timestamp: ${stats.droppedWithoutTimestamp}`);
  }

  if (ingest.radar.length === 0) {
    console.log('⚠️  No radar data detected');
  }
  if (ingest.image.length === 0) {
    console.log('⚠️  No image data detected; every radar time-frame will be unmatched');
  }

  // Analysis
  const result = analyzeDetections(ingest, options.sort ?? false);

  // Category counts
  console.log('📊 Radar categories:');
  for (const summary of summarizeCategories(result.categories)) {
    console.log(`   - ${summary.label}: ${summary.count} entries`);
  }

  // Cross-check summary
  const { comparison } = result;
  console.log(`🔍 Time-frames matched: ${comparison.matched.length}, unmatched: ${comparison.unmatched.length}`);
  console.log(`📊 Overall match percentage: ${comparison.matchPercentage.toFixed(2)}% (${comparison.matchedCount}/${comparison.totalCount})`);

  return result;
}
