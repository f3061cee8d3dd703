import path from 'path';
import { sortChronologically } from '../analysis/sorting';
import { summarizeCategories } from '../analysis/radar-categorizer';
import type { AnalysisResult } from '../types';
import type { CategoryReport, ComparisonReport, SortedDataReport, TimelineReport } from '../types/report';
import { resetDirectory, writeJsonFile } from '../utils/file';

export const REPORT_VERSION = '1.0.0';

export const REPORT_FILES = {
  sortedData: 'all_data_sorted.json',
  categories: 'filtered_radar.json',
  comparison: 'radar_image_comparison.json',
  timeline: 'timeline.json'
} as const;

export class ReportExporter {
  constructor(private readonly outputDir: string) {}

  /**
   * Clears results of a previous run.
   */
  async prepare(): Promise<void> {
    await resetDirectory(this.outputDir);
  }

  async writeAll(result: AnalysisResult, inputDir: string, createdAt: Date = new Date()): Promise<string[]> {
    const header = {
      version: REPORT_VERSION,
      inputDir: path.resolve(inputDir),
      createdAt: createdAt.toISOString()
    };

    const sortedData: SortedDataReport = {
      ...header,
      statistics: result.ingest.stats,
      radar: sortChronologically(result.ingest.radar),
      image: sortChronologically(result.ingest.image)
    };

    const categories: CategoryReport = {
      ...header,
      categories: summarizeCategories(result.categories).map(summary => ({
        ...summary,
        detections: result.categories[summary.category]
      }))
    };

    const { comparison } = result;
    const comparisonReport: ComparisonReport = {
      ...header,
      statistics: {
        matchedTimeFrames: comparison.matched.length,
        unmatchedTimeFrames: comparison.unmatched.length,
        matchedRadar: comparison.matchedCount,
        totalRadar: comparison.totalCount,
        matchPercentage: comparison.matchPercentage
      },
      matched: comparison.matched,
      unmatched: comparison.unmatched,
      unmatchedRadar: comparison.unmatchedRadar
    };

    const timeline: TimelineReport = { ...header, steps: result.timeline };

    const written: Array<[string, unknown]> = [
      [REPORT_FILES.sortedData, sortedData],
      [REPORT_FILES.categories, categories],
      [REPORT_FILES.comparison, comparisonReport],
      [REPORT_FILES.timeline, timeline]
    ];

    const paths: string[] = [];
    for (const [fileName, document] of written) {
      const filePath = path.join(this.outputDir, fileName);
      await writeJsonFile(filePath, document);
      paths.push(filePath);
    }
    return paths;
  }
}
