import type { ImageDetection, IngestStats, RadarCategory, RadarDetection, TimeFrame, TimelineStep } from './index';

interface ReportHeader {
  version: string;
  inputDir: string;
  createdAt: string;
}

export interface SortedDataReport extends ReportHeader {
  statistics: IngestStats;
  radar: RadarDetection[];
  image: ImageDetection[];
}

export interface CategoryEntry {
  category: RadarCategory;
  label: string;
  count: number;
  detections: RadarDetection[];
}

export interface CategoryReport extends ReportHeader {
  categories: CategoryEntry[];
}

export interface ComparisonReport extends ReportHeader {
  statistics: {
    matchedTimeFrames: number;
    unmatchedTimeFrames: number;
    matchedRadar: number;
    totalRadar: number;
    matchPercentage: number;
  };
  matched: TimeFrame[];
  unmatched: TimeFrame[];
  unmatchedRadar: RadarDetection[];
}

export interface TimelineReport extends ReportHeader {
  steps: TimelineStep[];
}
