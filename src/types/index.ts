/**
 * Normalised `YYYY-MM-DD HH:MM:SS.fff` text. Two timestamps are the same
 * instant exactly when the strings are equal.
 */
export type Timestamp = string;

export type SensorKind = 'radar' | 'image';

export interface SourceLocation {
  file: string;
  line: number;
}

interface RecordBase {
  x: number | null;
  y: number | null;
  confidence: number | null;
}

export interface RadarRecord extends RecordBase {
  sensor: 'radar';
  distance: number | null;
  theta: number | null;
  velocity: number | null;
  power: number | null;
}

export interface ImageRecord extends RecordBase {
  sensor: 'image';
  left: number | null;
  top: number | null;
  width: number | null;
  height: number | null;
}

export type DetectionRecord = RadarRecord | ImageRecord;

interface Attribution {
  timestamp: Timestamp;
  source: SourceLocation;
}

export type RadarDetection = RadarRecord & Attribution;
export type ImageDetection = ImageRecord & Attribution;
export type Detection = RadarDetection | ImageDetection;

export interface TimeFrame {
  timestamp: Timestamp;
  radar: RadarDetection[];
  image: ImageDetection[];
}

export enum RadarCategory {
  Near = 'near',
  Mid = 'mid',
  Far = 'far',
  Stationary = 'stationary'
}

export type CategorizedRadar = Record<RadarCategory, RadarDetection[]>;

export type WarningHandler = (message: string) => void;

export interface MatchResult {
  matched: TimeFrame[];
  unmatched: TimeFrame[];
  matchedCount: number;
  totalCount: number;
  matchPercentage: number;
  // radar detections that found no image partner, in frame order
  unmatchedRadar: RadarDetection[];
}

export interface TimelinePoint {
  x: number | null;
  y: number | null;
}

export interface TimelineStep {
  step: number;
  timestamp: Timestamp;
  radar: TimelinePoint[];
  image: TimelinePoint[];
}

export interface IngestStats {
  files: number;
  failedFiles: number;
  lines: number;
  radar: number;
  image: number;
  droppedWithoutTimestamp: number;
  ignoredLines: number;
  warnings: number;
}

export interface IngestResult {
  radar: RadarDetection[];
  image: ImageDetection[];
  stats: IngestStats;
}

export interface AnalysisOptions {
  inputDir: string;
  outputDir: string;
  sort: boolean;
  dryRun: boolean;
}

export interface AnalysisResult {
  ingest: IngestResult;
  categories: CategorizedRadar;
  comparison: MatchResult;
  timeline: TimelineStep[];
}
