import fs from 'fs-extra';
import path from 'path';
import { matchTimestamp } from '../parsing/timestamp';
import { parseRecords } from '../parsing/record-parser';
import { findLogFiles } from '../utils/file';
import type {
  ImageDetection,
  IngestResult,
  IngestStats,
  RadarDetection,
  Timestamp,
  WarningHandler
} from '../types';

type TimestampContext =
  | { kind: 'none' }
  | { kind: 'active'; timestamp: Timestamp };

interface FoldState {
  context: TimestampContext;
  result: IngestResult;
}

export function emptyStats(): IngestStats {
  return {
    files: 0,
    failedFiles: 0,
    lines: 0,
    radar: 0,
    image: 0,
    droppedWithoutTimestamp: 0,
    ignoredLines: 0,
    warnings: 0
  };
}

function mergeStats(into: IngestStats, from: IngestStats): void {
  into.files += from.files;
  into.failedFiles += from.failedFiles;
  into.lines += from.lines;
  into.radar += from.radar;
  into.image += from.image;
  into.droppedWithoutTimestamp += from.droppedWithoutTimestamp;
  into.ignoredLines += from.ignoredLines;
  into.warnings += from.warnings;
}

const defaultWarning: WarningHandler = message => console.warn(`⚠️  ${message}`);

/**
 * Reads one file's lines. The timestamp context starts empty for every call and
 * only lives for the duration of the fold.
 */
export function ingestLines(lines: string[], file: string, onWarning: WarningHandler = defaultWarning): IngestResult {
  const initial: FoldState = {
    context: { kind: 'none' },
    result: { radar: [], image: [], stats: emptyStats() }
  };

  const final = lines.reduce<FoldState>((state, rawLine, index) => {
    const lineNumber = index + 1;
    const { result } = state;
    const warn: WarningHandler = message => {
      result.stats.warnings++;
      onWarning(`${file}:${lineNumber}: ${message}`);
    };

    // blank lines do not count and leave the context alone
    const line = rawLine.trim();
    if (line === '') return state;
    result.stats.lines++;

    let context = state.context;
    let content = line;

    // a timestamp opens a new context; text after it is parsed as records
    const header = matchTimestamp(line);
    if (header) {
      context = { kind: 'active', timestamp: header.timestamp };
      if (header.rest === '') return { context, result };
      content = header.rest;
    }

    // records
    const records = parseRecords(content, warn);
    if (records.length === 0) {
      if (!header) result.stats.ignoredLines++;
      return { context, result };
    }

    // no timestamp seen yet in this file
    if (context.kind === 'none') {
      result.stats.droppedWithoutTimestamp += records.length;
      warn(`dropped ${records.length} detection(s) before any timestamp`);
      return { context, result };
    }

    // stamp and route by sensor
    const source = { file, line: lineNumber };
    for (const record of records) {
      if (record.sensor === 'radar') {
        const detection: RadarDetection = { ...record, timestamp: context.timestamp, source };
        result.radar.push(detection);
        result.stats.radar++;
      } else {
        const detection: ImageDetection = { ...record, timestamp: context.timestamp, source };
        result.image.push(detection);
        result.stats.image++;
      }
    }

    return { context, result };
  }, initial);

  final.result.stats.files = 1;
  return final.result;
}

export class LogIngestor {
  constructor(private readonly onWarning: WarningHandler = defaultWarning) {}

  async ingestFile(filePath: string): Promise<IngestResult> {
    const text = await fs.readFile(filePath, 'utf-8');
    return ingestLines(text.split(/\r?\n/), path.basename(filePath), this.onWarning);
  }

  /**
   * Ingests every `.txt` file of `folder`, one after another, in enumeration
   * order. A missing folder or a folder without logs is fatal; a file that
   * cannot be read is reported and skipped.
   */
  async ingestFolder(folder: string): Promise<IngestResult> {
    // folder checks
    const exists = await fs.pathExists(folder);
    if (!exists || !(await fs.stat(folder)).isDirectory()) {
      throw new Error(`Input folder does not exist: ${folder}`);
    }

    const files = await findLogFiles(folder);
    if (files.length === 0) {
      throw new Error(`No .txt log files found in: ${folder}`);
    }

    // files in enumeration order; an unreadable one is counted and skipped
    const combined: IngestResult = { radar: [], image: [], stats: emptyStats() };

    for (let i = 0; i < files.length; i++) {
      const filePath = files[i];
      console.log(`📂 Processing file ${i + 1}/${files.length}: ${path.basename(filePath)}`);

      try {
        const result = await this.ingestFile(filePath);
        combined.radar = combined.radar.concat(result.radar);
        combined.image = combined.image.concat(result.image);
        mergeStats(combined.stats, result.stats);
      } catch (error) {
        combined.stats.files++;
        combined.stats.failedFiles++;
        combined.stats.warnings++;
        this.onWarning(`${path.basename(filePath)}: could not be read (${error instanceof Error ? error.message : String(error)})`);
      }
    }

    return combined;
  }
}
