import type { DetectionRecord, ImageRecord, RadarRecord, SensorKind, WarningHandler } from '../types';

const RADAR_MARKER = /\w*RadarObjInfo\b/;
const IMAGE_MARKER = /\w*ImageObjInfo\b/;
const ANY_MARKER = /\w*(?:Radar|Image)ObjInfo\b/g;

const RAW_BLOCK: Record<SensorKind, RegExp> = {
  radar: /raw=\w*RadarObjRaw\s*\{([^}]*)\}/,
  image: /raw=\w*ImageObjRaw\s*\{([^}]*)\}/
};

const RADAR_RAW_KEYS = ['distance', 'theta', 'velocity', 'power'] as const;
const IMAGE_RAW_KEYS = ['left', 'top', 'width', 'height'] as const;

type RadarRawKey = typeof RADAR_RAW_KEYS[number];
type ImageRawKey = typeof IMAGE_RAW_KEYS[number];

const INTEGER = /^[+-]?\d+$/;

const defaultWarning: WarningHandler = message => console.warn(`⚠️  ${message}`);

function toInteger(text: string): number | null {
  const trimmed = text.trim();
  return INTEGER.test(trimmed) ? parseInt(trimmed, 10) : null;
}

function detectSensor(line: string): SensorKind | null {
  if (RADAR_MARKER.test(line)) return 'radar';
  if (IMAGE_MARKER.test(line)) return 'image';
  return null;
}

/**
 * Scalar keys are matched as whole words, so `velocity=3` never reads as `y=3`.
 */
function extractScalar(line: string, key: string, onWarning: WarningHandler): number | null {
  const match = new RegExp(`(?<![\\w.])${key}=([^,\\s}]*)`).exec(line);
  if (!match) return null;

  const value = toInteger(match[1]);
  if (value === null) {
    onWarning(`field "${key}" is not an integer: "${match[1]}"`);
  }
  return value;
}

/**
 * Reads the `key=value` entries of a raw block. Only keys listed in `keys` are
 * returned; malformed entries are skipped one by one.
 */
function extractRawFields<K extends string>(
  line: string,
  sensor: SensorKind,
  keys: readonly K[],
  onWarning: WarningHandler
): Partial<Record<K, number>> {
  const fields: Partial<Record<K, number>> = {};
  const block = RAW_BLOCK[sensor].exec(line);
  if (!block) return fields;

  for (const entry of block[1].split(',')) {
    const item = entry.trim();
    if (item === '') continue;

    const separator = item.indexOf('=');
    if (separator < 0) {
      onWarning(`raw entry without "=": "${item}"`);
      continue;
    }

    const key = item.slice(0, separator).trim();
    const known = keys.find(k => k === key);
    if (known === undefined) continue;

    const value = toInteger(item.slice(separator + 1));
    if (value === null) {
      onWarning(`raw field "${key}" is not an integer: "${item.slice(separator + 1).trim()}"`);
      continue;
    }
    fields[known] = value;
  }

  return fields;
}

function parseRadar(line: string, onWarning: WarningHandler): RadarRecord {
  const raw = extractRawFields<RadarRawKey>(line, 'radar', RADAR_RAW_KEYS, onWarning);
  return {
    sensor: 'radar',
    x: extractScalar(line, 'x', onWarning),
    y: extractScalar(line, 'y', onWarning),
    confidence: extractScalar(line, 'confidence', onWarning),
    distance: raw.distance ?? null,
    theta: raw.theta ?? null,
    velocity: raw.velocity ?? null,
    power: raw.power ?? null
  };
}

function parseImage(line: string, onWarning: WarningHandler): ImageRecord {
  const raw = extractRawFields<ImageRawKey>(line, 'image', IMAGE_RAW_KEYS, onWarning);
  return {
    sensor: 'image',
    x: extractScalar(line, 'x', onWarning),
    y: extractScalar(line, 'y', onWarning),
    confidence: extractScalar(line, 'confidence', onWarning),
    left: raw.left ?? null,
    top: raw.top ?? null,
    width: raw.width ?? null,
    height: raw.height ?? null
  };
}

/**
 * Parses one detection line. Returns null for lines without a radar or image
 * marker, timestamp lines included. Never throws; anomalies go to `onWarning`.
 */
export function parseRecord(line: string, onWarning: WarningHandler = defaultWarning): DetectionRecord | null {
  const sensor = detectSensor(line);
  if (sensor === 'radar') return parseRadar(line, onWarning);
  if (sensor === 'image') return parseImage(line, onWarning);
  return null;
}

/**
 * Parses every `...ObjInfo {...}` group on a line. Each group is cut from its
 * marker up to the next one; a line with a single group is parsed whole.
 */
export function parseRecords(line: string, onWarning: WarningHandler = defaultWarning): DetectionRecord[] {
  const starts = Array.from(line.matchAll(ANY_MARKER), match => match.index ?? 0);

  if (starts.length <= 1) {
    const record = parseRecord(line, onWarning);
    return record ? [record] : [];
  }

  const records: DetectionRecord[] = [];
  starts.forEach((start, i) => {
    const end = i + 1 < starts.length ? starts[i + 1] : line.length;
    const record = parseRecord(line.slice(start, end), onWarning);
    if (record) records.push(record);
  });
  return records;
}
