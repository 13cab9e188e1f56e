import { InvalidPayloadError } from './errors.js';
import type {
  NormalizedResults,
  ReconcileWarning,
  SpeakerSchema,
  SpeakerSegment,
  WordItem,
} from './types.js';

/** Label given to every word when the payload carries no speaker data. */
export const SINGLE_SPEAKER_LABEL = 'Speaker';

type RawRecord = Record<string, unknown>;

/**
 * The `speaker_labels` layouts AWS Transcribe has produced over time,
 * plus the two cases where nothing usable is there.
 */
type SpeakerLabelsShape =
  | { kind: 'counted'; count: number; segments: unknown[] }
  | { kind: 'uncounted'; segments: unknown[] }
  | { kind: 'list'; count?: number; segments: unknown[] }
  | { kind: 'absent' }
  | { kind: 'unrecognized'; reason: string };

const isRecord = (value: unknown): value is RawRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toSeconds = (value: unknown): number | undefined => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
};

const toLabel = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim() !== '' ? value : undefined;

const toCount = (value: unknown): number | undefined => {
  const parsed = toSeconds(value);
  return parsed !== undefined && Number.isInteger(parsed) && parsed > 0
    ? parsed
    : undefined;
};

const parseItem = (raw: unknown): WordItem | undefined => {
  if (!isRecord(raw)) return undefined;

  let content: string | undefined;
  const alternatives: unknown = raw.alternatives;
  if (Array.isArray(alternatives)) {
    const first: unknown = alternatives[0];
    if (isRecord(first) && typeof first.content === 'string') content = first.content;
  }
  if (content === undefined && typeof raw.content === 'string') {
    content = raw.content;
  }
  if (content === undefined) return undefined;

  return {
    type: raw.type === 'punctuation' ? 'punctuation' : 'pronunciation',
    content,
    startTime: toSeconds(raw.start_time),
    endTime: toSeconds(raw.end_time),
    speakerLabel: toLabel(raw.speaker_label),
  };
};

export const detectSpeakerLabelsShape = (raw: unknown): SpeakerLabelsShape => {
  if (raw === undefined || raw === null) return { kind: 'absent' };

  if (Array.isArray(raw)) {
    const first: unknown = raw[0];
    if (isRecord(first) && (Array.isArray(first.segments) || 'speakers' in first)) {
      return {
        kind: 'list',
        count: toCount(first.speakers),
        segments: Array.isArray(first.segments) ? first.segments : [],
      };
    }
    return {
      kind: 'unrecognized',
      reason: 'speaker_labels list is empty or its first entry has no segments',
    };
  }

  if (isRecord(raw)) {
    if (!Array.isArray(raw.segments)) {
      return { kind: 'unrecognized', reason: 'speaker_labels object has no segments list' };
    }
    const count = toCount(raw.speakers_count ?? raw.speakers);
    return count === undefined
      ? { kind: 'uncounted', segments: raw.segments }
      : { kind: 'counted', count, segments: raw.segments };
  }

  return { kind: 'unrecognized', reason: `speaker_labels is a ${typeof raw}` };
};

const parseSegments = (
  rawSegments: unknown[]
): { segments: SpeakerSegment[]; malformed: number } => {
  const segments: SpeakerSegment[] = [];
  let malformed = 0;

  for (const raw of rawSegments) {
    if (!isRecord(raw)) {
      malformed++;
      continue;
    }
    const speakerLabel = toLabel(raw.speaker_label);
    const startTime = toSeconds(raw.start_time);
    const endTime = toSeconds(raw.end_time);
    if (
      speakerLabel === undefined ||
      startTime === undefined ||
      endTime === undefined ||
      startTime > endTime
    ) {
      malformed++;
      continue;
    }
    segments.push({ speakerLabel, startTime, endTime });
  }

  return { segments, malformed };
};

/**
 * Groups consecutive labelled pronunciation items into segments spanning the
 * first item's start to the last item's end.
 */
export const segmentsFromItems = (words: readonly WordItem[]): SpeakerSegment[] => {
  const segments: SpeakerSegment[] = [];
  let current: { speakerLabel: string; startTime: number; endTime: number } | null = null;

  for (const word of words) {
    if (
      word.type !== 'pronunciation' ||
      word.speakerLabel === undefined ||
      word.startTime === undefined ||
      word.endTime === undefined
    ) {
      continue;
    }
    if (current && current.speakerLabel === word.speakerLabel) {
      current.endTime = Math.max(current.endTime, word.endTime);
      continue;
    }
    if (current) segments.push(current);
    current = {
      speakerLabel: word.speakerLabel,
      startTime: word.startTime,
      endTime: Math.max(word.startTime, word.endTime),
    };
  }
  if (current) segments.push(current);

  return segments;
};

const distinctLabels = (labels: Iterable<string | undefined>): string[] => {
  const seen = new Set<string>();
  for (const label of labels) {
    if (label !== undefined) seen.add(label);
  }
  return [...seen];
};

/**
 * Resolves a raw Transcribe result into words, segments and speaker count,
 * whichever `speaker_labels` layout it uses.
 *
 * @throws InvalidPayloadError when the payload has no `results` object.
 */
export function normalizeResults(payload: unknown): NormalizedResults {
  if (!isRecord(payload) || !isRecord(payload.results)) {
    throw new InvalidPayloadError('Transcript payload has no "results" object.');
  }

  const results = payload.results;
  const warnings: ReconcileWarning[] = [];
  const words: WordItem[] = [];
  if (Array.isArray(results.items)) {
    for (const raw of results.items) {
      const word = parseItem(raw);
      if (word) words.push(word);
    }
  }

  const itemLabels = distinctLabels(
    words.filter((word) => word.type === 'pronunciation').map((word) => word.speakerLabel)
  );
  const shape = detectSpeakerLabelsShape(results.speaker_labels);

  if (shape.kind === 'unrecognized') {
    warnings.push({
      code: 'AmbiguousSchema',
      message: `Unrecognized speaker data (${shape.reason}); falling back.`,
    });
  }

  if (shape.kind === 'counted' || shape.kind === 'uncounted' || shape.kind === 'list') {
    const { segments, malformed } = parseSegments(shape.segments);
    if (malformed > 0) {
      warnings.push({
        code: 'MalformedSegment',
        message: `Skipped ${malformed} malformed speaker segment(s).`,
      });
    }
    if (segments.length > 0) {
      const segmentLabels = distinctLabels(segments.map((segment) => segment.speakerLabel));
      const explicitCount = shape.kind === 'uncounted' ? undefined : shape.count;
      return {
        schema: shape.kind,
        words,
        segments,
        speakerCount: explicitCount ?? segmentLabels.length,
        speakerLabels: distinctLabels([...segmentLabels, ...itemLabels]),
        warnings,
      };
    }
  }

  let schema: SpeakerSchema = 'single';
  let segments: SpeakerSegment[] = [];
  let speakerLabels = [SINGLE_SPEAKER_LABEL];

  if (itemLabels.length > 0) {
    schema = 'itemLabels';
    segments = segmentsFromItems(words);
    speakerLabels = distinctLabels([
      ...segments.map((segment) => segment.speakerLabel),
      ...itemLabels,
    ]);
    warnings.push({
      code: 'SegmentsReconstructed',
      message: 'No speaker segments found; reconstructed them from item labels.',
    });
  }

  return {
    schema,
    words,
    segments,
    speakerCount: speakerLabels.length,
    speakerLabels,
    warnings,
  };
}
