export type WordItemType = 'pronunciation' | 'punctuation';

export interface WordItem {
  readonly type: WordItemType;
  readonly content: string;
  /** Seconds. Absent for punctuation. */
  readonly startTime?: number;
  readonly endTime?: number;
  readonly speakerLabel?: string;
}

export interface SpeakerSegment {
  readonly speakerLabel: string;
  readonly startTime: number;
  readonly endTime: number;
}

/** Raw speaker label (e.g. `spk_0`) to the name shown in the transcript. */
export type SpeakerLabelMap = ReadonlyMap<string, string>;

export interface TranscriptBlock {
  displayName: string;
  text: string;
}

/**
 * Which `speaker_labels` layout the payload used, resolved once while
 * normalizing.
 */
export type SpeakerSchema =
  | 'counted'
  | 'uncounted'
  | 'list'
  | 'itemLabels'
  | 'single';

export type ReconcileWarningCode =
  | 'AmbiguousSchema'
  | 'MalformedSegment'
  | 'SegmentsReconstructed'
  | 'UnattributableWord'
  | 'EmptyResult';

export interface ReconcileWarning {
  code: ReconcileWarningCode;
  message: string;
}

export interface NormalizedResults {
  readonly schema: SpeakerSchema;
  readonly words: readonly WordItem[];
  readonly segments: readonly SpeakerSegment[];
  readonly speakerCount: number;
  /** Distinct labels in order of first appearance. */
  readonly speakerLabels: readonly string[];
  readonly warnings: readonly ReconcileWarning[];
}

export type TranscriptLayout = 'speaker' | 'turns';

export interface ReconcileResult {
  blocks: TranscriptBlock[];
  text: string;
  speakerCount: number;
  warnings: ReconcileWarning[];
}
