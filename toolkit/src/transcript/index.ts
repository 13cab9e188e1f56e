import { silentLogger, type Logger } from '../logger.js';
import { assembleBlocks, formatTranscript } from './assembler.js';
import {
  assignTo,
  DEFAULT_STRATEGIES,
  matchWords,
  type MatchStrategy,
} from './matcher.js';
import { normalizeResults, SINGLE_SPEAKER_LABEL } from './normalizer.js';
import type {
  NormalizedResults,
  ReconcileResult,
  ReconcileWarning,
  SpeakerLabelMap,
  TranscriptBlock,
  TranscriptLayout,
  WordItem,
} from './types.js';

export interface ReconcileOptions {
  layout?: TranscriptLayout;
  strategies?: readonly MatchStrategy[];
  logger?: Logger;
}

/** Every pronunciation word in item order, punctuation glued to its word. */
const undifferentiatedText = (words: readonly WordItem[]): string => {
  const parts: string[] = [];
  for (const word of words) {
    if (word.type === 'pronunciation') parts.push(word.content);
    else if (parts.length > 0) parts[parts.length - 1] += word.content;
  }
  return parts.join(' ').trim();
};

export const strategiesFor = (normalized: NormalizedResults): readonly MatchStrategy[] =>
  normalized.schema === 'single' ? [assignTo(SINGLE_SPEAKER_LABEL)] : DEFAULT_STRATEGIES;

export function reconcileNormalized(
  normalized: NormalizedResults,
  labelMap: SpeakerLabelMap,
  options: ReconcileOptions = {}
): ReconcileResult {
  const logger = options.logger ?? silentLogger;
  const warnings: ReconcileWarning[] = [...normalized.warnings];

  logger.debug(
    `Schema "${normalized.schema}": ${normalized.words.length} items, ` +
      `${normalized.segments.length} segments, ${normalized.speakerCount} speaker(s).`
  );

  const match = matchWords(
    normalized.words,
    normalized.segments,
    options.strategies ?? strategiesFor(normalized)
  );
  if (match.unattributed > 0) {
    logger.debug(`Dropped ${match.unattributed} word(s) with no label or timing.`);
  }

  let blocks: TranscriptBlock[] = assembleBlocks(
    match,
    normalized.segments,
    labelMap,
    options.layout
  );

  if (blocks.length === 0) {
    const text = undifferentiatedText(normalized.words);
    if (text) {
      blocks = [{ displayName: SINGLE_SPEAKER_LABEL, text }];
      warnings.push({
        code: 'UnattributableWord',
        message: `No word could be attributed to a speaker (${match.unattributed} dropped); output is a single block.`,
      });
    } else {
      warnings.push({ code: 'EmptyResult', message: 'The transcript contains no words.' });
    }
  }

  for (const warning of warnings) {
    logger.warn(warning.message);
  }

  return {
    blocks,
    text: formatTranscript(blocks),
    speakerCount: normalized.speakerCount,
    warnings,
  };
}

/**
 * Turns a raw Transcribe result into speaker-attributed text.
 *
 * @throws InvalidPayloadError when the payload has no `results` object.
 */
export const reconcileTranscript = (
  payload: unknown,
  labelMap: SpeakerLabelMap,
  options: ReconcileOptions = {}
): ReconcileResult => reconcileNormalized(normalizeResults(payload), labelMap, options);

export { InvalidPayloadError } from './errors.js';
export { normalizeResults, SINGLE_SPEAKER_LABEL } from './normalizer.js';
export { resolveSpeakerNames, defaultSpeakerNames } from './speakers.js';
export type { AskSpeakerName } from './speakers.js';
export type {
  NormalizedResults,
  ReconcileResult,
  ReconcileWarning,
  SpeakerLabelMap,
  SpeakerSegment,
  TranscriptBlock,
  TranscriptLayout,
  WordItem,
} from './types.js';
