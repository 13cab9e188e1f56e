import type { WordMatch } from './matcher.js';
import type {
  SpeakerLabelMap,
  SpeakerSegment,
  TranscriptBlock,
  TranscriptLayout,
} from './types.js';

export const displayNameFor = (label: string, labelMap: SpeakerLabelMap): string => {
  const name = labelMap.get(label)?.trim();
  return name ? name : label;
};

/** Earliest segment start per speaker. */
export const firstSpokenAt = (segments: readonly SpeakerSegment[]): Map<string, number> => {
  const starts = new Map<string, number>();
  for (const segment of segments) {
    const known = starts.get(segment.speakerLabel);
    if (known === undefined || segment.startTime < known) {
      starts.set(segment.speakerLabel, segment.startTime);
    }
  }
  return starts;
};

export const mergeAdjacentBlocks = (blocks: readonly TranscriptBlock[]): TranscriptBlock[] => {
  const merged: TranscriptBlock[] = [];
  for (const block of blocks) {
    const last = merged[merged.length - 1];
    if (last && last.displayName === block.displayName) {
      last.text = `${last.text} ${block.text}`;
    } else {
      merged.push({ ...block });
    }
  }
  return merged;
};

const bySpeaker = (
  match: WordMatch,
  segments: readonly SpeakerSegment[],
  labelMap: SpeakerLabelMap
): TranscriptBlock[] => {
  const starts = firstSpokenAt(segments);
  const speakers = [...match.mapping.entries()].filter(([, words]) => words.length > 0);

  // Speakers without segments go first; Array#sort is stable, so equal keys
  // keep first-seen order.
  speakers.sort(([a], [b]) => {
    const startA = starts.get(a);
    const startB = starts.get(b);
    if (startA === startB) return 0;
    if (startA === undefined) return -1;
    if (startB === undefined) return 1;
    return startA - startB;
  });

  return speakers.map(([label, words]) => ({
    displayName: displayNameFor(label, labelMap),
    text: words.join(' '),
  }));
};

const byTurn = (match: WordMatch, labelMap: SpeakerLabelMap): TranscriptBlock[] =>
  match.assignments.map(({ speakerLabel, content }) => ({
    displayName: displayNameFor(speakerLabel, labelMap),
    text: content,
  }));

/**
 * Builds attribution blocks from matched words. `speaker` emits one block
 * per speaker ordered by when they first speak; `turns` follows reading
 * order and starts a block at each change of speaker.
 */
export function assembleBlocks(
  match: WordMatch,
  segments: readonly SpeakerSegment[],
  labelMap: SpeakerLabelMap,
  layout: TranscriptLayout = 'speaker'
): TranscriptBlock[] {
  const blocks =
    layout === 'turns' ? byTurn(match, labelMap) : bySpeaker(match, segments, labelMap);
  return mergeAdjacentBlocks(blocks);
}

export const formatTranscript = (blocks: readonly TranscriptBlock[]): string =>
  blocks
    .map((block) => `${block.displayName}: ${block.text}`)
    .join('\n')
    .trim();
