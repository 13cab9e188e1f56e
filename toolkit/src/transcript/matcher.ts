import type { SpeakerSegment, WordItem } from './types.js';

/**
 * One tier of speaker attribution. Returns the speaker label for the word or
 * `undefined` to let the next strategy try.
 */
export interface MatchStrategy {
  readonly name: string;
  match(word: WordItem, segments: readonly SpeakerSegment[]): string | undefined;
}

export interface AttributedWord {
  speakerLabel: string;
  content: string;
}

export interface WordMatch {
  /** Pronunciation words in reading order, punctuation glued on. */
  assignments: AttributedWord[];
  mapping: Map<string, string[]>;
  unattributed: number;
}

export const midpointOf = (word: WordItem): number | undefined =>
  word.startTime === undefined || word.endTime === undefined
    ? undefined
    : (word.startTime + word.endTime) / 2;

export const distanceToSegment = (time: number, segment: SpeakerSegment): number => {
  if (time < segment.startTime) return segment.startTime - time;
  if (time > segment.endTime) return time - segment.endTime;
  return 0;
};

export const directLabel: MatchStrategy = {
  name: 'directLabel',
  match: (word) => word.speakerLabel,
};

// Overlapping segments: the first one declared wins. A deterministic default,
// not a statement about which speaker actually talked.
export const containment: MatchStrategy = {
  name: 'containment',
  match(word, segments) {
    const midpoint = midpointOf(word);
    if (midpoint === undefined) return undefined;
    const hit = segments.find(
      (segment) => segment.startTime <= midpoint && midpoint <= segment.endTime
    );
    return hit?.speakerLabel;
  },
};

export const nearestSegment: MatchStrategy = {
  name: 'nearestSegment',
  match(word, segments) {
    const midpoint = midpointOf(word);
    if (midpoint === undefined) return undefined;

    const closest = new Map<string, number>();
    for (const segment of segments) {
      const distance = distanceToSegment(midpoint, segment);
      const known = closest.get(segment.speakerLabel);
      if (known === undefined || distance < known) {
        closest.set(segment.speakerLabel, distance);
      }
    }

    let best: string | undefined;
    let bestDistance = Infinity;
    for (const [label, distance] of closest) {
      if (distance < bestDistance) {
        best = label;
        bestDistance = distance;
      }
    }
    return best;
  },
};

export const assignTo = (speakerLabel: string): MatchStrategy => ({
  name: `assignTo(${speakerLabel})`,
  match: () => speakerLabel,
});

export const DEFAULT_STRATEGIES: readonly MatchStrategy[] = [
  directLabel,
  containment,
  nearestSegment,
];

export const attributeWord = (
  word: WordItem,
  segments: readonly SpeakerSegment[],
  strategies: readonly MatchStrategy[]
): string | undefined => {
  for (const strategy of strategies) {
    const label = strategy.match(word, segments);
    if (label !== undefined) return label;
  }
  return undefined;
};

/**
 * Attributes every pronunciation word to one speaker. Words no strategy can
 * place are dropped and counted in `unattributed`.
 */
export function matchWords(
  words: readonly WordItem[],
  segments: readonly SpeakerSegment[],
  strategies: readonly MatchStrategy[] = DEFAULT_STRATEGIES
): WordMatch {
  const assignments: AttributedWord[] = [];
  let unattributed = 0;
  let previous: AttributedWord | undefined;

  for (const word of words) {
    if (word.type === 'punctuation') {
      if (previous) previous.content += word.content;
      continue;
    }

    const speakerLabel = attributeWord(word, segments, strategies);
    if (speakerLabel === undefined) {
      unattributed++;
      previous = undefined;
      continue;
    }

    previous = { speakerLabel, content: word.content };
    assignments.push(previous);
  }

  const mapping = new Map<string, string[]>();
  for (const { speakerLabel, content } of assignments) {
    const list = mapping.get(speakerLabel);
    if (list) list.push(content);
    else mapping.set(speakerLabel, [content]);
  }

  return { assignments, mapping, unattributed };
}
