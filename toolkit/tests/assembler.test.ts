import { describe, expect, it } from 'vitest';

import {
  assembleBlocks,
  displayNameFor,
  firstSpokenAt,
  formatTranscript,
  mergeAdjacentBlocks,
} from '../src/transcript/assembler.js';
import type { WordMatch } from '../src/transcript/matcher.js';
import type { SpeakerSegment } from '../src/transcript/types.js';

const segments: SpeakerSegment[] = [
  { speakerLabel: 'spk_1', startTime: 0, endTime: 1 },
  { speakerLabel: 'spk_0', startTime: 1, endTime: 2 },
  { speakerLabel: 'spk_1', startTime: 2, endTime: 3 },
];

const match: WordMatch = {
  assignments: [
    { speakerLabel: 'spk_1', content: 'So,' },
    { speakerLabel: 'spk_0', content: 'Right.' },
    { speakerLabel: 'spk_1', content: 'Then' },
    { speakerLabel: 'spk_1', content: 'go.' },
  ],
  mapping: new Map([
    ['spk_0', ['Right.']],
    ['spk_1', ['So,', 'Then', 'go.']],
  ]),
  unattributed: 0,
};

const names = new Map([
  ['spk_0', 'Bea'],
  ['spk_1', 'Cal'],
]);

describe('assembleBlocks', () => {
  it('emits one block per speaker ordered by first segment', () => {
    expect(assembleBlocks(match, segments, names)).toEqual([
      { displayName: 'Cal', text: 'So, Then go.' },
      { displayName: 'Bea', text: 'Right.' },
    ]);
  });

  it('follows reading order in the turns layout', () => {
    expect(assembleBlocks(match, segments, names, 'turns')).toEqual([
      { displayName: 'Cal', text: 'So,' },
      { displayName: 'Bea', text: 'Right.' },
      { displayName: 'Cal', text: 'Then go.' },
    ]);
  });

  it('puts speakers without segments first and omits speakers without words', () => {
    const withStray: WordMatch = {
      ...match,
      mapping: new Map([
        ['spk_0', ['Right.']],
        ['spk_1', []],
        ['spk_9', ['Hm']],
      ]),
    };
    expect(assembleBlocks(withStray, segments, new Map())).toEqual([
      { displayName: 'spk_9', text: 'Hm' },
      { displayName: 'spk_0', text: 'Right.' },
    ]);
  });

  it('merges neighbours that resolve to the same name', () => {
    const sameName = new Map([
      ['spk_0', 'Host'],
      ['spk_1', 'Host'],
    ]);
    expect(assembleBlocks(match, segments, sameName)).toEqual([
      { displayName: 'Host', text: 'So, Then go. Right.' },
    ]);
  });
});

describe('assembler helpers', () => {
  it('displayNameFor falls back to the label for missing or blank names', () => {
    const partial = new Map([
      ['spk_0', 'Ana'],
      ['spk_1', '  '],
    ]);
    expect(displayNameFor('spk_0', partial)).toBe('Ana');
    expect(displayNameFor('spk_1', partial)).toBe('spk_1');
    expect(displayNameFor('spk_2', partial)).toBe('spk_2');
  });

  it('firstSpokenAt keeps the earliest start per speaker', () => {
    expect(firstSpokenAt(segments)).toEqual(
      new Map([
        ['spk_1', 0],
        ['spk_0', 1],
      ])
    );
  });

  it('mergeAdjacentBlocks leaves its input untouched', () => {
    const blocks = [
      { displayName: 'A', text: 'one' },
      { displayName: 'A', text: 'two' },
      { displayName: 'B', text: 'three' },
    ];
    expect(mergeAdjacentBlocks(blocks)).toEqual([
      { displayName: 'A', text: 'one two' },
      { displayName: 'B', text: 'three' },
    ]);
    expect(blocks[0]).toEqual({ displayName: 'A', text: 'one' });
  });

  it('formatTranscript writes one line per block', () => {
    expect(
      formatTranscript([
        { displayName: 'A', text: 'hi' },
        { displayName: 'B', text: 'hello ' },
      ])
    ).toBe('A: hi\nB: hello');
    expect(formatTranscript([])).toBe('');
  });
});
