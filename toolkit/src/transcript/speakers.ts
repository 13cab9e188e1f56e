import { SINGLE_SPEAKER_LABEL } from './normalizer.js';
import type { SpeakerLabelMap } from './types.js';

export type AskSpeakerName = (
  label: string,
  position: number,
  total: number
) => Promise<string>;

export const defaultDisplayName = (label: string, index: number): string =>
  label === SINGLE_SPEAKER_LABEL ? SINGLE_SPEAKER_LABEL : `Speaker ${index + 1}`;

export const defaultSpeakerNames = (labels: readonly string[]): SpeakerLabelMap =>
  new Map(labels.map((label, index) => [label, defaultDisplayName(label, index)]));

/**
 * Produces one non-empty display name per label. Without `ask` every label
 * gets its default name; with it, blank answers are asked again.
 */
export async function resolveSpeakerNames(
  labels: readonly string[],
  ask?: AskSpeakerName
): Promise<SpeakerLabelMap> {
  if (!ask) return defaultSpeakerNames(labels);

  const names = new Map<string, string>();
  for (const [index, label] of labels.entries()) {
    let name = '';
    while (!name) {
      name = (await ask(label, index + 1, labels.length)).trim();
    }
    names.set(label, name);
  }
  return names;
}
