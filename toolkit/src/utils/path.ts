import { promises as fs } from 'fs';

const exists = (candidate: string): Promise<boolean> =>
  fs.access(candidate).then(
    () => true,
    () => false
  );

/**
 * Spellings of a pasted path to try, in order: as typed, with the shell
 * escapes for spaces and parentheses undone, then with every escape undone.
 */
export const pathCandidates = (input: string): string[] => {
  const cleaned = input
    .trim()
    .replace(/^['"]+|['"]+$/g, '')
    .replaceAll('\\\\', '\\');

  const candidates = [
    cleaned,
    cleaned.replaceAll('\\ ', ' ').replaceAll('\\(', '(').replaceAll('\\)', ')'),
    cleaned.replace(/\\(.)/g, '$1'),
  ].map((candidate) => candidate.trim());

  return [...new Set(candidates)].filter((candidate) => candidate !== '');
};

/**
 * Resolves a user-typed file path (quoted, shell-escaped or dragged in from a
 * file manager) to one that exists.
 */
export const sanitizePath = async (input: string): Promise<string> => {
  for (const candidate of pathCandidates(input)) {
    if (await exists(candidate)) return candidate;
  }
  throw new Error('Could not find the file. Please ensure the path is correct and try again.');
};
