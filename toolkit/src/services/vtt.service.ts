import { promises as fs } from 'fs';
import path from 'path';

import { createLogger, type Logger } from '../logger.js';

const TIMESTAMP_LINE = /\d{2}:\d{2}:\d{2}\.\d{3} --> \d{2}:\d{2}:\d{2}\.\d{3}[^\n]*\n/g;
// Teams cue ids: <uuid>/<n>-<n>
const TEAMS_CUE_ID_LINE =
  /[\da-f]{8}-[\da-f]{4}-[\da-f]{4}-[\da-f]{4}-[\da-f]{12}\/\d+-\d+\n/g;
const NUMERIC_CUE_ID_LINE = /^\d+\n/gm;

const hasSpeaker = (line: string): boolean => {
  const colon = line.indexOf(':');
  return colon !== -1 && line.slice(0, colon).trim() !== '';
};

/**
 * Joins continuation lines onto the speaker line above them, then merges
 * consecutive lines of the same speaker into one `Speaker: text` line.
 */
export const combineSpeakerLines = (content: string): string => {
  const combined: string[] = [];
  let current: string | null = null;

  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (!line) {
      if (current) {
        combined.push(current);
        current = null;
      }
      continue;
    }
    if (hasSpeaker(line)) {
      if (current) combined.push(current);
      current = line;
    } else if (current) {
      current += ` ${line}`;
    } else {
      combined.push(line);
    }
  }
  if (current) combined.push(current);

  const lines: string[] = [];
  let speaker: string | null = null;
  let text: string | null = null;

  for (const line of combined) {
    const colon = line.indexOf(':');
    if (colon === -1) {
      if (text) lines.push(`${speaker}: ${text}`);
      lines.push(line);
      speaker = null;
      text = null;
      continue;
    }

    const lineSpeaker = line.slice(0, colon).trim();
    const lineText = line.slice(colon + 1).trim();
    if (text !== null && lineSpeaker === speaker) {
      text += ` ${lineText}`;
    } else {
      if (text) lines.push(`${speaker}: ${text}`);
      speaker = lineSpeaker;
      text = lineText;
    }
  }
  if (text) lines.push(`${speaker}: ${text}`);

  return lines.join('\n');
};

export const cleanVttContent = (content: string, baseName: string): string => {
  const stripped = content
    .replace(/\r\n?/g, '\n')
    .replaceAll('WEBVTT', `${baseName} transcript`)
    .replace(TIMESTAMP_LINE, '')
    .replace(TEAMS_CUE_ID_LINE, '')
    .replace(NUMERIC_CUE_ID_LINE, '')
    .replaceAll('</v>', '')
    .replace(/<v\s+/g, '')
    .replaceAll('>', ':');

  return combineSpeakerLines(stripped).replace(/\n\s*\n/g, '\n');
};

export const cleanedOutputPath = (inputPath: string): string => {
  const output = inputPath.replace(/\.vtt$/i, '_cleaned.txt');
  return output === inputPath ? `${inputPath}_cleaned.txt` : output;
};

/**
 * Cleans a VTT file and writes the result next to it.
 *
 * @returns Path of the cleaned transcript.
 */
export const cleanVttFile = async (
  inputPath: string,
  logger: Logger = createLogger('VttCleaner')
): Promise<string> => {
  logger.info('Reading transcript file...');
  const content = await fs.readFile(inputPath, 'utf-8');

  logger.info('Removing timestamps, cue ids and voice tags...');
  const baseName = path.parse(inputPath).name;
  const cleaned = cleanVttContent(content, baseName);

  const outputPath = cleanedOutputPath(inputPath);
  logger.info('Saving cleaned transcript...');
  await fs.writeFile(outputPath, cleaned, 'utf-8');
  return outputPath;
};
