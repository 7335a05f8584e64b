/**
 * Audio Reader Service
 *
 * Reads the narrow tag subset the pipeline needs (artist, title, album) and
 * whether lyrics and a cover image are already embedded, using music-metadata.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as mm from 'music-metadata';
import { AudioFormat, EmbeddedTags } from '../../shared/types';

/**
 * Maps a file extension to the AudioFormat type.
 * @returns The AudioFormat string or null if unsupported
 */
export function getAudioFormat(filePath: string): AudioFormat | null {
  switch (path.extname(filePath).toLowerCase()) {
    case '.mp3':
      return 'mp3';
    case '.flac':
      return 'flac';
    case '.m4a':
      return 'm4a';
    case '.mp4':
      return 'mp4';
    case '.wav':
      return 'wav';
    case '.ogg':
      return 'ogg';
    case '.wma':
      return 'wma';
    case '.ape':
      return 'ape';
    default:
      return null;
  }
}

/**
 * Reads the embedded tags of an audio file.
 *
 * @param filePath - Absolute path to the audio file
 * @throws Error if the file does not exist, has an unsupported extension, or
 *         cannot be parsed
 */
export async function readEmbeddedTags(filePath: string): Promise<EmbeddedTags> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }

  if (getAudioFormat(filePath) === null) {
    throw new Error(`Unsupported audio format: ${path.extname(filePath)}`);
  }

  let metadata: mm.IAudioMetadata;
  try {
    // Covers must be parsed to learn whether one is embedded.
    metadata = await mm.parseFile(filePath, { duration: false, skipCovers: false });
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse audio file "${path.basename(filePath)}": ${message}`);
  }

  return mapToEmbeddedTags(metadata);
}

/**
 * Maps music-metadata results to EmbeddedTags. Blank strings count as absent.
 */
export function mapToEmbeddedTags(metadata: mm.IAudioMetadata): EmbeddedTags {
  const common = metadata.common;

  return {
    title: nonBlank(common.title),
    artist: nonBlank(common.artist),
    album: nonBlank(common.album),
    hasLyrics: extractLyrics(common, metadata.native) !== null,
    hasCover: (common.picture?.length ?? 0) > 0,
  };
}

function nonBlank(value: string | undefined): string | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Extracts lyrics from metadata.
 * Checks the common.lyrics field first, then falls back to native USLT tags.
 *
 * @returns Extracted lyrics text or null if not found
 */
export function extractLyrics(
  common: mm.ICommonTagsResult,
  native: mm.IAudioMetadata['native'],
): string | null {
  if (common.lyrics && common.lyrics.length > 0) {
    const joined = common.lyrics.join('\n');
    if (joined.trim().length > 0) return joined;
  }

  // ID3v2 USLT frames
  for (const tagType of Object.keys(native)) {
    const tags = native[tagType];
    if (!tags) continue;

    for (const tag of tags) {
      if (tag.id !== 'USLT' || !tag.value) continue;
      const value: unknown = tag.value;
      if (typeof value === 'string') {
        return value;
      }
      if (typeof value === 'object' && value !== null && 'text' in value) {
        const text: unknown = value.text;
        if (typeof text === 'string') return text;
      }
    }
  }

  return null;
}
