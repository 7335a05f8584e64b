/**
 * Tag Writer Service
 *
 * Writes matched basic info, lyrics and front cover art into audio file tags:
 * ID3v2 for MP3 (via node-id3), Vorbis comments plus a PICTURE block for FLAC,
 * iTunes-style ilst items for M4A/MP4 and the comment header of Ogg Vorbis.
 *
 * Key design decisions:
 * - Update mode only: fields not being written are preserved
 * - Does NOT re-encode audio (metadata-only modification)
 * - The rewritten file is committed through a temporary file and a rename, so an
 *   interrupted write leaves the original untouched
 * - WAV, WMA and APE are reported as unsupported rather than partially written
 */

import * as fs from 'fs';
import * as path from 'path';
import NodeID3 from 'node-id3';
import type { AudioFormat } from '../../shared/types';
import { getAudioFormat } from './audioReader';
import { writeFileAtomic } from '../utils/fileScanner';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Metadata fields that can be written to an audio file */
export interface WriteTagsInput {
  /** Song title */
  title?: string;
  /** Primary artist name */
  artist?: string;
  /** Album name */
  album?: string;
  /** Lyrics text (LRC text is stored as-is) */
  lyrics?: string;
  /** Front cover image bytes + MIME type */
  albumArt?: { data: Buffer; mimeType: string };
}

/** Result of a tag write operation */
export interface WriteTagsResult {
  /** Whether the write was successful */
  success: boolean;
  /** The file path (unchanged) */
  filePath: string;
  /** Error message if write failed */
  error: string | null;
}

// ─── Format Detection ─────────────────────────────────────────────────────────

/** Containers this module can write tags into */
const WRITABLE_FORMATS: ReadonlySet<AudioFormat> = new Set<AudioFormat>(['mp3', 'flac', 'm4a', 'mp4', 'ogg']);

/**
 * Whether tags can be written into the file at `filePath`.
 */
export function canWriteTags(filePath: string): boolean {
  const format = getAudioFormat(filePath);
  return format !== null && WRITABLE_FORMATS.has(format);
}

/**
 * Sniffs the image MIME type from its leading bytes. Unknown data is treated as
 * JPEG, the format providers serve covers in.
 */
export function detectImageMimeType(data: Buffer): string {
  if (data.length >= 8 && data.subarray(0, 8).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))) {
    return 'image/png';
  }
  if (data.length >= 3 && data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff) {
    return 'image/jpeg';
  }
  if (data.length >= 6) {
    const signature = data.toString('ascii', 0, 6);
    if (signature === 'GIF87a' || signature === 'GIF89a') return 'image/gif';
  }
  if (data.length >= 12 && data.toString('ascii', 0, 4) === 'RIFF' && data.toString('ascii', 8, 12) === 'WEBP') {
    return 'image/webp';
  }
  return 'image/jpeg';
}

// ─── ID3 Tag Building ─────────────────────────────────────────────────────────

/**
 * Builds a node-id3 compatible tag object from WriteTagsInput.
 */
export function buildId3Tags(input: WriteTagsInput): NodeID3.Tags {
  const tags: NodeID3.Tags = {};

  if (input.title !== undefined) {
    tags.title = input.title;
  }

  if (input.artist !== undefined) {
    tags.artist = input.artist;
  }

  if (input.album !== undefined) {
    tags.album = input.album;
  }

  if (input.lyrics !== undefined) {
    tags.unsynchronisedLyrics = {
      language: 'eng',
      text: input.lyrics,
    };
  }

  if (input.albumArt !== undefined) {
    tags.image = {
      mime: input.albumArt.mimeType,
      type: { id: 3, name: 'front cover' },
      description: 'Front Cover',
      imageBuffer: input.albumArt.data,
    };
  }

  return tags;
}

// ─── MP3 Tag Writing ──────────────────────────────────────────────────────────

/**
 * Writes ID3 tags to an MP3 file in update mode (existing frames that are not
 * being written are preserved).
 */
export async function writeMp3Tags(filePath: string, input: WriteTagsInput): Promise<WriteTagsResult> {
  try {
    const format = getAudioFormat(filePath);
    if (format !== 'mp3') {
      return {
        success: false,
        filePath,
        error: `writeMp3Tags only supports MP3 files, got: ${format ?? 'unknown'}`,
      };
    }

    const original = await fs.promises.readFile(filePath);
    const { mode } = await fs.promises.stat(filePath);
    const updated = NodeID3.update(buildId3Tags(input), original);
    await writeFileAtomic(filePath, updated, { mode: mode & 0o777 });

    return { success: true, filePath, error: null };
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      success: false,
      filePath,
      error: `Failed to write ID3 tags: ${message}`,
    };
  }
}

// ─── FLAC Tag Writing ─────────────────────────────────────────────────────────

// FLAC block type constants
const FLAC_MAGIC = 'fLaC';
const FLAC_BLOCK_TYPE_PADDING = 1;
export const FLAC_BLOCK_TYPE_VORBIS_COMMENT = 4;
export const FLAC_BLOCK_TYPE_PICTURE = 6;

const VORBIS_VENDOR = 'music-sidecar';

export interface FlacBlock {
  type: number;
  data: Buffer;
}

/** Parses FLAC metadata blocks; returns blocks and the byte offset where audio frames begin. */
export function parseFlacBlocks(fileData: Buffer): { blocks: FlacBlock[]; audioOffset: number } {
  if (fileData.length < 4 || fileData.toString('ascii', 0, 4) !== FLAC_MAGIC) {
    throw new Error('Not a valid FLAC file (missing fLaC magic)');
  }
  const blocks: FlacBlock[] = [];
  let offset = 4;
  while (offset + 4 <= fileData.length) {
    const headerByte = fileData[offset];
    const isLast = (headerByte & 0x80) !== 0;
    const type = headerByte & 0x7f;
    const length =
      (fileData[offset + 1] << 16) | (fileData[offset + 2] << 8) | fileData[offset + 3];
    offset += 4;
    if (offset + length > fileData.length) throw new Error('Truncated FLAC metadata block');
    blocks.push({ type, data: Buffer.from(fileData.subarray(offset, offset + length)) });
    offset += length;
    if (isLast) break;
  }
  return { blocks, audioOffset: offset };
}

/** Parses a Vorbis Comment block into a key→values map (keys uppercased). */
export function parseVorbisCommentBlock(data: Buffer): Map<string, string[]> {
  const result = new Map<string, string[]>();
  let offset = 0;
  if (offset + 4 > data.length) return result;
  const vendorLen = data.readUInt32LE(offset);
  offset += 4 + vendorLen;
  if (offset + 4 > data.length) return result;
  const count = data.readUInt32LE(offset);
  offset += 4;
  for (let i = 0; i < count; i++) {
    if (offset + 4 > data.length) break;
    const len = data.readUInt32LE(offset);
    offset += 4;
    if (offset + len > data.length) break;
    const comment = data.subarray(offset, offset + len).toString('utf8');
    offset += len;
    const eqIdx = comment.indexOf('=');
    if (eqIdx < 0) continue;
    const key = comment.slice(0, eqIdx).toUpperCase();
    const value = comment.slice(eqIdx + 1);
    const existing = result.get(key) ?? [];
    existing.push(value);
    result.set(key, existing);
  }
  return result;
}

/** Serialises a key→values map into a Vorbis Comment block buffer. */
export function buildVorbisCommentBlock(comments: Map<string, string[]>): Buffer {
  const vendor = Buffer.from(VORBIS_VENDOR, 'utf8');
  const vendorLen = Buffer.allocUnsafe(4);
  vendorLen.writeUInt32LE(vendor.length, 0);
  const entries: Buffer[] = [];
  let totalCount = 0;
  for (const [key, values] of comments) {
    for (const val of values) {
      const entry = Buffer.from(`${key}=${val}`, 'utf8');
      const lenBuf = Buffer.allocUnsafe(4);
      lenBuf.writeUInt32LE(entry.length, 0);
      entries.push(lenBuf, entry);
      totalCount++;
    }
  }
  const countBuf = Buffer.allocUnsafe(4);
  countBuf.writeUInt32LE(totalCount, 0);
  return Buffer.concat([vendorLen, vendor, countBuf, ...entries]);
}

const PNG_CHANNELS_BY_COLOR_TYPE: Record<number, number> = { 0: 1, 2: 3, 3: 1, 4: 2, 6: 4 };

/** Extracts pixel dimensions from a JPEG or PNG buffer (needed for FLAC PICTURE block). */
function getFlacImageDimensions(
  data: Buffer,
  mimeType: string,
): { width: number; height: number; depth: number } {
  if (mimeType === 'image/png') {
    if (data.length < 26) return { width: 0, height: 0, depth: 0 };
    const channels = PNG_CHANNELS_BY_COLOR_TYPE[data[25]] ?? 3;
    return { width: data.readUInt32BE(16), height: data.readUInt32BE(20), depth: data[24] * channels };
  }

  let i = 2;
  while (i < data.length - 11) {
    if (data[i] !== 0xff) { i++; continue; }
    const marker = data[i + 1];
    if (marker >= 0xc0 && marker <= 0xc3) {
      return {
        width: data.readUInt16BE(i + 7),
        height: data.readUInt16BE(i + 5),
        depth: 8 * data[i + 9],
      };
    }
    if (marker === 0xda) break;
    i += 2 + data.readUInt16BE(i + 2);
  }
  return { width: 0, height: 0, depth: 0 };
}

/** Builds a FLAC METADATA_BLOCK_PICTURE buffer (type 6, front cover = type 3). */
export function buildFlacPictureBlock(imageData: Buffer, mimeType: string): Buffer {
  const { width, height, depth } = getFlacImageDimensions(imageData, mimeType);
  const mimeBytes = Buffer.from(mimeType, 'ascii');
  // 4 (pic type) + 4 (mime len) + mimeBytes + 4 (desc len) + 0 (desc) + 4*4 (dims) + 4 (data len)
  const headerSize = 4 + 4 + mimeBytes.length + 4 + 4 + 4 + 4 + 4 + 4;
  const header = Buffer.allocUnsafe(headerSize);
  let pos = 0;
  header.writeUInt32BE(3, pos); pos += 4;                       // picture type: front cover
  header.writeUInt32BE(mimeBytes.length, pos); pos += 4;
  mimeBytes.copy(header, pos); pos += mimeBytes.length;
  header.writeUInt32BE(0, pos); pos += 4;                       // description length (empty)
  header.writeUInt32BE(width, pos); pos += 4;
  header.writeUInt32BE(height, pos); pos += 4;
  header.writeUInt32BE(depth, pos); pos += 4;
  header.writeUInt32BE(0, pos); pos += 4;                       // indexed colour count
  header.writeUInt32BE(imageData.length, pos);
  return Buffer.concat([header, imageData]);
}

/** Serialises a list of FLAC metadata blocks + audio data back into a complete file buffer. */
export function serializeFlacBlocks(blocks: FlacBlock[], audioData: Buffer): Buffer {
  const parts: Buffer[] = [Buffer.from(FLAC_MAGIC, 'ascii')];
  for (let i = 0; i < blocks.length; i++) {
    const block = blocks[i];
    const isLast = i === blocks.length - 1;
    const header = Buffer.allocUnsafe(4);
    header[0] = (isLast ? 0x80 : 0x00) | (block.type & 0x7f);
    header[1] = (block.data.length >> 16) & 0xff;
    header[2] = (block.data.length >> 8) & 0xff;
    header[3] = block.data.length & 0xff;
    parts.push(header, block.data);
  }
  parts.push(audioData);
  return Buffer.concat(parts);
}

/**
 * Rewrites the metadata blocks of a FLAC file buffer.
 *
 * Existing Vorbis Comment keys not present in `input` are preserved; keys in
 * `input` replace all existing values for that key. The existing PICTURE blocks
 * are replaced only when `input.albumArt` is provided. Old PADDING is dropped.
 */
export function applyFlacTags(fileData: Buffer, input: WriteTagsInput): Buffer {
  const { blocks, audioOffset } = parseFlacBlocks(fileData);
  const audioData = fileData.subarray(audioOffset);

  // ── Vorbis Comment ────────────────────────────────────────────────────
  const vcBlock = blocks.find((b) => b.type === FLAC_BLOCK_TYPE_VORBIS_COMMENT);
  const comments = vcBlock ? parseVorbisCommentBlock(vcBlock.data) : new Map<string, string[]>();

  const setTag = (key: string, value: string | undefined): void => {
    if (value !== undefined) comments.set(key, [value]);
  };
  setTag('TITLE', input.title);
  setTag('ARTIST', input.artist);
  setTag('ALBUM', input.album);
  setTag('LYRICS', input.lyrics);

  // ── Rebuild block list ────────────────────────────────────────────────
  const newBlocks: FlacBlock[] = [];
  for (const block of blocks) {
    if (block.type === FLAC_BLOCK_TYPE_VORBIS_COMMENT) continue;
    if (block.type === FLAC_BLOCK_TYPE_PADDING) continue;
    if (block.type === FLAC_BLOCK_TYPE_PICTURE && input.albumArt) continue;
    newBlocks.push(block);
  }
  newBlocks.push({ type: FLAC_BLOCK_TYPE_VORBIS_COMMENT, data: buildVorbisCommentBlock(comments) });
  if (input.albumArt) {
    newBlocks.push({
      type: FLAC_BLOCK_TYPE_PICTURE,
      data: buildFlacPictureBlock(input.albumArt.data, input.albumArt.mimeType),
    });
  }

  return serializeFlacBlocks(newBlocks, audioData);
}

/**
 * Writes Vorbis Comment tags (and optionally front cover art) to a FLAC file.
 */
export async function writeFlacTags(filePath: string, input: WriteTagsInput): Promise<WriteTagsResult> {
  try {
    const format = getAudioFormat(filePath);
    if (format !== 'flac') {
      return {
        success: false,
        filePath,
        error: `writeFlacTags only supports FLAC files, got: ${format ?? 'unknown'}`,
      };
    }

    const fileData = await fs.promises.readFile(filePath);
    const { mode } = await fs.promises.stat(filePath);
    await writeFileAtomic(filePath, applyFlacTags(fileData, input), { mode: mode & 0o777 });

    return { success: true, filePath, error: null };
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, filePath, error: `Failed to write FLAC tags: ${message}` };
  }
}

// ─── MP4 Tag Writing ──────────────────────────────────────────────────────────

export interface Mp4Atom {
  type: string;
  /** Offset of the atom header in the parsed buffer */
  start: number;
  /** Total size including the header */
  size: number;
  headerSize: number;
}

const MP4_KEY_TITLE = '©nam';
const MP4_KEY_ARTIST = '©ART';
const MP4_KEY_ALBUM = '©alb';
const MP4_KEY_LYRICS = '©lyr';
const MP4_KEY_COVER = 'covr';

const MP4_DATA_UTF8 = 1;
const MP4_DATA_JPEG = 13;
const MP4_DATA_PNG = 14;

/** Containers between moov and the chunk offset tables */
const MP4_SAMPLE_TABLE_PATH = ['trak', 'mdia', 'minf', 'stbl'];

/** Parses the sibling atoms in `data[start, end)`. */
export function parseMp4Atoms(data: Buffer, start: number = 0, end: number = data.length): Mp4Atom[] {
  const atoms: Mp4Atom[] = [];
  let offset = start;
  while (offset + 8 <= end) {
    const type = data.toString('latin1', offset + 4, offset + 8);
    let size = data.readUInt32BE(offset);
    let headerSize = 8;
    if (size === 1) {
      if (offset + 16 > end) throw new Error(`Truncated MP4 atom: ${type}`);
      size = Number(data.readBigUInt64BE(offset + 8));
      headerSize = 16;
    } else if (size === 0) {
      size = end - offset;
    }
    if (size < headerSize || offset + size > end) throw new Error(`Truncated MP4 atom: ${type}`);
    atoms.push({ type, start: offset, size, headerSize });
    offset += size;
  }
  return atoms;
}

function mp4Children(data: Buffer, parent: Mp4Atom, skip: number = 0): Mp4Atom[] {
  return parseMp4Atoms(data, parent.start + parent.headerSize + skip, parent.start + parent.size);
}

function mp4AtomBytes(data: Buffer, atom: Mp4Atom): Buffer {
  return data.subarray(atom.start, atom.start + atom.size);
}

export function buildMp4Atom(type: string, ...payload: Buffer[]): Buffer {
  const header = Buffer.alloc(8);
  header.writeUInt32BE(8 + payload.reduce((total, part) => total + part.length, 0), 0);
  header.write(type, 4, 'latin1');
  return Buffer.concat([header, ...payload]);
}

function buildMp4Item(key: string, dataType: number, value: Buffer): Buffer {
  const typeAndLocale = Buffer.alloc(8);
  typeAndLocale.writeUInt32BE(dataType, 0);
  return buildMp4Atom(key, buildMp4Atom('data', typeAndLocale, value));
}

/** The metadata handler an ilst needs beside it: `mdir`, reserved `appl` */
function buildMp4HandlerAtom(): Buffer {
  const body = Buffer.alloc(25);
  body.write('mdir', 8, 'latin1');
  body.write('appl', 12, 'latin1');
  return buildMp4Atom('hdlr', body);
}

/**
 * Rebuilds `children` with the first atom of `type` replaced (later ones
 * dropped), appending the replacement when there is none.
 */
function replaceMp4Child(data: Buffer, children: Mp4Atom[], type: string, replacement: Buffer): Buffer[] {
  const parts: Buffer[] = [];
  let replaced = false;
  for (const child of children) {
    if (child.type !== type) {
      parts.push(mp4AtomBytes(data, child));
    } else if (!replaced) {
      parts.push(replacement);
      replaced = true;
    }
  }
  if (!replaced) parts.push(replacement);
  return parts;
}

function buildMp4Items(input: WriteTagsInput): Map<string, Buffer> {
  const items = new Map<string, Buffer>();
  const setText = (key: string, value: string | undefined): void => {
    if (value !== undefined) items.set(key, buildMp4Item(key, MP4_DATA_UTF8, Buffer.from(value, 'utf8')));
  };
  setText(MP4_KEY_TITLE, input.title);
  setText(MP4_KEY_ARTIST, input.artist);
  setText(MP4_KEY_ALBUM, input.album);
  setText(MP4_KEY_LYRICS, input.lyrics);
  if (input.albumArt) {
    const dataType = input.albumArt.mimeType === 'image/png' ? MP4_DATA_PNG : MP4_DATA_JPEG;
    items.set(MP4_KEY_COVER, buildMp4Item(MP4_KEY_COVER, dataType, input.albumArt.data));
  }
  return items;
}

/**
 * Adds `delta` to every stco/co64 entry at or past `threshold`, in place.
 * Entries before the threshold point at media that did not move.
 */
function shiftChunkOffsets(moov: Buffer, threshold: number, delta: number): void {
  const visit = (atoms: Mp4Atom[], depth: number): void => {
    for (const atom of atoms) {
      if (depth < MP4_SAMPLE_TABLE_PATH.length) {
        if (atom.type === MP4_SAMPLE_TABLE_PATH[depth]) visit(mp4Children(moov, atom), depth + 1);
        continue;
      }
      if (atom.type !== 'stco' && atom.type !== 'co64') continue;

      const body = atom.start + atom.headerSize;
      const entrySize = atom.type === 'stco' ? 4 : 8;
      const count = moov.readUInt32BE(body + 4);
      if (body + 8 + count * entrySize > atom.start + atom.size) {
        throw new Error(`Truncated MP4 chunk offset table: ${atom.type}`);
      }
      for (let i = 0; i < count; i++) {
        const pos = body + 8 + i * entrySize;
        if (atom.type === 'stco') {
          const value = moov.readUInt32BE(pos);
          if (value < threshold) continue;
          const shifted = value + delta;
          if (shifted > 0xffffffff) throw new Error('Chunk offset no longer fits in a 32-bit stco table');
          moov.writeUInt32BE(shifted, pos);
        } else {
          const value = moov.readBigUInt64BE(pos);
          if (value < BigInt(threshold)) continue;
          moov.writeBigUInt64BE(value + BigInt(delta), pos);
        }
      }
    }
  };
  visit(parseMp4Atoms(moov, 8), 0);
}

/**
 * Rewrites the ilst of an MP4 file buffer (moov/udta/meta/ilst), creating the
 * path when missing.
 *
 * Items not in `input` are preserved; a cover replaces every existing `covr`.
 * When the moov atom grows or shrinks, chunk offsets pointing past it are
 * moved by the same amount so the media data stays addressable.
 */
export function applyMp4Tags(fileData: Buffer, input: WriteTagsInput): Buffer {
  if (fileData.length < 8 || fileData.toString('latin1', 4, 8) !== 'ftyp') {
    throw new Error('Not a valid MP4 file (missing ftyp atom)');
  }
  const moov = parseMp4Atoms(fileData).find((atom) => atom.type === 'moov');
  if (!moov) throw new Error('Not a valid MP4 file (missing moov atom)');

  const moovChildren = mp4Children(fileData, moov);
  const udta = moovChildren.find((atom) => atom.type === 'udta');
  const udtaChildren = udta ? mp4Children(fileData, udta) : [];
  const meta = udtaChildren.find((atom) => atom.type === 'meta');
  // meta is a full atom: four bytes of version and flags precede its children
  const metaChildren = meta ? mp4Children(fileData, meta, 4) : [];
  const ilst = metaChildren.find((atom) => atom.type === 'ilst');
  const items = ilst ? mp4Children(fileData, ilst) : [];

  const replacements = buildMp4Items(input);
  const newIlst = buildMp4Atom(
    'ilst',
    ...items.filter((item) => !replacements.has(item.type)).map((item) => mp4AtomBytes(fileData, item)),
    ...replacements.values(),
  );

  const metaParts = replaceMp4Child(fileData, metaChildren, 'ilst', newIlst);
  if (!metaChildren.some((atom) => atom.type === 'hdlr')) metaParts.unshift(buildMp4HandlerAtom());
  const newMeta = buildMp4Atom('meta', Buffer.alloc(4), ...metaParts);
  const newUdta = buildMp4Atom('udta', ...replaceMp4Child(fileData, udtaChildren, 'meta', newMeta));
  const newMoov = buildMp4Atom('moov', ...replaceMp4Child(fileData, moovChildren, 'udta', newUdta));

  const moovEnd = moov.start + moov.size;
  const delta = newMoov.length - moov.size;
  if (delta !== 0) shiftChunkOffsets(newMoov, moovEnd, delta);

  return Buffer.concat([fileData.subarray(0, moov.start), newMoov, fileData.subarray(moovEnd)]);
}

/**
 * Writes ilst items (and optionally front cover art) to an M4A/MP4 file.
 */
export async function writeMp4Tags(filePath: string, input: WriteTagsInput): Promise<WriteTagsResult> {
  try {
    const format = getAudioFormat(filePath);
    if (format !== 'm4a' && format !== 'mp4') {
      return {
        success: false,
        filePath,
        error: `writeMp4Tags only supports M4A and MP4 files, got: ${format ?? 'unknown'}`,
      };
    }

    const fileData = await fs.promises.readFile(filePath);
    const { mode } = await fs.promises.stat(filePath);
    await writeFileAtomic(filePath, applyMp4Tags(fileData, input), { mode: mode & 0o777 });

    return { success: true, filePath, error: null };
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, filePath, error: `Failed to write MP4 tags: ${message}` };
  }
}

// ─── Ogg Vorbis Tag Writing ───────────────────────────────────────────────────

const OGG_CAPTURE_PATTERN = 'OggS';
const OGG_HEADER_SIZE = 27;
const OGG_FLAG_CONTINUED = 0x01;
const OGG_FLAG_FIRST_PAGE = 0x02;
const OGG_MAX_SEGMENTS = 255;

const VORBIS_PACKET_IDENTIFICATION = 1;
const VORBIS_PACKET_COMMENT = 3;
const VORBIS_PACKET_SETUP = 5;

export interface OggPage {
  headerType: number;
  /** Raw 64-bit granule position */
  granulePosition: Buffer;
  serial: number;
  sequence: number;
  /** Lacing values */
  segments: number[];
  body: Buffer;
}

const OGG_CRC_TABLE = buildOggCrcTable();

function buildOggCrcTable(): Uint32Array {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i++) {
    let r = i << 24;
    for (let bit = 0; bit < 8; bit++) {
      r = (r & 0x80000000) !== 0 ? (r << 1) ^ 0x04c11db7 : r << 1;
    }
    table[i] = r >>> 0;
  }
  return table;
}

/** CRC-32 as Ogg computes it: polynomial 0x04c11db7, zero initial value, no reflection. */
export function oggCrc32(data: Buffer): number {
  let crc = 0;
  for (const byte of data) {
    crc = ((crc << 8) ^ OGG_CRC_TABLE[((crc >>> 24) ^ byte) & 0xff]) >>> 0;
  }
  return crc;
}

export function parseOggPages(data: Buffer): OggPage[] {
  if (data.length < 4 || data.toString('ascii', 0, 4) !== OGG_CAPTURE_PATTERN) {
    throw new Error('Not a valid Ogg file (missing OggS capture pattern)');
  }
  const pages: OggPage[] = [];
  let offset = 0;
  while (offset < data.length) {
    if (offset + OGG_HEADER_SIZE > data.length || data.toString('ascii', offset, offset + 4) !== OGG_CAPTURE_PATTERN) {
      throw new Error(`Invalid Ogg page at byte ${offset}`);
    }
    const tableEnd = offset + OGG_HEADER_SIZE + data[offset + 26];
    if (tableEnd > data.length) throw new Error('Truncated Ogg page');
    const segments = Array.from(data.subarray(offset + OGG_HEADER_SIZE, tableEnd));
    const bodyEnd = tableEnd + segments.reduce((total, lacing) => total + lacing, 0);
    if (bodyEnd > data.length) throw new Error('Truncated Ogg page');

    pages.push({
      headerType: data[offset + 5],
      granulePosition: Buffer.from(data.subarray(offset + 6, offset + 14)),
      serial: data.readUInt32LE(offset + 14),
      sequence: data.readUInt32LE(offset + 18),
      segments,
      body: Buffer.from(data.subarray(tableEnd, bodyEnd)),
    });
    offset = bodyEnd;
  }
  return pages;
}

/** Serialises a page, computing its checksum. */
export function serializeOggPage(page: OggPage): Buffer {
  const header = Buffer.alloc(OGG_HEADER_SIZE + page.segments.length);
  header.write(OGG_CAPTURE_PATTERN, 0, 'ascii');
  header[5] = page.headerType;
  page.granulePosition.copy(header, 6);
  header.writeUInt32LE(page.serial, 14);
  header.writeUInt32LE(page.sequence, 18);
  header[26] = page.segments.length;
  Buffer.from(page.segments).copy(header, OGG_HEADER_SIZE);

  const bytes = Buffer.concat([header, page.body]);
  bytes.writeUInt32LE(oggCrc32(bytes), 22);
  return bytes;
}

function isVorbisPacket(packet: Buffer, packetType: number): boolean {
  return packet.length >= 7 && packet[0] === packetType && packet.toString('ascii', 1, 7) === 'vorbis';
}

/**
 * Reassembles the three Vorbis header packets.
 *
 * @returns The packets and how many leading pages hold them
 * @throws Error if the stream is not Vorbis, is multiplexed, or audio data
 *         shares a page with the setup header
 */
export function splitVorbisHeaders(pages: OggPage[]): { packets: Buffer[]; headerPageCount: number } {
  const packets: Buffer[] = [];
  let pending: Buffer[] = [];
  for (let p = 0; p < pages.length; p++) {
    const page = pages[p];
    if (page.serial !== pages[0].serial) throw new Error('Multiplexed Ogg streams are not supported');

    let pos = 0;
    for (let i = 0; i < page.segments.length; i++) {
      const lacing = page.segments[i];
      pending.push(page.body.subarray(pos, pos + lacing));
      pos += lacing;
      if (lacing === OGG_MAX_SEGMENTS) continue;

      packets.push(Buffer.concat(pending));
      pending = [];
      if (packets.length === 1 && !isVorbisPacket(packets[0], VORBIS_PACKET_IDENTIFICATION)) {
        throw new Error('Only Ogg Vorbis streams are supported');
      }
      if (packets.length === 3) {
        if (!isVorbisPacket(packets[1], VORBIS_PACKET_COMMENT) || !isVorbisPacket(packets[2], VORBIS_PACKET_SETUP)) {
          throw new Error('Malformed Vorbis header packets');
        }
        if (i !== page.segments.length - 1) throw new Error('Vorbis setup header shares its page with audio data');
        return { packets, headerPageCount: p + 1 };
      }
    }
  }
  throw new Error('Truncated Vorbis header packets');
}

/** Lays `packets` out over fresh pages, starting a new page for the first. */
function paginatePackets(packets: Buffer[], serial: number, firstSequence: number): OggPage[] {
  const pages: OggPage[] = [];
  let segments: number[] = [];
  let parts: Buffer[] = [];
  let continued = false;

  const flush = (nextContinued: boolean): void => {
    // Pages on which no packet ends carry granule position -1
    const packetEnds = segments.some((lacing) => lacing < OGG_MAX_SEGMENTS);
    pages.push({
      headerType: continued ? OGG_FLAG_CONTINUED : 0,
      granulePosition: Buffer.alloc(8, packetEnds ? 0 : 0xff),
      serial,
      sequence: firstSequence + pages.length,
      segments,
      body: Buffer.concat(parts),
    });
    segments = [];
    parts = [];
    continued = nextContinued;
  };

  for (const packet of packets) {
    const lacingCount = Math.floor(packet.length / OGG_MAX_SEGMENTS) + 1;
    for (let i = 0; i < lacingCount; i++) {
      const start = i * OGG_MAX_SEGMENTS;
      const size = Math.min(OGG_MAX_SEGMENTS, packet.length - start);
      segments.push(size);
      parts.push(packet.subarray(start, start + size));
      if (segments.length === OGG_MAX_SEGMENTS) flush(i < lacingCount - 1);
    }
  }
  if (segments.length > 0) flush(false);
  return pages;
}

/**
 * Rewrites the comment header of an Ogg Vorbis file buffer.
 *
 * Comment keys not in `input` are preserved. The cover is stored as a
 * base64 METADATA_BLOCK_PICTURE. Header pages are rebuilt and the audio
 * pages after them are renumbered when the header page count changes.
 */
export function applyOggTags(fileData: Buffer, input: WriteTagsInput): Buffer {
  const pages = parseOggPages(fileData);
  const { packets, headerPageCount } = splitVorbisHeaders(pages);
  const [identification, commentPacket, setup] = packets;

  const comments = parseVorbisCommentBlock(commentPacket.subarray(7));
  const setTag = (key: string, value: string | undefined): void => {
    if (value !== undefined) comments.set(key, [value]);
  };
  setTag('TITLE', input.title);
  setTag('ARTIST', input.artist);
  setTag('ALBUM', input.album);
  setTag('LYRICS', input.lyrics);
  if (input.albumArt) {
    comments.set('METADATA_BLOCK_PICTURE', [
      buildFlacPictureBlock(input.albumArt.data, input.albumArt.mimeType).toString('base64'),
    ]);
  }

  const newComment = Buffer.concat([
    commentPacket.subarray(0, 7),
    buildVorbisCommentBlock(comments),
    Buffer.from([1]), // framing bit
  ]);

  const { serial, sequence } = pages[0];
  const [firstPage] = paginatePackets([identification], serial, sequence);
  firstPage.headerType |= OGG_FLAG_FIRST_PAGE;
  const headerPages = [firstPage, ...paginatePackets([newComment, setup], serial, sequence + 1)];

  const shift = headerPages.length - headerPageCount;
  const audioPages = pages.slice(headerPageCount).map((page) => ({
    ...page,
    sequence: page.serial === serial ? (page.sequence + shift) >>> 0 : page.sequence,
  }));

  return Buffer.concat([...headerPages, ...audioPages].map(serializeOggPage));
}

/**
 * Writes Vorbis comments (and optionally front cover art) to an Ogg Vorbis file.
 */
export async function writeOggTags(filePath: string, input: WriteTagsInput): Promise<WriteTagsResult> {
  try {
    const format = getAudioFormat(filePath);
    if (format !== 'ogg') {
      return {
        success: false,
        filePath,
        error: `writeOggTags only supports Ogg files, got: ${format ?? 'unknown'}`,
      };
    }

    const fileData = await fs.promises.readFile(filePath);
    const { mode } = await fs.promises.stat(filePath);
    await writeFileAtomic(filePath, applyOggTags(fileData, input), { mode: mode & 0o777 });

    return { success: true, filePath, error: null };
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, filePath, error: `Failed to write Ogg tags: ${message}` };
  }
}

/**
 * Writes tags to an audio file, dispatching to the appropriate writer based on format.
 *
 * Currently supports:
 * - MP3: ID3v2 tag writing via node-id3
 * - FLAC: Vorbis Comment + PICTURE block via native Buffer manipulation
 * - M4A/MP4: ilst items under moov/udta/meta
 * - Ogg Vorbis: the comment header packet
 */
export async function writeTags(filePath: string, input: WriteTagsInput): Promise<WriteTagsResult> {
  const format = getAudioFormat(filePath);

  if (format === null) {
    return {
      success: false,
      filePath,
      error: `Unsupported audio format: ${path.extname(filePath)}`,
    };
  }

  switch (format) {
    case 'mp3':
      return writeMp3Tags(filePath, input);
    case 'flac':
      return writeFlacTags(filePath, input);
    case 'm4a':
    case 'mp4':
      return writeMp4Tags(filePath, input);
    case 'ogg':
      return writeOggTags(filePath, input);
    case 'wav':
    case 'wma':
    case 'ape':
      return {
        success: false,
        filePath,
        error: `Tag writing for ${format.toUpperCase()} is not supported. Only MP3, FLAC, M4A/MP4 and Ogg Vorbis tags can be written.`,
      };
    default: {
      const _exhaustive: never = format;
      return {
        success: false,
        filePath,
        error: `Unknown format: ${String(_exhaustive)}`,
      };
    }
  }
}
