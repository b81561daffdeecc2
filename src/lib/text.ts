import { Buffer } from 'node:buffer';

type SegmenterGranularity = 'grapheme' | 'word' | 'sentence';

const NON_WHITESPACE = /\S/u;
const TRUNCATION_SUFFIX = '...';
const WHITESPACE_RUN = /\s+/u;

const segmenters = new Map<SegmenterGranularity, Intl.Segmenter | undefined>();

/**
 * Creates an Intl.Segmenter, or undefined when the runtime lacks Intl
 * segmentation for the default locale.
 */
export function createSegmenter(
  granularity: SegmenterGranularity
): Intl.Segmenter | undefined {
  if (typeof Intl !== 'object' || typeof Intl.Segmenter !== 'function') {
    return undefined;
  }
  try {
    return new Intl.Segmenter(undefined, { granularity });
  } catch {
    return undefined;
  }
}

function getSegmenter(
  granularity: SegmenterGranularity
): Intl.Segmenter | undefined {
  if (!segmenters.has(granularity)) {
    segmenters.set(granularity, createSegmenter(granularity));
  }
  return segmenters.get(granularity);
}

export function listWords(text: string): string[] {
  const segmenter = getSegmenter('word');
  if (!segmenter) {
    return text.split(WHITESPACE_RUN).filter((word) => word.length > 0);
  }

  const words: string[] = [];
  for (const part of segmenter.segment(text)) {
    if (part.isWordLike === true) {
      words.push(part.segment);
    }
  }
  return words;
}

export function countWords(text: string): number {
  return listWords(text).length;
}

export function countSentences(text: string): number {
  const segmenter = getSegmenter('sentence');
  if (!segmenter) {
    return NON_WHITESPACE.test(text) ? 1 : 0;
  }

  let count = 0;
  for (const sentence of segmenter.segment(text)) {
    if (NON_WHITESPACE.test(sentence.segment)) {
      count++;
    }
  }
  return count;
}

/**
 * Truncates to a maximum UTF-8 byte length without splitting grapheme
 * clusters, appending '...' when anything was cut.
 */
export function truncate(str: string, maxBytes: number): string {
  const limit = Math.max(0, maxBytes);
  if (Buffer.byteLength(str, 'utf8') <= limit) {
    return str;
  }

  const suffixBytes = Buffer.byteLength(TRUNCATION_SUFFIX, 'utf8');
  if (limit <= suffixBytes) {
    return TRUNCATION_SUFFIX.slice(0, limit);
  }

  const targetBytes = limit - suffixBytes;
  const segmenter = getSegmenter('grapheme');
  const parts = segmenter
    ? Array.from(segmenter.segment(str), (part) => part.segment)
    : Array.from(str);

  let result = '';
  let usedBytes = 0;
  for (const part of parts) {
    const partBytes = Buffer.byteLength(part, 'utf8');
    if (usedBytes + partBytes > targetBytes) {
      break;
    }
    result += part;
    usedBytes += partBytes;
  }
  return result + TRUNCATION_SUFFIX;
}
