// src/lib/filenames.ts

import fs from 'fs';
import path from 'path';

export const FALLBACK_FILENAME = 'unnamed_file';

// Windows-reserved characters plus control characters 0x00-0x1f
const INVALID_CHARS = /[<>:"/\\|?*\x00-\x1f]/g;
const EDGE_SPACES_AND_DOTS = /^[. ]+|[. ]+$/g;

/**
 * Map arbitrary text to a name that is safe as a single path segment on
 * Windows, Linux and macOS. Never returns an empty string.
 */
export function sanitizeFilename(filename: string): string {
  const sanitized = filename.replace(INVALID_CHARS, '_').replace(EDGE_SPACES_AND_DOTS, '');
  return sanitized || FALLBACK_FILENAME;
}

// Split `name.ext` into stem and extension; a leading dot is part of the stem.
export function splitExtension(filename: string): { stem: string; ext: string } {
  const dot = filename.lastIndexOf('.');
  if (dot <= 0) {
    return { stem: filename, ext: '' };
  }
  return { stem: filename.slice(0, dot), ext: filename.slice(dot) };
}

/**
 * Return `directory/filename`, or the first free `stem_N.ext` next to it when
 * that name is taken. The check and the later write are not atomic.
 */
export function resolveUniquePath(directory: string, filename: string): string {
  const candidate = path.join(directory, filename);
  if (!fs.existsSync(candidate)) {
    return candidate;
  }

  const { stem, ext } = splitExtension(filename);
  for (let counter = 1; ; counter++) {
    const next = path.join(directory, `${stem}_${counter}${ext}`);
    if (!fs.existsSync(next)) {
      return next;
    }
  }
}
