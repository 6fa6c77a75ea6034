/**
 * Input Discovery
 *
 * Finds the videos to convert, their subtitle files, and where each
 * converted file goes.
 */

import { readdir, stat } from 'node:fs/promises';
import { join, parse } from 'node:path';
import { DEFAULT_EXTENSIONS } from '@letterbox/core';
import { pathExists } from '@letterbox/utils';

/**
 * Video files directly inside `dir` (no recursion), matched by extension
 * case-insensitively, sorted by path. Symlinks count when they resolve to
 * a file; dangling links are skipped.
 */
export async function findVideoFiles(
  dir: string,
  extensions: readonly string[] = DEFAULT_EXTENSIONS
): Promise<string[]> {
  const wanted = new Set(extensions.map((ext) => ext.toLowerCase()));
  const entries = await readdir(dir, { withFileTypes: true });

  const files: string[] = [];
  for (const entry of entries) {
    if (!wanted.has(parse(entry.name).ext.toLowerCase())) continue;

    const path = join(dir, entry.name);
    if (entry.isFile() || (entry.isSymbolicLink() && (await isLinkToFile(path)))) {
      files.push(path);
    }
  }

  return [...new Set(files)].sort();
}

async function isLinkToFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * `<dir>/<stem>.srt` next to the video, if present
 */
export async function findSubtitleFile(videoPath: string): Promise<string | null> {
  const { dir, name } = parse(videoPath);
  const subtitlePath = join(dir, `${name}.srt`);
  return (await pathExists(subtitlePath)) ? subtitlePath : null;
}

/**
 * Output file name: always .mp4, suffixed with the target height and
 * whether subtitles were burned in
 */
export function outputNameFor(
  videoPath: string,
  targetHeight: number,
  hasSubtitles: boolean
): string {
  const { name } = parse(videoPath);
  const suffix = hasSubtitles ? `_${targetHeight}p_subs` : `_${targetHeight}p`;
  return `${name}${suffix}.mp4`;
}
