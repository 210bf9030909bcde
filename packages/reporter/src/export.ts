import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import { ExportError } from '@subarray-lab/core';

/**
 * Writes one artifact, creating its directory first. Returns the absolute
 * path written.
 */
export async function writeArtifact(
  path: string,
  contents: string
): Promise<string> {
  const absolute = resolve(path);
  try {
    await mkdir(dirname(absolute), { recursive: true });
    await writeFile(absolute, contents, 'utf8');
  } catch (error) {
    throw new ExportError({
      message: `Cannot write ${absolute}`,
      context: { path: absolute },
      cause: error instanceof Error ? error : undefined,
      suggestions: ['Check that the output directory is writable'],
    });
  }
  return absolute;
}
