/**
 * Disk persistence for a founder run, rooted at the output directory:
 *   info/info-<Company-Name>.json   raw search document per company
 *   founders.json                   company -> founders
 *   accuracy.json                   accuracy records and summary (when ground truth is present)
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import {
  describeError,
  fail,
  ok,
  pipelineError,
  type Result,
} from '@founder-finder/core';
import { groundTruthMapSchema, type GroundTruthMap } from '@founder-finder/schemas';
import type { ArtifactStore } from '@founder-finder/agents';

export const FOUNDERS_FILE = 'founders.json';
export const ACCURACY_FILE = 'accuracy.json';

/** Write a text file, creating parent folders. Resolves to the absolute path. */
export async function writeTextFile(filePath: string, content: string): Promise<Result<string>> {
  const absolute = path.resolve(filePath);
  try {
    await mkdir(path.dirname(absolute), { recursive: true });
    await writeFile(absolute, content, 'utf-8');
    return ok(absolute);
  } catch (error) {
    return fail(
      pipelineError('SourceUnavailable', `Cannot write ${absolute}: ${describeError(error)}`, error),
    );
  }
}

export function writeJsonFile(filePath: string, data: unknown): Promise<Result<string>> {
  return writeTextFile(filePath, `${JSON.stringify(data, null, 2)}\n`);
}

export async function readTextFile(filePath: string): Promise<Result<string>> {
  try {
    return ok(await readFile(path.resolve(filePath), 'utf-8'));
  } catch (error) {
    return fail(
      pipelineError('SourceUnavailable', `Cannot read ${filePath}: ${describeError(error)}`, error),
    );
  }
}

export function createDiskArtifactStore(rootDir: string): ArtifactStore {
  return {
    writeText: (relativePath, content) => writeTextFile(path.join(rootDir, relativePath), content),
  };
}

/**
 * Read and validate correct_founders.json. Callers treat any failure as
 * "no ground truth" and skip evaluation.
 */
export async function loadGroundTruth(filePath: string): Promise<Result<GroundTruthMap>> {
  const read = await readTextFile(filePath);
  if (!read.ok) return read;

  let parsed: unknown;
  try {
    parsed = JSON.parse(read.value);
  } catch (error) {
    return fail(
      pipelineError('MalformedDocument', `Invalid JSON in ${filePath}: ${describeError(error)}`, error),
    );
  }

  const validated = groundTruthMapSchema.safeParse(parsed);
  if (!validated.success) {
    const issues = validated.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    return fail(pipelineError('MalformedDocument', `Invalid ground truth: ${issues}`));
  }
  return ok(validated.data);
}
