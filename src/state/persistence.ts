/**
 * State persistence module
 * Atomic JSON read/write under the engine's state directory
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';

import { StoreIOError } from '../pipeline/errors.js';

/**
 * Read and validate a JSON file
 *
 * @returns The parsed value, or null if the file does not exist
 */
export async function readJsonFile<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T,
): Promise<z.output<T> | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw new StoreIOError('read', filePath, error);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new StoreIOError('parse', filePath, error);
  }

  // Validate with Zod schema
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new StoreIOError('validate', filePath, new Error(result.error.message));
  }
  return result.data;
}

/**
 * Write JSON using temp file + rename so readers never see a partial file
 */
export async function writeJsonFileAtomic(filePath: string, data: unknown, operation = 'write'): Promise<void> {
  const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    throw new StoreIOError(operation, filePath, error);
  }
}

/**
 * Append one JSON record as a line to a JSONL file
 */
export async function appendJsonLine(filePath: string, data: unknown, operation = 'append'): Promise<void> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.appendFile(filePath, `${JSON.stringify(data)}\n`, 'utf-8');
  } catch (error) {
    throw new StoreIOError(operation, filePath, error);
  }
}
