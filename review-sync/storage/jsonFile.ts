import { promises as fs } from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import type { z } from 'zod';

export class CorruptDocumentError extends Error {
  constructor(readonly filePath: string, detail: string) {
    super(`Corrupt JSON document ${filePath}: ${detail}`);
    this.name = 'CorruptDocumentError';
  }
}

/**
 * Reads and validates a JSON document; null when the file does not exist.
 */
export async function readJsonDocument<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S
): Promise<z.output<S> | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CorruptDocumentError(filePath, error instanceof Error ? error.message : String(error));
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new CorruptDocumentError(filePath, result.error.message);
  }
  return result.data;
}

/** Write-to-temp then rename, so readers never see a half-written file */
export async function writeJsonDocument(filePath: string, data: unknown): Promise<void> {
  const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomUUID()}.tmp`);
  await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
  try {
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Product ids become file names; keep them to a safe alphabet */
export function safeFileKey(productId: string): string {
  return productId.replace(/[^A-Za-z0-9_-]/g, '_');
}
