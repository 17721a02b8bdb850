import { promises as fs } from 'node:fs';
import path from 'node:path';

/** Resolves to null when the file is missing or holds invalid JSON. */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return null;
  }
}

/** Replaces the file through a temp file and a rename. */
export async function writeJsonFileAtomic(
  filePath: string,
  payload: unknown,
): Promise<void> {
  const dir = path.dirname(filePath);
  const base = path.basename(filePath);
  const tmpPath = path.join(dir, `.${base}.${process.pid}.${Date.now()}.tmp`);

  await fs.mkdir(dir, { recursive: true });
  try {
    await fs.writeFile(tmpPath, `${JSON.stringify(payload)}\n`, 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.unlink(tmpPath).catch(() => undefined);
    throw error;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}
