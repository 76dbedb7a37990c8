import path from 'path';
import { promises as fs } from 'fs';
import type { CitationStyle } from './formatter';

export function referenceFileName(style: CitationStyle): string {
  return `references_${style}.txt`;
}

/**
 * Write one citation per line. Zero citations still produce an (empty) file.
 */
export async function writeReferenceFile(
  dir: string,
  style: CitationStyle,
  citations: readonly string[]
): Promise<string> {
  await fs.mkdir(dir, { recursive: true });
  const filePath = path.join(dir, referenceFileName(style));
  const body = citations.length > 0 ? `${citations.join('\n')}\n` : '';
  await fs.writeFile(filePath, body, 'utf-8');
  return filePath;
}

export async function readReferenceLines(filePath: string): Promise<string[]> {
  try {
    const raw = await fs.readFile(filePath, 'utf-8');
    return raw
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter(Boolean);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}
