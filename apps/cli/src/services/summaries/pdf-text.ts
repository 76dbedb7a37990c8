import { promises as fs } from 'fs';
import { extractText } from 'unpdf';
import type { TextExtractor } from './types';

/**
 * Merged text of every page of a PDF
 */
export class PdfTextExtractor implements TextExtractor {
  async extract(pdfPath: string): Promise<string> {
    const buffer = await fs.readFile(pdfPath);
    const { text } = await extractText(new Uint8Array(buffer), { mergePages: true });
    return text;
  }
}
