import fs from 'node:fs/promises';
import path from 'node:path';
import pdfParse from 'pdf-parse';

import { InvalidInputError } from '../errors';

export const SUPPORTED_EXTENSIONS = ['.pdf', '.txt'] as const;

export type ExtractedText = {
  text: string;
  pages: number;
};

export const isSupportedFile = (fileName: string): boolean =>
  SUPPORTED_EXTENSIONS.some((extension) => extension === path.extname(fileName).toLowerCase());

export const extractText = async (filePath: string, fileName: string = filePath): Promise<ExtractedText> => {
  if (!isSupportedFile(fileName)) {
    throw new InvalidInputError(`Unsupported file type for ${fileName}. Use PDF or TXT.`);
  }

  const fileBuffer = await fs.readFile(filePath);

  if (path.extname(fileName).toLowerCase() === '.txt') {
    return { text: fileBuffer.toString('utf-8').trim(), pages: 1 };
  }

  const result = await pdfParse(fileBuffer);
  const pages = typeof result.numpages === 'number' ? Math.max(0, Math.trunc(result.numpages)) : 0;

  return {
    text: (result.text ?? '').trim(),
    pages,
  };
};
