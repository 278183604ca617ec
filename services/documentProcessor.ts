import fs from 'fs/promises';
import path from 'path';
import pdfParse from 'pdf-parse/lib/pdf-parse.js';
import * as mammoth from 'mammoth';
import skillKeywords from '../data/skills.json';
import { DocumentProcessingError, errorMessage } from './errors';
import { createLogger } from './logger';
import type { UserProfile } from './schemas';

const log = createLogger('DocumentProcessor');

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;
const PHONE_PATTERN = /\+?[1-9]?[0-9]{7,15}/;

type DocumentFormat = 'pdf' | 'docx' | 'text';

function detectFormat(filePath: string, mimeType?: string): DocumentFormat | undefined {
  if (mimeType === 'application/pdf') return 'pdf';
  if (mimeType?.includes('wordprocessingml')) return 'docx';

  switch (path.extname(filePath).toLowerCase()) {
    case '.pdf':
      return 'pdf';
    case '.docx':
      return 'docx';
    case '.txt':
    case '.md':
      return 'text';
  }
  if (mimeType?.startsWith('text/')) return 'text';
  return undefined;
}

/**
 * Extract plain text from a CV. Uploaded files carry their mime type and no extension,
 * files named on the command line only have the extension.
 */
export async function extractText(filePath: string, mimeType?: string): Promise<string> {
  const format = detectFormat(filePath, mimeType);
  if (!format) {
    throw new DocumentProcessingError(
      `Unsupported file format: ${path.extname(filePath) || mimeType || 'unknown'}`,
      'Supported formats are PDF, DOCX, TXT and MD.',
    );
  }

  try {
    switch (format) {
      case 'pdf': {
        const data = await pdfParse(await fs.readFile(filePath));
        return data.text;
      }
      case 'docx': {
        const result = await mammoth.extractRawText({ path: filePath });
        return result.value;
      }
      case 'text':
        return await fs.readFile(filePath, 'utf-8');
    }
  } catch (error) {
    log.error({ err: errorMessage(error), file: path.basename(filePath) }, 'Text extraction failed');
    throw new DocumentProcessingError('Failed to parse CV file.', errorMessage(error));
  }
}

export interface ParsedCv {
  email?: string;
  phone?: string;
  skills: string[];
}

/** Simple pattern-based pass over the CV text. */
export function parseCvContent(cvText: string): ParsedCv {
  const lower = cvText.toLowerCase();
  return {
    email: cvText.match(EMAIL_PATTERN)?.[0],
    phone: cvText.match(PHONE_PATTERN)?.[0],
    skills: skillKeywords.cv.filter((skill) => lower.includes(skill.toLowerCase())),
  };
}

export async function processCvFile(filePath: string, mimeType?: string): Promise<UserProfile> {
  try {
    await fs.access(filePath);
  } catch {
    throw new DocumentProcessingError(`File not found: ${filePath}`);
  }

  const cvText = await extractText(filePath, mimeType);
  const parsed = parseCvContent(cvText);

  return {
    name: 'User',
    email: parsed.email ?? '',
    phone: parsed.phone,
    cvText,
    skills: parsed.skills,
    experience: [],
    education: [],
  };
}
