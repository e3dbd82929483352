import fs from 'node:fs';
import path from 'node:path';
import pdf from 'pdf-parse/lib/pdf-parse.js';
import type { Profile } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { withFallbacks } from './profile.js';

export interface ResumeDetails {
  rawText: string;
  email?: string;
  phone?: string;
  firstName?: string;
  lastName?: string;
}

export async function parseResume(resumePath: string): Promise<ResumeDetails> {
  logger.action(`Parsing resume: ${resumePath}`);

  const absolutePath = path.resolve(resumePath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Resume file not found: ${absolutePath}`);
  }

  const pdfData = await pdf(fs.readFileSync(absolutePath));
  const details = extractResumeDetails(pdfData.text);

  logger.success(`Resume parsed: ${pdfData.numpages} pages, ${details.rawText.length} characters`);
  return details;
}

export function extractResumeDetails(rawText: string): ResumeDetails {
  const name = extractName(rawText);
  const parts = name ? name.split(/\s+/) : [];
  return {
    rawText,
    email: extractEmail(rawText),
    phone: extractPhone(rawText),
    firstName: parts.length > 1 ? parts[0] : undefined,
    lastName: parts.length > 1 ? parts[parts.length - 1] : undefined,
  };
}

function extractEmail(text: string): string | undefined {
  const match = text.match(/[\w.-]+@[\w.-]+\.\w+/i);
  return match ? match[0] : undefined;
}

function extractPhone(text: string): string | undefined {
  // Match various phone formats
  const match = text.match(/(?:\+?1[-.\s]?)?\(?[0-9]{3}\)?[-.\s]?[0-9]{3}[-.\s]?[0-9]{4}/);
  return match ? match[0].trim() : undefined;
}

function extractName(text: string): string | undefined {
  // The first non-empty line usually carries the name
  const lines = text.split('\n').filter((line) => line.trim());
  if (lines.length > 0) {
    const firstLine = lines[0].trim();
    if (/^[A-Za-z\s]{2,50}$/.test(firstLine) && firstLine.split(/\s+/).length <= 4) {
      return firstLine;
    }
  }
  return undefined;
}

/**
 * Reads the resume named by `resume_path` (PDF only) and fills contact
 * attributes the configured profile lacks. A missing or unreadable resume
 * leaves the profile unchanged.
 */
export async function enrichProfileFromResume(profile: Profile): Promise<{ profile: Profile; resumeText?: string }> {
  const resumePath = profile.resume_path;
  if (!resumePath || path.extname(resumePath).toLowerCase() !== '.pdf') {
    return { profile };
  }

  try {
    const details = await parseResume(resumePath);
    return {
      profile: withFallbacks(profile, {
        email: details.email,
        phone: details.phone,
        first_name: details.firstName,
        last_name: details.lastName,
      }),
      resumeText: details.rawText,
    };
  } catch (error) {
    logger.warn(`Resume not used for context: ${errorMessage(error)}`);
    return { profile };
  }
}
