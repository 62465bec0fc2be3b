import { SECTION_KEYS, type SectionKey, type SectionMap } from '@/lib/resume/types';

export interface ParsedResume {
  sections: SectionMap;
  // Lines consumed as section headers, in document order
  headers: string[];
}

// Keyword table for header detection. Order matters: the first key whose
// keyword appears in a line claims it.
const SECTION_KEYWORDS: ReadonlyArray<readonly [SectionKey, readonly string[]]> = [
  ['personal_info', ['name', 'contact', 'email', 'phone', 'address', 'profile']],
  ['education', ['education', 'academic', 'qualification', 'degree', 'university', 'college']],
  ['experience', ['experience', 'employment', 'work history', 'professional experience']],
  ['projects', ['projects', 'personal projects', 'academic projects']],
  ['skills', ['skills', 'technical skills', 'competencies', 'expertise']],
  ['certifications', ['certifications', 'certificates', 'licenses']],
  ['research', ['research', 'research papers', 'publications']],
  ['thesis', ['thesis', 'dissertation']],
  ['startups', ['startup', 'entrepreneurship', 'venture']],
  ['achievements', ['achievements', 'awards', 'honors', 'accomplishments']],
  ['languages', ['languages', 'language proficiency']],
  ['interests', ['interests', 'hobbies']],
];

// Lines this long or longer are always content, even if they mention a keyword
const HEADER_MAX_LENGTH = 50;

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z|a-z]{2,}\b/g;

// Deliberately loose: dates and ID numbers can match too
const PHONE_PATTERN = /\+?\(?[0-9]{1,4}\)?[-\s.]?\(?[0-9]{1,4}\)?[-\s.]?[0-9]{1,4}[-\s.]?[0-9]{1,9}/g;
const MIN_PHONE_DIGITS = 7;

/**
 * Returns the section a (trimmed) line introduces, or null when the line is content.
 */
export function detectSectionHeader(line: string): SectionKey | null {
  if (line.length >= HEADER_MAX_LENGTH) return null;

  const lowerLine = line.toLowerCase();
  for (const [key, keywords] of SECTION_KEYWORDS) {
    if (keywords.some((keyword) => lowerLine.includes(keyword))) {
      return key;
    }
  }
  return null;
}

export function findEmail(text: string): string | null {
  const matches = text.match(EMAIL_PATTERN);
  return matches ? matches[0] : null;
}

export function findPhone(text: string): string | null {
  const matches = text.match(PHONE_PATTERN) ?? [];
  const phone = matches.find((match) => match.replace(/\D/g, '').length >= MIN_PHONE_DIGITS);
  return phone ?? null;
}

export function parseResumeSectionsDetailed(text: string): ParsedResume {
  const lines = text.split('\n');
  const buckets = new Map<SectionKey, string[]>();
  const headers: string[] = [];

  const bucket = (key: SectionKey): string[] => {
    let entries = buckets.get(key);
    if (!entries) {
      entries = [];
      buckets.set(key, entries);
    }
    return entries;
  };

  let currentSection: SectionKey | null = null;
  let currentContent: string[] = [];

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line) continue;

    const header = detectSectionHeader(line);
    if (header) {
      if (currentSection) {
        bucket(currentSection).push(...currentContent);
      }
      currentSection = header;
      currentContent = [];
      headers.push(line);
    } else if (currentSection) {
      currentContent.push(line);
    } else {
      // Anything above the first header is treated as name/contact details
      bucket('personal_info').push(line);
    }
  }

  if (currentSection) {
    bucket(currentSection).push(...currentContent);
  }

  const allText = lines.join(' ');
  const contactLines: string[] = [];
  const email = findEmail(allText);
  if (email) contactLines.push(`Email: ${email}`);
  const phone = findPhone(allText);
  if (phone) contactLines.push(`Phone: ${phone}`);
  if (contactLines.length > 0) {
    bucket('personal_info').unshift(...contactLines);
  }

  const sections: SectionMap = {};
  for (const key of SECTION_KEYS) {
    const entries = buckets.get(key);
    if (entries && entries.length > 0) {
      sections[key] = entries;
    }
  }

  return { sections, headers };
}

// Split resume text into the fixed section vocabulary
export function parseResumeSections(text: string): SectionMap {
  return parseResumeSectionsDetailed(text).sections;
}
