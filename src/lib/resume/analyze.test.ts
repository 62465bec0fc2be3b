import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('pdf-parse', () => ({ PDFParse: class {} }));
vi.mock('mammoth', () => ({ default: { extractRawText: vi.fn() } }));

vi.mock('./ats-scorer', async (importOriginal) => {
  const actual = await importOriginal<typeof import('./ats-scorer')>();
  return { ...actual, calculateAtsScore: vi.fn(actual.calculateAtsScore) };
});

import { analyzeResume, analyzeText } from './analyze';
import { calculateAtsScore } from './ats-scorer';
import { SAMPLE_RESUME, SHORT_RESUME } from '@/test/fixtures';

describe('analyzeResume', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('extracts, parses and scores a plain text resume', async () => {
    const result = await analyzeResume(Buffer.from(SHORT_RESUME), 'plaintext');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.text).toBe(SHORT_RESUME);
    expect(result.sections.skills).toEqual(['Python, Go, SQL']);
    expect(result.report.score).toBe(18);
  });

  it('produces an identical result when the same file is analysed twice', async () => {
    const first = await analyzeResume(Buffer.from(SAMPLE_RESUME), 'plaintext');
    const second = await analyzeResume(Buffer.from(SAMPLE_RESUME), 'plaintext');

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it('stops at extraction for unsupported formats without scoring', async () => {
    const result = await analyzeResume(Buffer.from('a,b,c'), 'xlsx');

    expect(result).toMatchObject({ ok: false, stage: 'extract' });
    if (result.ok) return;
    expect(result.error.kind).toBe('UnsupportedFormat');
    expect(calculateAtsScore).not.toHaveBeenCalled();
  });
});

describe('analyzeText', () => {
  it('scores empty text', () => {
    const result = analyzeText('');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.sections).toEqual({});
    expect(result.report.score).toBe(0);
  });
});
