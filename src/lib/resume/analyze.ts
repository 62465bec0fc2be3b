import { extractText } from '@/lib/document/parser';
import { parseResumeSections } from '@/lib/document/parse-sections';
import { debug } from '@/lib/debug';
import { calculateAtsScore } from './ats-scorer';
import { isResumeError, type ResumeError } from './errors';
import type { ScoreReport, SectionMap } from './types';

export type AnalysisStage = 'extract' | 'score';

export type AnalysisResult =
  | { ok: true; text: string; sections: SectionMap; report: ScoreReport }
  | { ok: false; stage: AnalysisStage; error: ResumeError };

/**
 * Parses and scores text that has already been extracted.
 * Only typed resume errors become a failure result; anything else is a bug and propagates.
 */
export function analyzeText(text: string): AnalysisResult {
  try {
    const sections = parseResumeSections(text);
    const report = calculateAtsScore(sections, text);
    debug(`[ats] scored ${report.score}/${report.maxScore} across ${Object.keys(sections).length} sections`);
    return { ok: true, text, sections, report };
  } catch (error) {
    if (isResumeError(error)) return { ok: false, stage: 'score', error };
    throw error;
  }
}

export async function analyzeResume(buffer: Buffer, format: string): Promise<AnalysisResult> {
  let text: string;
  try {
    text = await extractText(buffer, format);
  } catch (error) {
    if (isResumeError(error)) return { ok: false, stage: 'extract', error };
    throw error;
  }

  return analyzeText(text);
}
