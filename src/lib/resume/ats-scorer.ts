// ---------------------------------------------------------------------------
// ATS Scoring Engine: deterministic, section-count based
// Eight independently capped criteria that add up to 100
// ---------------------------------------------------------------------------

import { InvalidInputError } from './errors';
import type {
  Criterion,
  Rating,
  RatingColor,
  ScoreReport,
  SectionKey,
  SectionMap,
  SubScore,
} from './types';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const MAX_SCORE = 100;

export const ACTION_VERBS = [
  'developed',
  'designed',
  'implemented',
  'managed',
  'led',
  'created',
  'built',
  'improved',
  'optimized',
  'achieved',
  'delivered',
  'launched',
] as const;

const RATING_BANDS: ReadonlyArray<{ min: number; rating: Rating; color: RatingColor }> = [
  { min: 90, rating: 'Excellent', color: 'green' },
  { min: 75, rating: 'Very Good', color: 'blue' },
  { min: 60, rating: 'Good', color: 'yellow' },
  { min: 40, rating: 'Fair', color: 'orange' },
  { min: 0, rating: 'Needs Improvement', color: 'red' },
];

const POSITIVE_RECOMMENDATION = 'Your resume looks great! Keep it updated.';

// ---------------------------------------------------------------------------
// Criteria
// ---------------------------------------------------------------------------

interface CriterionResult {
  name: Criterion;
  score: number;
  max: number;
  // Value compared against the recommendation threshold (can exceed max)
  raw: number;
  feedback: string[];
}

const RECOMMENDATIONS: ReadonlyArray<{ criterion: Criterion; below: number; message: string }> = [
  { criterion: 'Contact Information', below: 10, message: 'Add complete contact information (email and phone)' },
  { criterion: 'Education', below: 10, message: 'Add or expand your education section' },
  { criterion: 'Work Experience', below: 15, message: 'Add more work experience details with quantifiable achievements' },
  { criterion: 'Skills', below: 10, message: 'Expand your skills section with relevant technical and soft skills' },
  { criterion: 'Projects', below: 5, message: 'Include relevant projects to showcase your abilities' },
  { criterion: 'Certifications', below: 4, message: 'Add professional certifications if available' },
  { criterion: 'Formatting & Keywords', below: 7, message: 'Use more action verbs and improve resume structure' },
];

function linesOf(sections: SectionMap, key: SectionKey): string[] {
  return sections[key] ?? [];
}

function scoreContact(sections: SectionMap): CriterionResult {
  const personalInfo = linesOf(sections, 'personal_info').map((line) => line.toLowerCase());
  const hasEmail = personalInfo.some((line) => line.includes('email'));
  const hasPhone = personalInfo.some((line) => line.includes('phone'));

  const score = (hasEmail ? 5 : 0) + (hasPhone ? 5 : 0);
  return {
    name: 'Contact Information',
    score,
    max: 10,
    raw: score,
    feedback: [
      hasEmail ? '✓ Email address found' : '✗ Missing email address',
      hasPhone ? '✓ Phone number found' : '✗ Missing phone number',
    ],
  };
}

function scoreEducation(sections: SectionMap): CriterionResult {
  const items = linesOf(sections, 'education');
  const score = Math.min(15, items.length * 5);
  return {
    name: 'Education',
    score,
    max: 15,
    raw: score,
    feedback: [
      items.length > 0
        ? `✓ Education section found with ${items.length} entries`
        : '✗ No education section found',
    ],
  };
}

function scoreExperience(sections: SectionMap): CriterionResult {
  const items = linesOf(sections, 'experience');
  if (items.length === 0) {
    return {
      name: 'Work Experience',
      score: 0,
      max: 25,
      raw: 0,
      feedback: ['✗ No work experience section found'],
    };
  }

  const feedback = [`✓ Work experience section found with ${items.length} entries`];
  let raw = Math.min(25, items.length * 5);

  const hasMetrics = items.some((item) => /\d+[%+]?/.test(item));
  if (hasMetrics) {
    raw += 5;
    feedback.push('✓ Quantifiable achievements found (numbers/metrics)');
  } else {
    feedback.push('⚠ No quantifiable achievements found (numbers/metrics)');
  }

  return { name: 'Work Experience', score: Math.min(25, raw), max: 25, raw, feedback };
}

function scoreSkills(sections: SectionMap): CriterionResult {
  const items = linesOf(sections, 'skills');
  // Every comma-separated token counts, empty ones included
  const skillsCount = items.reduce((total, item) => total + item.split(',').length, 0);
  const score = Math.min(15, skillsCount);
  return {
    name: 'Skills',
    score,
    max: 15,
    raw: score,
    feedback: [
      items.length > 0
        ? `✓ Skills section found with approximately ${skillsCount} skills`
        : '✗ No skills section found',
    ],
  };
}

function scoreProjects(sections: SectionMap): CriterionResult {
  const items = linesOf(sections, 'projects');
  const score = Math.min(10, items.length * 3);
  return {
    name: 'Projects',
    score,
    max: 10,
    raw: score,
    feedback: [
      items.length > 0
        ? `✓ Projects section found with ${items.length} projects`
        : '⚠ No projects section found',
    ],
  };
}

function scoreCertifications(sections: SectionMap): CriterionResult {
  const items = linesOf(sections, 'certifications');
  const score = Math.min(8, items.length * 2);
  return {
    name: 'Certifications',
    score,
    max: 8,
    raw: score,
    feedback: [
      items.length > 0
        ? `✓ Certifications found: ${items.length} certificates`
        : '⚠ No certifications listed',
    ],
  };
}

function scoreResearch(sections: SectionMap): CriterionResult {
  const items = linesOf(sections, 'research');
  const score = Math.min(7, items.length * 3);
  return {
    name: 'Research & Publications',
    score,
    max: 7,
    raw: score,
    feedback: [
      items.length > 0
        ? `✓ Research/Publications found: ${items.length} papers`
        : '⚠ No research or publications listed',
    ],
  };
}

export function countActionVerbs(fullText: string): number {
  const lower = fullText.toLowerCase();
  return ACTION_VERBS.filter((verb) => lower.includes(verb)).length;
}

function scoreFormatting(sections: SectionMap, fullText: string): CriterionResult {
  const feedback: string[] = [];
  let score = 0;

  const sectionCount = Object.values(sections).filter((lines) => lines && lines.length > 0).length;
  if (sectionCount >= 4) {
    score += 5;
    feedback.push('✓ Well-structured with multiple sections');
  } else {
    feedback.push(`⚠ Only ${sectionCount} sections detected (aim for at least 4)`);
  }

  const foundVerbs = countActionVerbs(fullText);
  if (foundVerbs >= 5) {
    score += 5;
    feedback.push(`✓ Strong action verbs used (${foundVerbs} found)`);
  } else if (foundVerbs >= 2) {
    score += 3;
    feedback.push(`⚠ Some action verbs used (${foundVerbs} found)`);
  } else {
    feedback.push(`✗ Few or no action verbs used (${foundVerbs} found)`);
  }

  return { name: 'Formatting & Keywords', score, max: 10, raw: score, feedback };
}

// ---------------------------------------------------------------------------
// Rating
// ---------------------------------------------------------------------------

export function rate(percentage: number): { rating: Rating; ratingColor: RatingColor } {
  const band = RATING_BANDS.find((b) => percentage >= b.min) ?? RATING_BANDS[RATING_BANDS.length - 1];
  return { rating: band.rating, ratingColor: band.color };
}

function subScore(result: CriterionResult): Readonly<SubScore> {
  return Object.freeze({ score: result.score, max: result.max });
}

// ---------------------------------------------------------------------------
// Main scoring function
// ---------------------------------------------------------------------------

export function calculateAtsScore(
  sections: SectionMap | null | undefined,
  fullText: string | null | undefined,
): ScoreReport {
  if (sections == null) {
    throw new InvalidInputError('A section map is required to score a resume');
  }
  if (fullText == null) {
    throw new InvalidInputError('Resume text is required to score a resume');
  }

  const contact = scoreContact(sections);
  const education = scoreEducation(sections);
  const experience = scoreExperience(sections);
  const skills = scoreSkills(sections);
  const projects = scoreProjects(sections);
  const certifications = scoreCertifications(sections);
  const research = scoreResearch(sections);
  const formatting = scoreFormatting(sections, fullText);

  const criteria = [contact, education, experience, skills, projects, certifications, research, formatting];

  const score = criteria.reduce((total, c) => total + c.score, 0);
  const percentage = Math.round((score / MAX_SCORE) * 100 * 10) / 10;
  const { rating, ratingColor } = rate(percentage);

  const rawByCriterion = new Map(criteria.map((c) => [c.name, c.raw]));
  const recommendations = RECOMMENDATIONS
    .filter((r) => (rawByCriterion.get(r.criterion) ?? 0) < r.below)
    .map((r) => r.message);

  return Object.freeze({
    score,
    maxScore: MAX_SCORE,
    percentage,
    rating,
    ratingColor,
    feedback: Object.freeze(criteria.flatMap((c) => c.feedback)),
    scoringBreakdown: Object.freeze({
      'Contact Information': subScore(contact),
      Education: subScore(education),
      'Work Experience': subScore(experience),
      Skills: subScore(skills),
      Projects: subScore(projects),
      Certifications: subScore(certifications),
      'Research & Publications': subScore(research),
      'Formatting & Keywords': subScore(formatting),
    }),
    recommendations: Object.freeze(
      recommendations.length > 0 ? recommendations : [POSITIVE_RECOMMENDATION],
    ),
  });
}
