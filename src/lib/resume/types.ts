export type DocumentFormat = 'pdf' | 'docx' | 'plaintext';

export interface RawDocument {
  data: Buffer;
  format: DocumentFormat;
}

export const SECTION_KEYS = [
  'personal_info',
  'education',
  'experience',
  'projects',
  'skills',
  'certifications',
  'research',
  'thesis',
  'startups',
  'achievements',
  'languages',
  'interests',
  'other_sections',
] as const;

export type SectionKey = (typeof SECTION_KEYS)[number];

// Only populated sections are present; key order follows SECTION_KEYS
export type SectionMap = Partial<Record<SectionKey, string[]>>;

export type Rating = 'Excellent' | 'Very Good' | 'Good' | 'Fair' | 'Needs Improvement';

export type RatingColor = 'green' | 'blue' | 'yellow' | 'orange' | 'red';

export type Criterion =
  | 'Contact Information'
  | 'Education'
  | 'Work Experience'
  | 'Skills'
  | 'Projects'
  | 'Certifications'
  | 'Research & Publications'
  | 'Formatting & Keywords';

export interface SubScore {
  score: number;
  max: number;
}

export interface ScoreReport {
  readonly score: number;
  readonly maxScore: number;
  readonly percentage: number;
  readonly rating: Rating;
  readonly ratingColor: RatingColor;
  readonly feedback: readonly string[];
  readonly scoringBreakdown: Readonly<Record<Criterion, Readonly<SubScore>>>;
  readonly recommendations: readonly string[];
}
