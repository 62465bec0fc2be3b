import type { ApplicationRecord } from '@/lib/db/repositories/applications';
import type { OpportunityRecord } from '@/lib/db/repositories/opportunities';
import type { PersonalProjectRecord } from '@/lib/db/repositories/personal-projects';
import type { UserRecord } from '@/lib/db/repositories/users';

export const SAMPLE_RESUME = [
  'Jane Smith',
  'jane.smith@example.com | +1 555 123 4567',
  '',
  'Education',
  'B.Sc. Computer Science, 2020',
  '',
  'Experience',
  'Developed billing APIs serving 2M requests',
  'Led a team of 4 engineers',
  'Improved query latency by 40%',
  'Optimized CI pipeline to run in 8 minutes',
  '',
  'Projects',
  'Built a resume parser in TypeScript',
  'Launched a campus events app',
  '',
  'Skills',
  'TypeScript, Node.js, MongoDB, Docker',
  '',
  'Certifications',
  'AWS Certified Developer',
].join('\n');

export const SHORT_RESUME =
  'John Doe\njohn@example.com\n9876543210\n\nEducation\nBTech Computer Science, XYZ Institute\n\nSkills\nPython, Go, SQL';

export function makeUser(overrides: Partial<UserRecord> = {}): UserRecord {
  return {
    id: '65f000000000000000000001',
    email: 'student@example.com',
    name: 'Test Student',
    userType: 'student',
    onboardingCompleted: true,
    field: 'Computer Science',
    year: '3',
    cgpa: 8.5,
    mobile: '',
    rollNo: 'CS001',
    resumeUrl: '',
    performanceDocUrl: '',
    linkedinProfile: '',
    githubProfile: '',
    skills: [],
    techStack: [],
    aiTools: [],
    experiences: [],
    certifications: [],
    projects: [],
    createdAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeOpportunity(overrides: Partial<OpportunityRecord> = {}): OpportunityRecord {
  return {
    id: '65f0000000000000000000a1',
    kind: 'project',
    title: 'Campus Navigation App',
    domain: 'Mobile',
    studentsRequired: 3,
    duration: '3 months',
    deadline: '2024-06-30',
    googleFormLink: 'https://forms.gle/test',
    description: '',
    requirements: '',
    professors: ['Dr. Rao'],
    students: [],
    createdBy: '65f0000000000000000000ff',
    status: 'active',
    createdAt: '2024-03-01T00:00:00.000Z',
    updatedAt: null,
    ...overrides,
  };
}

export function makeApplication(overrides: Partial<ApplicationRecord> = {}): ApplicationRecord {
  return {
    id: '65f0000000000000000000b1',
    studentId: '65f000000000000000000001',
    studentName: 'Test Student',
    studentEmail: 'student@example.com',
    studentBranch: 'Computer Science',
    studentYear: '3',
    studentCgpa: 8.5,
    opportunityId: '65f0000000000000000000a1',
    opportunityType: 'project',
    opportunityTitle: 'Campus Navigation App',
    resumeLink: 'https://drive.google.com/file/d/resume/view',
    submissionLink: 'https://drive.google.com/file/d/submission/view',
    additionalLinks: [],
    coverLetter: '',
    status: 'pending',
    adminNotes: '',
    reviewedAt: null,
    appliedAt: '2024-03-02T00:00:00.000Z',
    updatedAt: null,
    ...overrides,
  };
}

export function makePersonalProject(overrides: Partial<PersonalProjectRecord> = {}): PersonalProjectRecord {
  return {
    id: '65f0000000000000000000c1',
    userId: '65f000000000000000000001',
    title: 'Expense Splitter',
    githubLink: 'https://github.com/test-student/expense-splitter',
    websiteLink: '',
    techStack: ['TypeScript', 'Next.js'],
    createdAt: '2024-03-05T00:00:00.000Z',
    updatedAt: '2024-03-05T00:00:00.000Z',
    ...overrides,
  };
}

export function sessionFor(user: UserRecord, accessToken: string | undefined = 'test-token') {
  return {
    user: { email: user.email, name: user.name, id: user.id, userType: user.userType },
    accessToken,
    expires: '2099-01-01T00:00:00.000Z',
  };
}
