import { z } from 'zod';
import { updateUser, type UserProfileUpdate, type UserRecord } from '@/lib/db/repositories/users';
import { isDriveLink } from '@/lib/google/drive';
import { BadRequestError, NotFoundError } from '@/lib/http';

const entrySchema = z.record(z.unknown());

export const profileUpdateSchema = z
  .object({
    name: z.string().trim(),
    field: z.string(),
    year: z.string(),
    cgpa: z.coerce.number().min(0, 'CGPA cannot be negative'),
    mobile: z.string(),
    resumeUrl: z.string().trim(),
    performanceDocUrl: z.string().trim(),
    rollNo: z.string(),
    skills: z.array(z.string()),
    techStack: z.array(z.string()),
    aiTools: z.array(z.string()),
    experiences: z.array(entrySchema),
    certifications: z.array(entrySchema),
    projects: z.array(entrySchema),
    onboardingCompleted: z.boolean(),
  })
  .partial();

export type ProfileUpdateInput = z.infer<typeof profileUpdateSchema>;

export const ONBOARDING_STEPS = [
  'basic_info',
  'experiences',
  'certifications',
  'projects',
  'skills',
  'tech_stack',
  'ai_tools',
] as const;

export type OnboardingStep = (typeof ONBOARDING_STEPS)[number];

export const onboardingDataSchema = z
  .object({
    field: z.string(),
    year: z.string(),
    mobile: z.string(),
    cgpa: z.coerce.number().min(0),
    rollNo: z.string(),
    experiences: z.array(entrySchema),
    linkedinProfile: z.string(),
    achievements: z.array(entrySchema),
    projects: z.array(entrySchema),
    githubProfile: z.string(),
    skills: z.array(z.string()),
    techStack: z.array(z.string()),
    aiTools: z.array(z.string()),
  })
  .partial();

export type OnboardingData = z.infer<typeof onboardingDataSchema>;

export type UserProfile = Omit<UserRecord, 'image' | 'linkedinProfile' | 'githubProfile' | 'createdAt'>;

export function toProfile(user: UserRecord): UserProfile {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    userType: user.userType,
    field: user.field,
    year: user.year,
    cgpa: user.cgpa,
    mobile: user.mobile,
    resumeUrl: user.resumeUrl,
    performanceDocUrl: user.performanceDocUrl,
    onboardingCompleted: user.onboardingCompleted,
    rollNo: user.rollNo,
    skills: user.skills,
    techStack: user.techStack,
    aiTools: user.aiTools,
    experiences: user.experiences,
    certifications: user.certifications,
    projects: user.projects,
  };
}

export async function updateProfile(user: UserRecord, input: ProfileUpdateInput): Promise<UserProfile> {
  if (input.resumeUrl && !isDriveLink(input.resumeUrl)) {
    throw new BadRequestError('Invalid resume URL. Must be a Google Drive or Docs link');
  }

  const updated = await updateUser(user.id, input);
  if (!updated) {
    throw new NotFoundError('User not found');
  }
  return toProfile(updated);
}

// Only the fields that belong to the submitted step are written
export function onboardingUpdate(
  step: OnboardingStep | undefined,
  data: OnboardingData,
  completed: boolean,
): UserProfileUpdate {
  const update: UserProfileUpdate = {};

  switch (step) {
    case 'basic_info':
      if (data.field !== undefined) update.field = data.field;
      if (data.year !== undefined) update.year = data.year;
      if (data.mobile !== undefined) update.mobile = data.mobile;
      if (data.cgpa !== undefined) update.cgpa = data.cgpa;
      if (data.rollNo !== undefined) update.rollNo = data.rollNo;
      break;
    case 'experiences':
      update.experiences = data.experiences ?? [];
      if (data.linkedinProfile) update.linkedinProfile = data.linkedinProfile;
      break;
    case 'certifications':
      update.certifications = data.achievements ?? [];
      break;
    case 'projects':
      update.projects = data.projects ?? [];
      if (data.githubProfile) update.githubProfile = data.githubProfile;
      break;
    case 'skills':
      update.skills = data.skills ?? [];
      break;
    case 'tech_stack':
      update.techStack = data.techStack ?? [];
      break;
    case 'ai_tools':
      update.aiTools = data.aiTools ?? [];
      break;
    case undefined:
      break;
  }

  if (completed) {
    update.onboardingCompleted = true;
  }
  return update;
}

export async function saveOnboardingStep(
  user: UserRecord,
  step: OnboardingStep | undefined,
  data: OnboardingData,
  completed: boolean,
): Promise<void> {
  const update = onboardingUpdate(step, data, completed);
  if (Object.keys(update).length === 0) return;

  const updated = await updateUser(user.id, update);
  if (!updated) {
    throw new NotFoundError('User not found');
  }
}
