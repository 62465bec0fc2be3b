import { z } from 'zod';
import { APPLICATION_STATUSES } from '@/lib/db/models/application';
import { OPPORTUNITY_KINDS } from '@/lib/db/models/opportunity';
import { isDuplicateKeyError } from '@/lib/db/mongoose';
import {
  countApplications,
  createApplication,
  deleteApplication,
  findApplicationById,
  listApplications,
  updateApplication,
  type ApplicationFilter,
  type ApplicationRecord,
  type ApplicationUpdate,
} from '@/lib/db/repositories/applications';
import { findOpportunity } from '@/lib/db/repositories/opportunities';
import type { UserRecord } from '@/lib/db/repositories/users';
import { isDriveLink } from '@/lib/google/drive';
import { BadRequestError, ConflictError, ForbiddenError, NotFoundError } from '@/lib/http';
import { debug } from '@/lib/debug';

const INVALID_RESUME_LINK = 'Resume link must be a Google Drive or Docs link';
const INVALID_SUBMISSION_LINK = 'Submission link must be a Google Drive or Docs link';

function required(field: string) {
  return z
    .string({ required_error: `Missing required field: ${field}` })
    .trim()
    .min(1, `Missing required field: ${field}`);
}

export const applicationInputSchema = z.object({
  opportunityId: required('opportunityId'),
  opportunityType: z.enum(OPPORTUNITY_KINDS, {
    errorMap: () => ({ message: 'Invalid opportunity type' }),
  }),
  resumeLink: required('resumeLink').refine(isDriveLink, INVALID_RESUME_LINK),
  submissionLink: required('submissionLink').refine(isDriveLink, INVALID_SUBMISSION_LINK),
  additionalLinks: z.array(z.string()).default([]),
  coverLetter: z.string().default(''),
});

export type ApplicationInput = z.infer<typeof applicationInputSchema>;

export const applicationUpdateSchema = z
  .object({
    resumeLink: z.string().trim().refine(isDriveLink, INVALID_RESUME_LINK),
    submissionLink: z.string().trim().refine(isDriveLink, INVALID_SUBMISSION_LINK),
    additionalLinks: z.array(z.string()),
    coverLetter: z.string(),
  })
  .partial();

export type ApplicationUpdateInput = z.infer<typeof applicationUpdateSchema>;

export const statusUpdateSchema = z.object({
  status: z.enum(APPLICATION_STATUSES, {
    errorMap: () => ({ message: 'Invalid status. Must be pending, approved or rejected' }),
  }),
  adminNotes: z.string().default(''),
});

export type StatusUpdateInput = z.infer<typeof statusUpdateSchema>;

export const applicationFilterSchema = z.object({
  opportunityType: z.enum(OPPORTUNITY_KINDS).optional(),
  status: z.enum(APPLICATION_STATUSES).optional(),
  opportunityId: z.string().optional(),
});

export async function submitApplication(
  student: UserRecord,
  input: ApplicationInput,
): Promise<ApplicationRecord> {
  const opportunity = await findOpportunity(input.opportunityType, input.opportunityId);
  if (!opportunity) {
    throw new NotFoundError('Opportunity not found');
  }

  const existing = await countApplications({
    studentId: student.id,
    opportunityId: opportunity.id,
    opportunityType: input.opportunityType,
  });
  if (existing > 0) {
    throw new ConflictError('You have already applied to this opportunity');
  }

  debug(`Application from ${student.email} for ${opportunity.kind} ${opportunity.id}`);

  try {
    return await createApplication({
      studentId: student.id,
      studentName: student.name || 'Unknown',
      studentEmail: student.email,
      studentBranch: student.field || 'Not specified',
      studentYear: student.year || 'Not specified',
      studentCgpa: student.cgpa,
      opportunityId: opportunity.id,
      opportunityType: input.opportunityType,
      opportunityTitle: opportunity.title,
      resumeLink: input.resumeLink,
      submissionLink: input.submissionLink,
      additionalLinks: input.additionalLinks,
      coverLetter: input.coverLetter,
    });
  } catch (error) {
    // Two submissions can both pass the count above; the unique index catches the second
    if (isDuplicateKeyError(error)) {
      throw new ConflictError('You have already applied to this opportunity');
    }
    throw error;
  }
}

export function listOwnApplications(studentId: string): Promise<ApplicationRecord[]> {
  return listApplications({ studentId });
}

async function findOwnPendingApplication(
  studentId: string,
  id: string,
  action: 'update' | 'withdraw',
): Promise<ApplicationRecord> {
  const application = await findApplicationById(id);
  if (!application) {
    throw new NotFoundError('Application not found');
  }
  if (application.studentId !== studentId) {
    throw new ForbiddenError();
  }
  if (application.status !== 'pending') {
    throw new BadRequestError(`Can only ${action} pending applications`);
  }
  return application;
}

export async function updateOwnApplication(
  studentId: string,
  id: string,
  input: ApplicationUpdateInput,
): Promise<ApplicationRecord> {
  await findOwnPendingApplication(studentId, id, 'update');

  const updated = await updateApplication(id, input);
  if (!updated) {
    throw new NotFoundError('Application not found');
  }
  return updated;
}

export async function withdrawApplication(studentId: string, id: string): Promise<void> {
  await findOwnPendingApplication(studentId, id, 'withdraw');

  const deleted = await deleteApplication(id);
  if (!deleted) {
    throw new NotFoundError('Application not found');
  }
}

export async function listAllApplications(
  filter: ApplicationFilter,
): Promise<{ applications: ApplicationRecord[]; total: number }> {
  const applications = await listApplications(filter);
  return { applications, total: applications.length };
}

export async function setApplicationStatus(
  adminId: string,
  id: string,
  input: StatusUpdateInput,
): Promise<ApplicationRecord> {
  const update: ApplicationUpdate = {
    status: input.status,
    adminNotes: input.adminNotes,
    reviewedBy: adminId,
    reviewedAt: new Date(),
  };

  const updated = await updateApplication(id, update);
  if (!updated) {
    throw new NotFoundError('Application not found');
  }
  return updated;
}
