import { z } from 'zod';
import type { ApplicationStatus } from '@/lib/db/models/application';
import type { OpportunityKind } from '@/lib/db/models/opportunity';
import { countApplications, listApplications, type ApplicationRecord } from '@/lib/db/repositories/applications';
import {
  createOpportunity,
  deleteOpportunity,
  findOpportunity,
  listOpportunities,
  updateOpportunity,
  type OpportunityRecord,
} from '@/lib/db/repositories/opportunities';
import { NotFoundError } from '@/lib/http';

// URL segment -> stored kind
const KIND_SEGMENTS = new Map<string, OpportunityKind>([
  ['projects', 'project'],
  ['research', 'research'],
  ['patents', 'patent'],
]);

const KIND_LABELS: Record<OpportunityKind, string> = {
  project: 'Project',
  research: 'Research opportunity',
  patent: 'Patent',
};

export function kindFromSegment(segment: string): OpportunityKind {
  const kind = KIND_SEGMENTS.get(segment);
  if (!kind) {
    throw new NotFoundError(`Unknown opportunity type: ${segment}`);
  }
  return kind;
}

export function kindLabel(kind: OpportunityKind): string {
  return KIND_LABELS[kind];
}

export const opportunityInputSchema = z.object({
  title: z.string({ required_error: 'Missing required field: title' }).trim().min(1, 'Missing required field: title'),
  domain: z.string({ required_error: 'Missing required field: domain' }).trim().min(1, 'Missing required field: domain'),
  studentsRequired: z.coerce
    .number({ invalid_type_error: 'studentsRequired must be a number' })
    .int('studentsRequired must be a whole number')
    .min(0, 'studentsRequired cannot be negative'),
  googleFormLink: z
    .string({ required_error: 'Missing required field: googleFormLink' })
    .trim()
    .min(1, 'Missing required field: googleFormLink'),
  duration: z.string().default(''),
  deadline: z.string().default(''),
  description: z.string().default(''),
  requirements: z.string().default(''),
  professors: z.array(z.string()).default([]),
  students: z.array(z.string()).default([]),
});

export type OpportunityInput = z.infer<typeof opportunityInputSchema>;

export const opportunityUpdateSchema = z
  .object({
    title: z.string().trim().min(1),
    domain: z.string().trim().min(1),
    studentsRequired: z.coerce.number().int().min(0),
    googleFormLink: z.string().trim().min(1),
    duration: z.string(),
    deadline: z.string(),
    description: z.string(),
    requirements: z.string(),
    professors: z.array(z.string()),
    students: z.array(z.string()),
    status: z.enum(['active', 'closed']),
  })
  .partial();

export type OpportunityUpdateInput = z.infer<typeof opportunityUpdateSchema>;

export interface AdminOpportunity extends OpportunityRecord {
  applicationCount: number;
}

export interface StudentOpportunity extends OpportunityRecord {
  hasApplied: boolean;
  applicationStatus: ApplicationStatus | null;
}

export interface ApplicationStats {
  total: number;
  pending: number;
  approved: number;
  rejected: number;
}

export async function listAdminOpportunities(kind: OpportunityKind): Promise<AdminOpportunity[]> {
  const opportunities = await listOpportunities(kind);
  return Promise.all(
    opportunities.map(async (opportunity) => ({
      ...opportunity,
      applicationCount: await countApplications({ opportunityId: opportunity.id, opportunityType: kind }),
    })),
  );
}

export async function createAdminOpportunity(
  kind: OpportunityKind,
  createdBy: string,
  input: OpportunityInput,
): Promise<AdminOpportunity> {
  const opportunity = await createOpportunity({ ...input, kind, createdBy });
  return { ...opportunity, applicationCount: 0 };
}

export async function updateAdminOpportunity(
  kind: OpportunityKind,
  id: string,
  input: OpportunityUpdateInput,
): Promise<OpportunityRecord> {
  const updated = await updateOpportunity(kind, id, input);
  if (!updated) {
    throw new NotFoundError(`${kindLabel(kind)} not found`);
  }
  return updated;
}

export async function deleteAdminOpportunity(kind: OpportunityKind, id: string): Promise<void> {
  const deleted = await deleteOpportunity(kind, id);
  if (!deleted) {
    throw new NotFoundError(`${kindLabel(kind)} not found`);
  }
}

/**
 * Active opportunities of one kind, each marked with the student's own application (if any).
 */
export async function listStudentOpportunities(
  kind: OpportunityKind,
  studentId: string,
): Promise<StudentOpportunity[]> {
  const [opportunities, applications] = await Promise.all([
    listOpportunities(kind, 'active'),
    listApplications({ studentId, opportunityType: kind }),
  ]);

  const statusByOpportunity = new Map(applications.map((a) => [a.opportunityId, a.status]));

  return opportunities.map((opportunity) => {
    const status = statusByOpportunity.get(opportunity.id) ?? null;
    return { ...opportunity, hasApplied: status !== null, applicationStatus: status };
  });
}

export function summarizeApplications(applications: ApplicationRecord[]): ApplicationStats {
  return {
    total: applications.length,
    pending: applications.filter((a) => a.status === 'pending').length,
    approved: applications.filter((a) => a.status === 'approved').length,
    rejected: applications.filter((a) => a.status === 'rejected').length,
  };
}

export async function listOpportunityApplications(
  kind: OpportunityKind,
  id: string,
): Promise<{ applications: ApplicationRecord[]; stats: ApplicationStats }> {
  const opportunity = await findOpportunity(kind, id);
  if (!opportunity) {
    throw new NotFoundError(`${kindLabel(kind)} not found`);
  }

  const applications = await listApplications({ opportunityId: id, opportunityType: kind });
  return { applications, stats: summarizeApplications(applications) };
}
