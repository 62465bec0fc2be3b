import { isValidObjectId, type HydratedDocument } from 'mongoose';
import { connectToDatabase } from '../mongoose';
import { Application, type ApplicationStatus, type IApplication } from '../models/application';
import type { OpportunityKind } from '../models/opportunity';

export interface ApplicationRecord
  extends Omit<IApplication, 'appliedAt' | 'updatedAt' | 'reviewedAt'> {
  id: string;
  appliedAt: string;
  updatedAt: string | null;
  reviewedAt: string | null;
}

export interface ApplicationFilter {
  studentId?: string;
  opportunityId?: string;
  opportunityType?: OpportunityKind;
  status?: ApplicationStatus;
}

export type NewApplication = Omit<
  IApplication,
  'status' | 'adminNotes' | 'reviewedBy' | 'reviewedAt' | 'appliedAt' | 'updatedAt'
>;

export type ApplicationUpdate = Partial<
  Pick<IApplication, 'resumeLink' | 'submissionLink' | 'additionalLinks' | 'coverLetter' | 'status' | 'adminNotes' | 'reviewedBy' | 'reviewedAt'>
>;

function toApplicationRecord(doc: HydratedDocument<IApplication>): ApplicationRecord {
  return {
    id: doc.id,
    studentId: doc.studentId,
    studentName: doc.studentName,
    studentEmail: doc.studentEmail,
    studentBranch: doc.studentBranch,
    studentYear: doc.studentYear,
    studentCgpa: doc.studentCgpa,
    opportunityId: doc.opportunityId,
    opportunityType: doc.opportunityType,
    opportunityTitle: doc.opportunityTitle,
    resumeLink: doc.resumeLink,
    submissionLink: doc.submissionLink,
    additionalLinks: [...doc.additionalLinks],
    coverLetter: doc.coverLetter,
    status: doc.status,
    adminNotes: doc.adminNotes,
    reviewedBy: doc.reviewedBy,
    reviewedAt: doc.reviewedAt ? doc.reviewedAt.toISOString() : null,
    appliedAt: doc.appliedAt.toISOString(),
    updatedAt: doc.updatedAt ? doc.updatedAt.toISOString() : null,
  };
}

// Undefined filter values would be sent to MongoDB as null
function toQuery(filter: ApplicationFilter): ApplicationFilter {
  const query: ApplicationFilter = {};
  if (filter.studentId) query.studentId = filter.studentId;
  if (filter.opportunityId) query.opportunityId = filter.opportunityId;
  if (filter.opportunityType) query.opportunityType = filter.opportunityType;
  if (filter.status) query.status = filter.status;
  return query;
}

export async function listApplications(filter: ApplicationFilter): Promise<ApplicationRecord[]> {
  await connectToDatabase();
  const docs = await Application.find(toQuery(filter)).sort({ appliedAt: -1 });
  return docs.map(toApplicationRecord);
}

export async function countApplications(filter: ApplicationFilter): Promise<number> {
  await connectToDatabase();
  return Application.countDocuments(toQuery(filter));
}

export async function findApplicationById(id: string): Promise<ApplicationRecord | null> {
  if (!isValidObjectId(id)) return null;
  await connectToDatabase();
  const doc = await Application.findById(id);
  return doc ? toApplicationRecord(doc) : null;
}

export async function createApplication(input: NewApplication): Promise<ApplicationRecord> {
  await connectToDatabase();
  const doc = await Application.create({
    ...input,
    status: 'pending',
    adminNotes: '',
    appliedAt: new Date(),
  });
  return toApplicationRecord(doc);
}

export async function updateApplication(
  id: string,
  fields: ApplicationUpdate,
): Promise<ApplicationRecord | null> {
  if (!isValidObjectId(id)) return null;
  await connectToDatabase();
  const doc = await Application.findByIdAndUpdate(id, { $set: fields }, { new: true, runValidators: true });
  return doc ? toApplicationRecord(doc) : null;
}

export async function deleteApplication(id: string): Promise<boolean> {
  if (!isValidObjectId(id)) return false;
  await connectToDatabase();
  const result = await Application.deleteOne({ _id: id });
  return result.deletedCount > 0;
}
