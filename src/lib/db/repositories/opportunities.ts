import { isValidObjectId, type HydratedDocument } from 'mongoose';
import { connectToDatabase } from '../mongoose';
import {
  Opportunity,
  type IOpportunity,
  type OpportunityKind,
  type OpportunityStatus,
} from '../models/opportunity';

export interface OpportunityRecord extends Omit<IOpportunity, 'createdAt' | 'updatedAt'> {
  id: string;
  createdAt: string | null;
  updatedAt: string | null;
}

export type NewOpportunity = Omit<IOpportunity, 'status' | 'createdAt' | 'updatedAt'>;

export type OpportunityUpdate = Partial<Omit<IOpportunity, 'kind' | 'createdBy' | 'createdAt' | 'updatedAt'>>;

function toOpportunityRecord(doc: HydratedDocument<IOpportunity>): OpportunityRecord {
  return {
    id: doc.id,
    kind: doc.kind,
    title: doc.title,
    domain: doc.domain,
    studentsRequired: doc.studentsRequired,
    duration: doc.duration,
    deadline: doc.deadline,
    googleFormLink: doc.googleFormLink,
    description: doc.description,
    requirements: doc.requirements,
    professors: [...doc.professors],
    students: [...doc.students],
    createdBy: doc.createdBy,
    status: doc.status,
    createdAt: doc.createdAt ? doc.createdAt.toISOString() : null,
    updatedAt: doc.updatedAt ? doc.updatedAt.toISOString() : null,
  };
}

export async function listOpportunities(
  kind: OpportunityKind,
  status?: OpportunityStatus,
): Promise<OpportunityRecord[]> {
  await connectToDatabase();
  const query = status ? { kind, status } : { kind };
  const docs = await Opportunity.find(query).sort({ createdAt: -1 });
  return docs.map(toOpportunityRecord);
}

export async function findOpportunity(kind: OpportunityKind, id: string): Promise<OpportunityRecord | null> {
  if (!isValidObjectId(id)) return null;
  await connectToDatabase();
  const doc = await Opportunity.findOne({ _id: id, kind });
  return doc ? toOpportunityRecord(doc) : null;
}

export async function createOpportunity(input: NewOpportunity): Promise<OpportunityRecord> {
  await connectToDatabase();
  const doc = await Opportunity.create({ ...input, status: 'active' });
  return toOpportunityRecord(doc);
}

export async function updateOpportunity(
  kind: OpportunityKind,
  id: string,
  fields: OpportunityUpdate,
): Promise<OpportunityRecord | null> {
  if (!isValidObjectId(id)) return null;
  await connectToDatabase();
  const doc = await Opportunity.findOneAndUpdate(
    { _id: id, kind },
    { $set: fields },
    { new: true, runValidators: true },
  );
  return doc ? toOpportunityRecord(doc) : null;
}

export async function deleteOpportunity(kind: OpportunityKind, id: string): Promise<boolean> {
  if (!isValidObjectId(id)) return false;
  await connectToDatabase();
  const result = await Opportunity.deleteOne({ _id: id, kind });
  return result.deletedCount > 0;
}
