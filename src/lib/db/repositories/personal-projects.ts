import { isValidObjectId, type HydratedDocument } from 'mongoose';
import { connectToDatabase } from '../mongoose';
import { PersonalProject, type IPersonalProject } from '../models/personal-project';

export interface PersonalProjectRecord extends Omit<IPersonalProject, 'createdAt' | 'updatedAt'> {
  id: string;
  createdAt: string | null;
  updatedAt: string | null;
}

export type NewPersonalProject = Omit<IPersonalProject, 'createdAt' | 'updatedAt'>;

export type PersonalProjectUpdate = Partial<
  Pick<IPersonalProject, 'title' | 'githubLink' | 'websiteLink' | 'techStack'>
>;

function toPersonalProjectRecord(doc: HydratedDocument<IPersonalProject>): PersonalProjectRecord {
  return {
    id: doc.id,
    userId: doc.userId,
    title: doc.title,
    githubLink: doc.githubLink,
    websiteLink: doc.websiteLink,
    techStack: [...doc.techStack],
    createdAt: doc.createdAt ? doc.createdAt.toISOString() : null,
    updatedAt: doc.updatedAt ? doc.updatedAt.toISOString() : null,
  };
}

export async function listPersonalProjects(userId: string): Promise<PersonalProjectRecord[]> {
  await connectToDatabase();
  const docs = await PersonalProject.find({ userId }).sort({ createdAt: -1 });
  return docs.map(toPersonalProjectRecord);
}

export async function countPersonalProjects(userId: string): Promise<number> {
  await connectToDatabase();
  return PersonalProject.countDocuments({ userId });
}

export async function createPersonalProject(input: NewPersonalProject): Promise<PersonalProjectRecord> {
  await connectToDatabase();
  const doc = await PersonalProject.create(input);
  return toPersonalProjectRecord(doc);
}

// Both writes match on the owner too, so another user's id behaves like a missing one
export async function updatePersonalProject(
  userId: string,
  id: string,
  fields: PersonalProjectUpdate,
): Promise<PersonalProjectRecord | null> {
  if (!isValidObjectId(id)) return null;
  await connectToDatabase();
  const doc = await PersonalProject.findOneAndUpdate(
    { _id: id, userId },
    { $set: fields },
    { new: true, runValidators: true },
  );
  return doc ? toPersonalProjectRecord(doc) : null;
}

export async function deletePersonalProject(userId: string, id: string): Promise<boolean> {
  if (!isValidObjectId(id)) return false;
  await connectToDatabase();
  const result = await PersonalProject.deleteOne({ _id: id, userId });
  return result.deletedCount > 0;
}
