import { z } from 'zod';
import {
  createPersonalProject,
  deletePersonalProject,
  listPersonalProjects,
  updatePersonalProject,
  type PersonalProjectRecord,
} from '@/lib/db/repositories/personal-projects';
import { NotFoundError } from '@/lib/http';

const title = z.string({ required_error: 'Title is required' }).trim().min(1, 'Title is required');

export const personalProjectSchema = z.object({
  title,
  githubLink: z.string().trim().default(''),
  websiteLink: z.string().trim().default(''),
  techStack: z.array(z.string().trim()).default([]),
});

export type PersonalProjectInput = z.infer<typeof personalProjectSchema>;

// Only the fields present in the body are written
export const personalProjectUpdateSchema = z
  .object({
    title,
    githubLink: z.string().trim(),
    websiteLink: z.string().trim(),
    techStack: z.array(z.string().trim()),
  })
  .partial();

export type PersonalProjectUpdateInput = z.infer<typeof personalProjectUpdateSchema>;

export function listOwnProjects(userId: string): Promise<PersonalProjectRecord[]> {
  return listPersonalProjects(userId);
}

export function addOwnProject(userId: string, input: PersonalProjectInput): Promise<PersonalProjectRecord> {
  return createPersonalProject({ userId, ...input });
}

export async function updateOwnProject(
  userId: string,
  id: string,
  input: PersonalProjectUpdateInput,
): Promise<PersonalProjectRecord> {
  const updated = await updatePersonalProject(userId, id, input);
  if (!updated) {
    throw new NotFoundError('Project not found');
  }
  return updated;
}

export async function deleteOwnProject(userId: string, id: string): Promise<void> {
  const deleted = await deletePersonalProject(userId, id);
  if (!deleted) {
    throw new NotFoundError('Project not found');
  }
}
