import { z } from 'zod';
import { countApplications } from '@/lib/db/repositories/applications';
import { countPersonalProjects } from '@/lib/db/repositories/personal-projects';
import { listStudents, type UserRecord } from '@/lib/db/repositories/users';

export const studentFilterSchema = z.object({
  field: z.string().trim().optional(),
  year: z.string().trim().optional(),
  minCgpa: z.coerce.number({ invalid_type_error: 'minCgpa must be a number' }).optional(),
  skill: z.string().trim().optional(),
});

export type StudentFilter = z.infer<typeof studentFilterSchema>;

export interface StudentSummary {
  id: string;
  name: string;
  email: string;
  field: string;
  year: string;
  cgpa: number;
  rollNo: string;
  resumeUrl: string;
  skills: string[];
  techStack: string[];
  onboardingCompleted: boolean;
  createdAt: string | null;
  applicationsCount: number;
  projectsCount: number;
}

function sameText(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

export function matchesStudentFilter(student: UserRecord, filter: StudentFilter): boolean {
  if (filter.field && !sameText(student.field, filter.field)) return false;
  if (filter.year && !sameText(student.year, filter.year)) return false;
  if (filter.minCgpa !== undefined && student.cgpa < filter.minCgpa) return false;

  if (filter.skill) {
    const wanted = filter.skill.toLowerCase();
    const known = [...student.skills, ...student.techStack];
    if (!known.some((skill) => skill.toLowerCase().includes(wanted))) return false;
  }

  return true;
}

export async function listStudentDirectory(filter: StudentFilter): Promise<StudentSummary[]> {
  const students = (await listStudents()).filter((student) => matchesStudentFilter(student, filter));

  return Promise.all(
    students.map(async (student) => ({
      id: student.id,
      name: student.name,
      email: student.email,
      field: student.field,
      year: student.year,
      cgpa: student.cgpa,
      rollNo: student.rollNo,
      resumeUrl: student.resumeUrl,
      skills: student.skills,
      techStack: student.techStack,
      onboardingCompleted: student.onboardingCompleted,
      createdAt: student.createdAt,
      applicationsCount: await countApplications({ studentId: student.id }),
      projectsCount: await countPersonalProjects(student.id),
    })),
  );
}
