import { z } from 'zod';
import { createHelpReport } from '@/lib/db/repositories/help-reports';
import type { UserRecord } from '@/lib/db/repositories/users';

export const helpReportSchema = z.object({
  title: z
    .string({ required_error: 'Title and description are required' })
    .trim()
    .min(1, 'Title and description are required'),
  description: z
    .string({ required_error: 'Title and description are required' })
    .trim()
    .min(1, 'Title and description are required'),
});

export type HelpReportInput = z.infer<typeof helpReportSchema>;

export function submitHelpReport(user: UserRecord, input: HelpReportInput): Promise<{ id: string }> {
  return createHelpReport({
    userId: user.id,
    userEmail: user.email,
    userName: user.name,
    userType: user.userType,
    title: input.title,
    description: input.description,
  });
}
