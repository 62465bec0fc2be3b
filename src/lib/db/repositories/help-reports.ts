import { connectToDatabase } from '../mongoose';
import { HelpReport, type IHelpReport } from '../models/help-report';

export type NewHelpReport = Omit<IHelpReport, 'status' | 'createdAt'>;

export async function createHelpReport(input: NewHelpReport): Promise<{ id: string }> {
  await connectToDatabase();
  const doc = await HelpReport.create({ ...input, status: 'open' });
  return { id: doc.id };
}
