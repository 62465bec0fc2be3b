import { Schema } from 'mongoose';
import { defineModel } from '../mongoose';
import type { UserType } from './user';

export interface IHelpReport {
  userId: string;
  userEmail: string;
  userName: string;
  userType: UserType;
  title: string;
  description: string;
  status: 'open' | 'resolved';
  createdAt?: Date;
}

const helpReportSchema = new Schema<IHelpReport>(
  {
    userId: { type: String, required: true, index: true },
    userEmail: { type: String, default: '' },
    userName: { type: String, default: '' },
    userType: { type: String, enum: ['student', 'admin'], required: true },
    title: { type: String, required: true },
    description: { type: String, required: true },
    status: { type: String, enum: ['open', 'resolved'], default: 'open' },
  },
  { timestamps: { createdAt: true, updatedAt: false } },
);

export const HelpReport = defineModel<IHelpReport>('HelpReport', helpReportSchema);
