import { Schema } from 'mongoose';
import { defineModel } from '../mongoose';
import { OPPORTUNITY_KINDS, type OpportunityKind } from './opportunity';

export const APPLICATION_STATUSES = ['pending', 'approved', 'rejected'] as const;
export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

export interface IApplication {
  studentId: string;
  studentName: string;
  studentEmail: string;
  studentBranch: string;
  studentYear: string;
  studentCgpa: number;
  opportunityId: string;
  opportunityType: OpportunityKind;
  opportunityTitle: string;
  resumeLink: string;
  submissionLink: string;
  additionalLinks: string[];
  coverLetter: string;
  status: ApplicationStatus;
  adminNotes: string;
  reviewedBy?: string;
  reviewedAt?: Date;
  appliedAt: Date;
  updatedAt?: Date;
}

const applicationSchema = new Schema<IApplication>(
  {
    studentId: { type: String, required: true, index: true },
    studentName: { type: String, default: 'Unknown' },
    studentEmail: { type: String, default: '' },
    studentBranch: { type: String, default: 'Not specified' },
    studentYear: { type: String, default: 'Not specified' },
    studentCgpa: { type: Number, default: 0 },
    opportunityId: { type: String, required: true, index: true },
    opportunityType: { type: String, enum: OPPORTUNITY_KINDS, required: true, index: true },
    opportunityTitle: { type: String, default: '' },
    resumeLink: { type: String, required: true },
    submissionLink: { type: String, required: true },
    additionalLinks: { type: [String], default: [] },
    coverLetter: { type: String, default: '' },
    status: { type: String, enum: APPLICATION_STATUSES, default: 'pending', index: true },
    adminNotes: { type: String, default: '' },
    reviewedBy: { type: String, required: false },
    reviewedAt: { type: Date, required: false },
    appliedAt: { type: Date, default: Date.now, index: true },
  },
  { timestamps: { createdAt: false, updatedAt: true } },
);

applicationSchema.index({ opportunityId: 1, opportunityType: 1, status: 1 });
applicationSchema.index({ studentId: 1, opportunityId: 1, opportunityType: 1 }, { unique: true });

export const Application = defineModel<IApplication>('Application', applicationSchema);
