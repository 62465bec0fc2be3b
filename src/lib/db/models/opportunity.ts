import { Schema } from 'mongoose';
import { defineModel } from '../mongoose';

export const OPPORTUNITY_KINDS = ['project', 'research', 'patent'] as const;
export type OpportunityKind = (typeof OPPORTUNITY_KINDS)[number];

export type OpportunityStatus = 'active' | 'closed';

export interface IOpportunity {
  kind: OpportunityKind;
  title: string;
  domain: string;
  studentsRequired: number;
  duration: string;
  deadline: string;
  googleFormLink: string;
  description: string;
  requirements: string;
  professors: string[];
  students: string[];
  createdBy: string;
  status: OpportunityStatus;
  createdAt?: Date;
  updatedAt?: Date;
}

const opportunitySchema = new Schema<IOpportunity>(
  {
    kind: { type: String, enum: OPPORTUNITY_KINDS, required: true, index: true },
    title: { type: String, required: true, trim: true },
    domain: { type: String, required: true, trim: true },
    studentsRequired: { type: Number, required: true, min: 0 },
    duration: { type: String, default: '' },
    deadline: { type: String, default: '', index: true },
    googleFormLink: { type: String, required: true },
    description: { type: String, default: '' },
    requirements: { type: String, default: '' },
    professors: { type: [String], default: [] },
    students: { type: [String], default: [] },
    createdBy: { type: String, required: true, index: true },
    status: { type: String, enum: ['active', 'closed'], default: 'active', index: true },
  },
  { timestamps: true },
);

export const Opportunity = defineModel<IOpportunity>('Opportunity', opportunitySchema);
