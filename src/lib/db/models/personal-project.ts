import { Schema } from 'mongoose';
import { defineModel } from '../mongoose';

export interface IPersonalProject {
  userId: string;
  title: string;
  githubLink: string;
  websiteLink: string;
  techStack: string[];
  createdAt?: Date;
  updatedAt?: Date;
}

const personalProjectSchema = new Schema<IPersonalProject>(
  {
    userId: { type: String, required: true, index: true },
    title: { type: String, required: true, trim: true },
    githubLink: { type: String, default: '' },
    websiteLink: { type: String, default: '' },
    techStack: { type: [String], default: [] },
  },
  { timestamps: true },
);

export const PersonalProject = defineModel<IPersonalProject>('PersonalProject', personalProjectSchema);
