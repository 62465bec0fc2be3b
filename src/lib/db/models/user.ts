import { Schema } from 'mongoose';
import { defineModel } from '../mongoose';

export type UserType = 'student' | 'admin';

// Free-form entries captured during onboarding (company, role, links, ...)
export type ProfileEntry = Record<string, unknown>;

export interface IUser {
  email: string;
  name: string;
  image?: string;
  userType: UserType;
  onboardingCompleted: boolean;
  field: string;
  year: string;
  cgpa: number;
  mobile: string;
  rollNo: string;
  resumeUrl: string;
  performanceDocUrl: string;
  linkedinProfile: string;
  githubProfile: string;
  skills: string[];
  techStack: string[];
  aiTools: string[];
  experiences: ProfileEntry[];
  certifications: ProfileEntry[];
  projects: ProfileEntry[];
  createdAt?: Date;
  updatedAt?: Date;
}

const userSchema = new Schema<IUser>(
  {
    email: { type: String, required: true, unique: true, lowercase: true, trim: true },
    name: { type: String, default: '', trim: true },
    image: { type: String, required: false },
    userType: { type: String, enum: ['student', 'admin'], default: 'student', index: true },
    onboardingCompleted: { type: Boolean, default: false, index: true },
    field: { type: String, default: '' },
    year: { type: String, default: '' },
    cgpa: { type: Number, default: 0 },
    mobile: { type: String, default: '' },
    rollNo: { type: String, default: '' },
    resumeUrl: { type: String, default: '' },
    performanceDocUrl: { type: String, default: '' },
    linkedinProfile: { type: String, default: '' },
    githubProfile: { type: String, default: '' },
    skills: { type: [String], default: [] },
    techStack: { type: [String], default: [] },
    aiTools: { type: [String], default: [] },
    experiences: { type: [Schema.Types.Mixed], default: [] },
    certifications: { type: [Schema.Types.Mixed], default: [] },
    projects: { type: [Schema.Types.Mixed], default: [] },
  },
  { timestamps: true },
);

export const User = defineModel<IUser>('User', userSchema);
