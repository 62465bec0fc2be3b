import { isValidObjectId, type HydratedDocument } from 'mongoose';
import { connectToDatabase } from '../mongoose';
import { User, type IUser, type UserType } from '../models/user';

export interface UserRecord extends Omit<IUser, 'createdAt' | 'updatedAt'> {
  id: string;
  createdAt: string | null;
}

export type UserProfileUpdate = Partial<
  Omit<IUser, 'email' | 'userType' | 'image' | 'createdAt' | 'updatedAt'>
>;

export interface SignInProfile {
  email: string;
  name: string;
  image?: string;
  userType: UserType;
}

export function toUserRecord(doc: HydratedDocument<IUser>): UserRecord {
  return {
    id: doc.id,
    email: doc.email,
    name: doc.name,
    image: doc.image,
    userType: doc.userType,
    onboardingCompleted: doc.onboardingCompleted,
    field: doc.field,
    year: doc.year,
    cgpa: doc.cgpa,
    mobile: doc.mobile,
    rollNo: doc.rollNo,
    resumeUrl: doc.resumeUrl,
    performanceDocUrl: doc.performanceDocUrl,
    linkedinProfile: doc.linkedinProfile,
    githubProfile: doc.githubProfile,
    skills: [...doc.skills],
    techStack: [...doc.techStack],
    aiTools: [...doc.aiTools],
    experiences: [...doc.experiences],
    certifications: [...doc.certifications],
    projects: [...doc.projects],
    createdAt: doc.createdAt ? doc.createdAt.toISOString() : null,
  };
}

export async function findUserByEmail(email: string): Promise<UserRecord | null> {
  await connectToDatabase();
  const doc = await User.findOne({ email: email.trim().toLowerCase() });
  return doc ? toUserRecord(doc) : null;
}

/**
 * Creates the user on first sign-in; later sign-ins only refresh name and avatar.
 * The role is fixed when the document is created.
 */
export async function upsertUserOnSignIn(profile: SignInProfile): Promise<UserRecord> {
  await connectToDatabase();
  const doc = await User.findOneAndUpdate(
    { email: profile.email.trim().toLowerCase() },
    {
      $set: { name: profile.name, image: profile.image },
      $setOnInsert: {
        userType: profile.userType,
        onboardingCompleted: profile.userType !== 'student',
      },
    },
    { upsert: true, new: true, setDefaultsOnInsert: true },
  );
  if (!doc) {
    throw new Error(`Failed to upsert user ${profile.email}`);
  }
  return toUserRecord(doc);
}

export async function updateUser(id: string, fields: UserProfileUpdate): Promise<UserRecord | null> {
  if (!isValidObjectId(id)) return null;
  await connectToDatabase();
  const doc = await User.findByIdAndUpdate(id, { $set: fields }, { new: true, runValidators: true });
  return doc ? toUserRecord(doc) : null;
}

export async function listStudents(): Promise<UserRecord[]> {
  await connectToDatabase();
  const docs = await User.find({ userType: 'student' }).sort({ createdAt: -1 });
  return docs.map(toUserRecord);
}
