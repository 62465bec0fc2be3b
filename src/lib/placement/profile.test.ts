import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('@/lib/db/repositories/users', () => ({ updateUser: vi.fn() }));
vi.mock('pdf-parse', () => ({ PDFParse: class {} }));
vi.mock('mammoth', () => ({ default: { extractRawText: vi.fn() } }));

import { updateUser } from '@/lib/db/repositories/users';
import { BadRequestError, NotFoundError } from '@/lib/http';
import { onboardingUpdate, profileUpdateSchema, saveOnboardingStep, toProfile, updateProfile } from './profile';
import { makeUser } from '@/test/fixtures';

const mockedUpdateUser = vi.mocked(updateUser);

describe('onboardingUpdate', () => {
  it('writes only the basic info fields for that step', () => {
    expect(
      onboardingUpdate('basic_info', { field: 'ECE', year: '2', cgpa: 8.1, skills: ['Go'] }, false),
    ).toEqual({ field: 'ECE', year: '2', cgpa: 8.1 });
  });

  it('stores achievements as certifications', () => {
    expect(onboardingUpdate('certifications', { achievements: [{ title: 'Hackathon winner' }] }, true)).toEqual({
      certifications: [{ title: 'Hackathon winner' }],
      onboardingCompleted: true,
    });
  });

  it('keeps the profile link that comes with experiences', () => {
    expect(
      onboardingUpdate('experiences', { linkedinProfile: 'https://linkedin.com/in/test' }, false),
    ).toEqual({ experiences: [], linkedinProfile: 'https://linkedin.com/in/test' });
  });

  it('returns nothing without a step or completion', () => {
    expect(onboardingUpdate(undefined, { field: 'ECE' }, false)).toEqual({});
  });
});

describe('profileUpdateSchema', () => {
  it('coerces cgpa and rejects negatives', () => {
    expect(profileUpdateSchema.parse({ cgpa: '9.2' })).toEqual({ cgpa: 9.2 });
    expect(() => profileUpdateSchema.parse({ cgpa: -1 })).toThrow('CGPA cannot be negative');
  });
});

describe('updateProfile', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('rejects resume links outside Google Drive', async () => {
    await expect(updateProfile(makeUser(), { resumeUrl: 'https://example.com/cv.pdf' })).rejects.toThrow(
      new BadRequestError('Invalid resume URL. Must be a Google Drive or Docs link'),
    );
    expect(mockedUpdateUser).not.toHaveBeenCalled();
  });

  it('saves and returns the public profile', async () => {
    const updated = makeUser({ name: 'New Name', resumeUrl: 'https://drive.google.com/file/d/abc/view' });
    mockedUpdateUser.mockResolvedValue(updated);

    const profile = await updateProfile(makeUser(), {
      name: 'New Name',
      resumeUrl: 'https://drive.google.com/file/d/abc/view',
    });

    expect(mockedUpdateUser).toHaveBeenCalledWith('65f000000000000000000001', {
      name: 'New Name',
      resumeUrl: 'https://drive.google.com/file/d/abc/view',
    });
    expect(profile).toEqual(toProfile(updated));
    expect(profile).not.toHaveProperty('linkedinProfile');
  });

  it('allows clearing the resume link', async () => {
    mockedUpdateUser.mockResolvedValue(makeUser());
    await updateProfile(makeUser(), { resumeUrl: '' });
    expect(mockedUpdateUser).toHaveBeenCalledWith('65f000000000000000000001', { resumeUrl: '' });
  });

  it('fails when the user has gone', async () => {
    mockedUpdateUser.mockResolvedValue(null);
    await expect(updateProfile(makeUser(), { name: 'X' })).rejects.toThrow(NotFoundError);
  });
});

describe('saveOnboardingStep', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('skips the write when nothing changes', async () => {
    await saveOnboardingStep(makeUser(), undefined, {}, false);
    expect(mockedUpdateUser).not.toHaveBeenCalled();
  });

  it('writes the step', async () => {
    mockedUpdateUser.mockResolvedValue(makeUser());
    await saveOnboardingStep(makeUser(), 'skills', { skills: ['SQL'] }, false);
    expect(mockedUpdateUser).toHaveBeenCalledWith('65f000000000000000000001', { skills: ['SQL'] });
  });
});
