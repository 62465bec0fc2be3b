import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { handleRouteError, readJson } from '@/lib/http';
import { ONBOARDING_STEPS, onboardingDataSchema, saveOnboardingStep } from '@/lib/placement/profile';
import { requireUser } from '@/lib/session';

const requestSchema = z.object({
  step: z.enum(ONBOARDING_STEPS, { errorMap: () => ({ message: 'Invalid onboarding step' }) }).optional(),
  data: onboardingDataSchema.default({}),
  completed: z.boolean().default(false),
});

export async function POST(request: NextRequest) {
  try {
    const auth = await requireUser();
    if (!auth.ok) return auth.response;

    const { step, data, completed } = requestSchema.parse(await readJson(request));
    await saveOnboardingStep(auth.user, step, data, completed);

    return NextResponse.json({ message: 'Onboarding data saved successfully' });
  } catch (error) {
    return handleRouteError(error, 'saving onboarding step', 'Failed to save onboarding data');
  }
}
