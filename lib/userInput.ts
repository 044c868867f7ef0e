import { z } from 'zod';
import type { SessionDetails } from '../types';

export const INFESTATION_LEVELS = ['low', 'medium', 'high'] as const;

export const SessionDetailsSchema = z.object({
  plantType: z.string().trim().min(1, 'Please enter the plant type'),
  zipcode: z.string().trim().regex(/^\d{5}$/, 'Please enter a valid 5-digit zip code'),
  infestationLevel: z.enum(INFESTATION_LEVELS).default('medium'),
});

export type DetailsInput = z.input<typeof SessionDetailsSchema>;

export type DetailsValidation =
  | { success: true; details: SessionDetails }
  | { success: false; error: string };

/** Message for one text field, or null when the value is acceptable. */
export function fieldError(field: 'plantType' | 'zipcode', value: string): string | null {
  const result = SessionDetailsSchema.shape[field].safeParse(value);
  return result.success ? null : result.error.issues[0].message;
}

/** Zip is checked before the plant, matching the order the form reports problems. */
export function validateSessionDetails(input: DetailsInput): DetailsValidation {
  const result = SessionDetailsSchema.safeParse(input);
  if (!result.success) {
    const zipIssue = result.error.issues.find(issue => issue.path[0] === 'zipcode');
    return { success: false, error: (zipIssue ?? result.error.issues[0]).message };
  }
  return { success: true, details: result.data };
}
