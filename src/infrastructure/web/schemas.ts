import { z } from 'zod';
import {
  DEFAULT_DURATION_SECONDS,
  MAX_DURATION_SECONDS,
  MAX_PROMPT_LENGTH,
  MIN_DURATION_SECONDS,
} from '../../core/entities/Track.js';

const WHOLE_SECONDS_MESSAGE = 'Duration must be a whole number of seconds';

// Integer strings such as "30" are taken as numbers
const DurationInput = z.union(
  [z.number(), z.string().regex(/^-?\d+$/, WHOLE_SECONDS_MESSAGE).transform(Number)],
  { errorMap: () => ({ message: WHOLE_SECONDS_MESSAGE }) }
);

export const GenerateMusicSchema = z.object({
  prompt: z
    .string({ required_error: 'Prompt is required' })
    .min(1, 'Prompt must not be empty')
    // Length in characters, not UTF-16 code units
    .refine(
      (value) => Array.from(value).length <= MAX_PROMPT_LENGTH,
      `Prompt must be at most ${MAX_PROMPT_LENGTH} characters`
    ),
  duration: DurationInput.pipe(
    z
      .number()
      .int(WHOLE_SECONDS_MESSAGE)
      .min(MIN_DURATION_SECONDS, `Duration must be at least ${MIN_DURATION_SECONDS} seconds`)
      .max(MAX_DURATION_SECONDS, `Duration must be at most ${MAX_DURATION_SECONDS} seconds`)
  )
    .nullish()
    .transform((value) => value ?? DEFAULT_DURATION_SECONDS),
});

export type GenerateMusicRequest = z.infer<typeof GenerateMusicSchema>;

export const TrackStatusFilterSchema = z.enum(['processing', 'completed']).optional();

/**
 * Plain file name: no separators, no leading dot
 */
export const DownloadFileNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-][A-Za-z0-9_.-]*$/, 'Invalid file name');

export function formatIssues(error: z.ZodError): Array<{ field: string; message: string }> {
  return error.errors.map((issue) => ({
    field: issue.path.join('.') || 'body',
    message: issue.message,
  }));
}
