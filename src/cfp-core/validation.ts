import { z } from 'zod';
import {
  LABEL_NAME_MAX_LENGTH,
  MAX_SCORE,
  MIN_SCORE,
  TALK_RESPONSES,
  TALK_STATES,
  TITLE_MAX_LENGTH,
} from '@shared/constants';
import { validationError } from './errors';
import { isCalendarDate, normalizeTime } from './time';

// ---------------------------------------------------------------------------
// Field schemas
// ---------------------------------------------------------------------------

const optionalText = z
  .string()
  .trim()
  .nullish()
  .transform((v) => (v ? v : null));

export const idSchema = z.string().uuid();

export const calendarDateSchema = z
  .string()
  .refine(isCalendarDate, { message: 'Expected a calendar date (YYYY-MM-DD)' });

function timeSchema(endOfDay: boolean) {
  return z.string().transform((value, ctx) => {
    const normalized = normalizeTime(value, { endOfDay });
    if (!normalized) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a time (HH:MM or HH:MM:SS)' });
      return z.NEVER;
    }
    return normalized;
  });
}

export const timeOfDaySchema = timeSchema(false);
// End times may also be 24:00, the midnight that closes the day.
export const endTimeSchema = timeSchema(true);

export const hexColorSchema = z
  .string()
  .regex(/^#([0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/, 'Color must be a hex color such as #FF5733 or #F57');

export const talkStateSchema = z.enum(TALK_STATES);

export const talkResponseSchema = z.enum(TALK_RESPONSES);

// ---------------------------------------------------------------------------
// Talks
// ---------------------------------------------------------------------------

export const createTalkSchema = z.object({
  title: z.string().trim().min(1, 'Title is required').max(TITLE_MAX_LENGTH),
  shortSummary: z.string().trim().min(1, 'Short summary is required'),
  longDescription: optionalText,
  labelIds: z.array(idSchema).optional(),
});

export const updateTalkSchema = z
  .object({
    title: z.string().trim().min(1, 'Title cannot be empty').max(TITLE_MAX_LENGTH),
    shortSummary: z.string().trim().min(1, 'Short summary cannot be empty'),
    longDescription: optionalText,
    slidesUrl: z.string().trim().max(1000).nullable(),
  })
  .partial();

export type CreateTalkInput = z.input<typeof createTalkSchema>;
export type UpdateTalkInput = z.input<typeof updateTalkSchema>;

// ---------------------------------------------------------------------------
// Ratings & labels
// ---------------------------------------------------------------------------

export const ratingSchema = z.object({
  score: z.number().int('Score must be a whole number').min(MIN_SCORE).max(MAX_SCORE),
  notes: optionalText,
});

export const createLabelSchema = z.object({
  name: z.string().trim().min(1, 'Label name is required').max(LABEL_NAME_MAX_LENGTH),
  description: optionalText,
  color: hexColorSchema.nullish().transform((v) => v ?? null),
});

export const updateLabelSchema = createLabelSchema.partial();

export type CreateLabelInput = z.input<typeof createLabelSchema>;
export type UpdateLabelInput = z.input<typeof updateLabelSchema>;

// ---------------------------------------------------------------------------
// Grid
// ---------------------------------------------------------------------------

export const createConferenceSchema = z
  .object({
    name: z.string().trim().min(1, 'Conference name is required').max(255),
    description: optionalText,
    startDate: calendarDateSchema,
    endDate: calendarDateSchema,
    location: optionalText,
    isActive: z.boolean().default(true),
  })
  .refine((c) => c.startDate <= c.endDate, {
    message: 'Start date must not be after end date',
    path: ['endDate'],
  });

export const updateConferenceSchema = z
  .object({
    name: z.string().trim().min(1).max(255),
    description: optionalText,
    startDate: calendarDateSchema,
    endDate: calendarDateSchema,
    location: optionalText,
    isActive: z.boolean(),
  })
  .partial();

export const createTrackSchema = z.object({
  conferenceId: idSchema,
  name: z.string().trim().min(1, 'Track name is required').max(255),
  description: optionalText,
  capacity: z.number().int().positive().nullish().transform((v) => v ?? null),
});

export const updateTrackSchema = createTrackSchema.omit({ conferenceId: true }).partial();

export const createSlotSchema = z.object({
  trackId: idSchema,
  slotDate: calendarDateSchema,
  startTime: timeOfDaySchema,
  endTime: endTimeSchema,
});

export const updateSlotSchema = createSlotSchema.partial();

export type CreateConferenceInput = z.input<typeof createConferenceSchema>;
export type UpdateConferenceInput = z.input<typeof updateConferenceSchema>;
export type CreateTrackInput = z.input<typeof createTrackSchema>;
export type UpdateTrackInput = z.input<typeof updateTrackSchema>;
export type CreateSlotInput = z.input<typeof createSlotSchema>;
export type UpdateSlotInput = z.input<typeof updateSlotSchema>;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    const first = issues[0];
    const summary = first ? `${first.path ? `${first.path}: ` : ''}${first.message}` : 'Invalid input';
    throw validationError(summary, { issues });
  }
  return result.data;
}
