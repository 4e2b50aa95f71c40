import { z } from 'zod';
import {
  calendarDateSchema,
  idSchema,
  talkResponseSchema,
  talkStateSchema,
} from '@core/validation';

// Request shapes that exist only at the HTTP boundary. Entity payloads are
// validated by the core operations themselves.

export const transitionBodySchema = z.object({
  targetState: talkStateSchema,
  reason: z.string().trim().min(1).max(2000).optional(),
});

export const respondBodySchema = z.object({
  response: talkResponseSchema,
});

export const assignBodySchema = z.object({
  talkId: idSchema,
});

export const addLabelsBodySchema = z.object({
  labelIds: z.array(idSchema),
});

export const talkListQuerySchema = z.object({
  state: talkStateSchema.optional(),
  speakerId: idSchema.optional(),
});

export const exportQuerySchema = z.object({
  state: talkStateSchema.optional(),
});

export const conferenceQuerySchema = z.object({
  conferenceId: idSchema.optional(),
});

export const slotQuerySchema = z.object({
  conferenceId: idSchema.optional(),
  trackId: idSchema.optional(),
  slotDate: calendarDateSchema.optional(),
});

export const statisticsQuerySchema = z.object({
  top: z.coerce.number().int().min(1).max(100).optional(),
});
