import { z } from "zod";

// int8 arrives as a string from pg, as a number from row_to_json/Realtime.
export const rowIdSchema = z
  .union([z.string().regex(/^\d+$/), z.number().int().nonnegative()])
  .transform((value) => String(value));

// pg hands back Date objects, JSON payloads carry Postgres timestamp text.
// Both leave as UTC `toISOString()` form.
export const timestampSchema = z
  .union([
    z.date(),
    z
      .string()
      .min(1)
      .refine((value) => !Number.isNaN(Date.parse(value)), "Invalid timestamp."),
  ])
  .transform((value) => (value instanceof Date ? value : new Date(value)).toISOString());

export const gameRowSchema = z.object({
  id: z.string().uuid(),
  users: z.record(z.number()),
  player_id: rowIdSchema.nullable(),
  present_id: rowIdSchema.nullable(),
  started_at: timestampSchema.nullable(),
  created_at: timestampSchema,
  updated_at: timestampSchema.nullable(),
});

export const presentRowSchema = z.object({
  id: rowIdSchema,
  game_id: z.string().uuid(),
  player_id: rowIdSchema.nullable(),
});

export const playEventSchema = z.object({
  id: rowIdSchema,
  game_id: z.string().uuid(),
  player_id: rowIdSchema,
  present_id: rowIdSchema.nullish().transform((value) => value ?? null),
  from_player_id: rowIdSchema.nullish().transform((value) => value ?? null),
  from_present_id: rowIdSchema.nullish().transform((value) => value ?? null),
  created_at: timestampSchema,
});

export const gameIdSchema = z.string().uuid();

export const presentRequestSchema = z.object({
  present_id: rowIdSchema,
});
