import { z } from 'zod';

const LooseRecordSchema = z.record(z.unknown());

// Only container shape is enforced here. Leaf values stay `unknown` until the
// normalizer coerces them and the record schemas check the result.
export const TeamBlockSchema = z
  .object({
    teamId: z.unknown(),
    name: z.unknown(),
    countryName: z.unknown().optional(),
    managerName: z.unknown().optional(),
    players: z.array(LooseRecordSchema),
  })
  .passthrough();

export const MatchPayloadSchema = z
  .object({
    home: TeamBlockSchema,
    away: TeamBlockSchema,
    events: z.array(LooseRecordSchema),
    score: z.unknown(),
    startDate: z.unknown(),
    maxMinute: z.unknown(),
    expandedMaxMinute: z.unknown(),
  })
  .passthrough();

export type RawRecord = z.infer<typeof LooseRecordSchema>;
export type TeamBlock = z.infer<typeof TeamBlockSchema>;
export type MatchPayload = z.infer<typeof MatchPayloadSchema>;
