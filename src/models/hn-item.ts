import { z } from 'zod';

const itemId = z.number().int().nonnegative();

/** Unix seconds, bounded to what a JS Date can represent. */
const unixSeconds = z.number().int().nonnegative().max(8.64e12);

const baseItem = {
  id: itemId,
  by: z.string().optional(),
  time: unixSeconds.optional(),
  deleted: z.boolean().optional(),
  dead: z.boolean().optional(),
  kids: z.array(itemId).default([]),
};

export const storyItemSchema = z.object({
  ...baseItem,
  type: z.literal('story'),
  title: z.string().default(''),
  url: z.string().optional(),
  score: z.number().int().optional(),
  descendants: z.number().int().optional(),
  text: z.string().optional(),
});

export const commentItemSchema = z.object({
  ...baseItem,
  type: z.literal('comment'),
  text: z.string().optional(),
  parent: itemId.optional(),
});

export const otherItemSchema = z.object({
  ...baseItem,
  type: z.enum(['job', 'poll', 'pollopt']),
});

export const hnItemSchema = z.discriminatedUnion('type', [storyItemSchema, commentItemSchema, otherItemSchema]);

export const hnUserSchema = z.object({
  id: z.string().optional(),
  karma: z.number().int().optional(),
  created: unixSeconds.optional(),
  about: z.string().optional(),
});

export const itemIdListSchema = z.array(itemId);

export type StoryItem = z.infer<typeof storyItemSchema>;
export type HnItem = z.infer<typeof hnItemSchema>;
export type HnUser = z.infer<typeof hnUserSchema>;

/** Unix seconds as used by the remote API, to ISO-8601. */
export function unixToIso(seconds: number | undefined): string | null {
  if (seconds === undefined) return null;
  return new Date(seconds * 1000).toISOString();
}
