/**
 * Project Document Schema
 *
 * JSON description of an editing project: a bin tree of media clips and
 * a list of timelines with their tracks and items. Item `end` is derived
 * as `start + duration`. An item that omits `enabled` or `rightOffset`
 * behaves like a host clip type that does not support that property.
 */

import { z } from 'zod';

export const mediaClipSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  properties: z.record(z.string(), z.string()).default({}),
});

export type MediaClipDocument = z.infer<typeof mediaClipSchema>;

export interface BinDocument {
  name: string;
  clips: MediaClipDocument[];
  bins: BinDocument[];
}

interface BinInput {
  name: string;
  clips?: z.input<typeof mediaClipSchema>[];
  bins?: BinInput[];
}

export const binSchema: z.ZodType<BinDocument, z.ZodTypeDef, BinInput> = z.lazy(() =>
  z.object({
    name: z.string(),
    clips: z.array(mediaClipSchema).default([]),
    bins: z.array(binSchema).default([]),
  })
);

export const timelineItemSchema = z.object({
  name: z.string(),
  start: z.number().int().min(0),
  duration: z.number().int().min(0),
  mediaId: z.string().optional(),
  leftOffset: z.number().int().min(0).default(0),
  rightOffset: z.number().int().min(0).optional(),
  enabled: z.boolean().optional(),
});

export type TimelineItemDocument = z.infer<typeof timelineItemSchema>;

export const trackSchema = z.object({
  name: z.string().optional(),
  enabled: z.boolean().default(true),
  items: z.array(timelineItemSchema).default([]),
});

export type TrackDocument = z.infer<typeof trackSchema>;

const timecodePattern = /^\d+[:;]\d+[:;]\d+[:;]\d+$/;

export const timelineSchema = z.object({
  name: z.string().min(1),
  frameRate: z.number().positive(),
  startTimecode: z.string().regex(timecodePattern).default('01:00:00:00'),
  endFrame: z.number().int().min(0).optional(),
  currentTimecode: z.string().regex(timecodePattern).optional(),
  video: z.array(trackSchema).default([]),
  audio: z.array(trackSchema).default([]),
});

export type TimelineDocument = z.infer<typeof timelineSchema>;

export const projectDocumentSchema = z
  .object({
    name: z.string().min(1),
    currentTimeline: z.string().optional(),
    mediaPool: binSchema,
    timelines: z.array(timelineSchema).default([]),
  })
  .refine(
    (project) =>
      new Set(project.timelines.map((timeline) => timeline.name)).size ===
      project.timelines.length,
    { message: 'timeline names must be unique', path: ['timelines'] }
  );

export type ProjectDocument = z.infer<typeof projectDocumentSchema>;

export type ProjectDocumentInput = z.input<typeof projectDocumentSchema>;
