import { z } from 'zod';

// https://opentimelineio.readthedocs.io/en/latest/tutorials/otio-file-format-specification.html
// Only the schemas an EDL can carry are modelled. Unknown keys are stripped on parse.

export const metadataSchema = z.record(z.string(), z.unknown());

export const rationalTimeSchema = z.object({
  OTIO_SCHEMA: z.literal('RationalTime.1'),
  value: z.number(),
  rate: z.number(),
});

export const timeRangeSchema = z.object({
  OTIO_SCHEMA: z.literal('TimeRange.1'),
  start_time: rationalTimeSchema,
  duration: rationalTimeSchema,
});

export const externalReferenceSchema = z.object({
  OTIO_SCHEMA: z.literal('ExternalReference.1'),
  name: z.string().default(''),
  target_url: z.string(),
  available_range: timeRangeSchema.nullable().default(null),
  metadata: metadataSchema.default({}),
});

export const generatorReferenceSchema = z.object({
  OTIO_SCHEMA: z.literal('GeneratorReference.1'),
  name: z.string().default(''),
  generator_kind: z.string(),
  available_range: timeRangeSchema.nullable().default(null),
  parameters: metadataSchema.default({}),
  metadata: metadataSchema.default({}),
});

export const missingReferenceSchema = z.object({
  OTIO_SCHEMA: z.literal('MissingReference.1'),
  name: z.string().default(''),
  available_range: timeRangeSchema.nullable().default(null),
  metadata: metadataSchema.default({}),
});

export const mediaReferenceSchema = z.discriminatedUnion('OTIO_SCHEMA', [
  externalReferenceSchema,
  generatorReferenceSchema,
  missingReferenceSchema,
]);

export const linearTimeWarpSchema = z.object({
  OTIO_SCHEMA: z.literal('LinearTimeWarp.1'),
  name: z.string().default(''),
  effect_name: z.string().default('LinearTimeWarp'),
  time_scalar: z.number(),
  metadata: metadataSchema.default({}),
});

export const freezeFrameSchema = z.object({
  OTIO_SCHEMA: z.literal('FreezeFrame.1'),
  name: z.string().default(''),
  effect_name: z.string().default('FreezeFrame'),
  time_scalar: z.number().default(0),
  metadata: metadataSchema.default({}),
});

export const genericEffectSchema = z.object({
  OTIO_SCHEMA: z.literal('Effect.1'),
  name: z.string().default(''),
  effect_name: z.string().default(''),
  metadata: metadataSchema.default({}),
});

export const effectSchema = z.discriminatedUnion('OTIO_SCHEMA', [
  linearTimeWarpSchema,
  freezeFrameSchema,
  genericEffectSchema,
]);

export const markerSchema = z.object({
  OTIO_SCHEMA: z.literal('Marker.2'),
  name: z.string().default(''),
  marked_range: timeRangeSchema,
  color: z.string().default(''),
  comment: z.string().default(''),
  metadata: metadataSchema.default({}),
});

export const clipSchema = z.object({
  OTIO_SCHEMA: z.literal('Clip.2'),
  name: z.string().default(''),
  source_range: timeRangeSchema.nullable().default(null),
  media_references: z.record(z.string(), mediaReferenceSchema).default({}),
  active_media_reference_key: z.string().default('DEFAULT_MEDIA'),
  effects: effectSchema.array().default([]),
  markers: markerSchema.array().default([]),
  enabled: z.boolean().default(true),
  metadata: metadataSchema.default({}),
});

export const gapSchema = z.object({
  OTIO_SCHEMA: z.literal('Gap.1'),
  name: z.string().default(''),
  source_range: timeRangeSchema,
  effects: effectSchema.array().default([]),
  markers: markerSchema.array().default([]),
  enabled: z.boolean().default(true),
  metadata: metadataSchema.default({}),
});

export const transitionSchema = z.object({
  OTIO_SCHEMA: z.literal('Transition.1'),
  name: z.string().default(''),
  transition_type: z.string(),
  in_offset: rationalTimeSchema,
  out_offset: rationalTimeSchema,
  metadata: metadataSchema.default({}),
});

export const composableSchema = z.discriminatedUnion('OTIO_SCHEMA', [
  clipSchema,
  gapSchema,
  transitionSchema,
]);

export const trackKindSchema = z.enum(['Video', 'Audio']);

export const trackSchema = z.object({
  OTIO_SCHEMA: z.literal('Track.1'),
  name: z.string().default(''),
  kind: trackKindSchema,
  children: composableSchema.array().default([]),
  source_range: timeRangeSchema.nullable().default(null),
  effects: effectSchema.array().default([]),
  markers: markerSchema.array().default([]),
  enabled: z.boolean().default(true),
  metadata: metadataSchema.default({}),
});

export const stackSchema = z.object({
  OTIO_SCHEMA: z.literal('Stack.1'),
  name: z.string().default('tracks'),
  children: trackSchema.array().default([]),
  source_range: timeRangeSchema.nullable().default(null),
  effects: effectSchema.array().default([]),
  markers: markerSchema.array().default([]),
  enabled: z.boolean().default(true),
  metadata: metadataSchema.default({}),
});

export const timelineSchema = z.object({
  OTIO_SCHEMA: z.literal('Timeline.1'),
  name: z.string().default(''),
  global_start_time: rationalTimeSchema.nullable().default(null),
  tracks: stackSchema,
  metadata: metadataSchema.default({}),
});
