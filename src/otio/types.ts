import type { z } from 'zod';

import type {
  clipSchema,
  composableSchema,
  effectSchema,
  externalReferenceSchema,
  freezeFrameSchema,
  gapSchema,
  generatorReferenceSchema,
  linearTimeWarpSchema,
  markerSchema,
  mediaReferenceSchema,
  metadataSchema,
  missingReferenceSchema,
  rationalTimeSchema,
  stackSchema,
  timeRangeSchema,
  timelineSchema,
  trackKindSchema,
  trackSchema,
  transitionSchema,
} from './schema';

export type Metadata = z.infer<typeof metadataSchema>
export type RationalTime = z.infer<typeof rationalTimeSchema>
export type TimeRange = z.infer<typeof timeRangeSchema>

export type ExternalReference = z.infer<typeof externalReferenceSchema>
export type GeneratorReference = z.infer<typeof generatorReferenceSchema>
export type MissingReference = z.infer<typeof missingReferenceSchema>
export type MediaReference = z.infer<typeof mediaReferenceSchema>

export type LinearTimeWarp = z.infer<typeof linearTimeWarpSchema>
export type FreezeFrame = z.infer<typeof freezeFrameSchema>
export type Effect = z.infer<typeof effectSchema>

export type Marker = z.infer<typeof markerSchema>

export type Clip = z.infer<typeof clipSchema>
export type Gap = z.infer<typeof gapSchema>
export type Transition = z.infer<typeof transitionSchema>
export type Composable = z.infer<typeof composableSchema>

export type TrackKind = z.infer<typeof trackKindSchema>
export type Track = z.infer<typeof trackSchema>
export type Stack = z.infer<typeof stackSchema>
export type Timeline = z.infer<typeof timelineSchema>

export const TransitionType = {
  SMPTE_Dissolve: 'SMPTE_Dissolve',
  Custom: 'Custom_Transition',
} as const;

export const defaultMediaKey = 'DEFAULT_MEDIA';
