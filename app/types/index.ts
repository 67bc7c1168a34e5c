import { z } from 'zod';

/**
 * Values that effect instances, aura settings and aggregated effect results are made of.
 * Nested mappings let an instance carry structured data (e.g. a per-element table).
 */
export type FieldValue = number | boolean | string | FieldMap;

export interface FieldMap {
  [key: string]: FieldValue;
}

export const FieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([
    z.number(),
    z.boolean(),
    z.string(),
    z.record(z.string(), FieldValueSchema),
  ])
);

export const FieldMapSchema: z.ZodType<FieldMap> = z.record(z.string(), FieldValueSchema);

/**
 * Keys the lifecycle scheduler reacts to.
 * Everything else in an effect instance is opaque data for reduce/apply.
 */
export const RESERVED_FIELDS = ['Duration', 'Tick', 'Cleanup'] as const;
export type ReservedField = (typeof RESERVED_FIELDS)[number];

/**
 * Data carried by one effect instance.
 */
export interface EffectFields {
  /** Seconds until the owning aura instance is removed. */
  Duration?: number;
  /** Seconds between forced recomputations while active. */
  Tick?: number;
  /** One extra apply, excluding this instance, at removal time. */
  Cleanup?: boolean;
  [key: string]: FieldValue | undefined;
}

export const ReservedFieldsSchema = z
  .object({
    Duration: z.number().finite().nonnegative().optional(),
    Tick: z.number().finite().positive().optional(),
    Cleanup: z.boolean().optional(),
  })
  .passthrough();

export const EffectFieldsSchema = z.record(z.string(), FieldValueSchema.optional());

/**
 * What an aura constructor returns.
 * Every field other than `EffectInstances` is shared and replicated into each effect instance.
 */
export interface AuraTemplate {
  EffectInstances: Record<string, EffectFields>;
  [sharedField: string]: FieldValue | undefined | Record<string, EffectFields>;
}

// Shared fields pass through here and are checked against EffectFieldsSchema separately
export const AuraTemplateSchema = z
  .object({
    EffectInstances: z.record(z.string(), EffectFieldsSchema),
  })
  .passthrough();
