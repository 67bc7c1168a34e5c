import { AuraTemplate, EffectFields, FieldMap, FieldValue } from '../../types';

/**
 * Folds one effect instance into the running aggregate.
 * Must be pure: it may run several times for the same active set.
 */
export type Reducer = (acc: FieldValue, instance: Readonly<EffectFields>) => FieldValue;

/**
 * Pushes a freshly aggregated value onto the target object.
 * Called exactly once per affected effect per mutation batch.
 */
export type Applier<O> = (object: O, value: FieldValue) => void;

/**
 * Builds an aura template from caller settings.
 * Throwing here surfaces as InvalidSettingsError.
 */
export type AuraConstructor = (settings: Readonly<FieldMap>) => AuraTemplate;

// Effect definition, registered once per id
export interface EffectSpec<O> {
    /** Aggregation seed, and the value pushed when no instance is active. */
    default: FieldValue;
    reduce: Reducer;
    apply: Applier<O>;
}

export interface IEffect<O> extends EffectSpec<O> {
    readonly id: string;
}

export interface IAura {
    readonly id: string;
    readonly construct: AuraConstructor;
}
