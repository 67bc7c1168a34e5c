import { EffectFields, FieldValue } from '../../types';
import { Reducer } from './types';

/**
 * Reads a numeric field from an effect instance.
 * Non-numeric or missing fields yield undefined so the reducer can skip the instance.
 */
export function readNumber(instance: Readonly<EffectFields>, field: string): number | undefined {
    const value = instance[field];
    return typeof value === 'number' ? value : undefined;
}

function numericAcc(acc: FieldValue, fallback: number): number {
    return typeof acc === 'number' ? acc : fallback;
}

/**
 * Stock reduce patterns.
 * Pair each with a matching default: false for oneOrMore, 0 for sum/count, 1 for product,
 * -Infinity/Infinity (or a floor/ceiling) for max/min.
 */
export const Reducers = {
    /** True while at least one instance is active (stun, silence, root). */
    oneOrMore: ((): FieldValue => true) satisfies Reducer,

    /** Number of active instances. */
    count: ((acc: FieldValue): FieldValue => numericAcc(acc, 0) + 1) satisfies Reducer,

    sum(field: string): Reducer {
        return (acc, instance) => numericAcc(acc, 0) + (readNumber(instance, field) ?? 0);
    },

    product(field: string): Reducer {
        return (acc, instance) => numericAcc(acc, 1) * (readNumber(instance, field) ?? 1);
    },

    max(field: string): Reducer {
        return (acc, instance) => {
            const value = readNumber(instance, field);
            const current = numericAcc(acc, -Infinity);
            return value === undefined ? current : Math.max(current, value);
        };
    },

    min(field: string): Reducer {
        return (acc, instance) => {
            const value = readNumber(instance, field);
            const current = numericAcc(acc, Infinity);
            return value === undefined ? current : Math.min(current, value);
        };
    },
};
