import { FieldValue } from '../../types';
import { IEffect } from '../effect/types';
import { EffectInstance } from './types';

/**
 * Folds reduce over the effect's default and the active instances, in the order given.
 */
export function foldEffectValue<O>(effect: IEffect<O>, instances: Iterable<EffectInstance>): FieldValue {
    let value = effect.default;
    for (const instance of instances) {
        value = effect.reduce(value, instance.fields);
    }
    return value;
}

/**
 * Recomputes an effect from scratch and pushes the result onto the object.
 * Errors thrown by reduce or apply propagate to the caller.
 */
export function recomputeEffect<O>(effect: IEffect<O>, object: O, instances: Iterable<EffectInstance>): FieldValue {
    const value = foldEffectValue(effect, instances);
    effect.apply(object, value);
    return value;
}
