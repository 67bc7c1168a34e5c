import { EffectFields } from '../../types';
import { AuraInstanceId } from './auraId';

/**
 * One concrete application of an effect.
 * Owned by exactly one aura instance and removed together with it.
 */
export interface EffectInstance {
    readonly effectId: string;
    readonly auraInstanceId: AuraInstanceId;
    /** Shared aura fields merged with the instance's own fields (own fields win). */
    readonly fields: Readonly<EffectFields>;
}

export interface AuraInstance<O> {
    readonly id: AuraInstanceId;
    /** Name of the aura definition that built this instance. */
    readonly auraName: string;
    readonly object: O;
    readonly sharedFields: Readonly<EffectFields>;
    /** effectId -> instance, in template order */
    readonly effectInstances: ReadonlyMap<string, EffectInstance>;
}

/**
 * Read-only view of an aura instance for hosts and debug tooling.
 */
export interface AuraInstanceSnapshot {
    id: AuraInstanceId;
    auraName: string;
    sharedFields: EffectFields;
    effects: Record<string, EffectFields>;
}

export type RemovalReason = 'removed' | 'expired';
