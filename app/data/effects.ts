import { EffectSpec } from '@/app/auras/effect/types';
import { Reducers } from '../auras/effect/reducers';
import { Character } from './character';

// Stunned while at least one stun is active; removing one of two stuns keeps the character stunned
export const stunnedEffect: EffectSpec<Character> = {
    default: false,
    reduce: Reducers.oneOrMore,
    apply: (character, value) => {
        character.stunned = value === true;
    },
};

/**
 * Multiplicative walk speed modifier.
 * Each instance carries a `Multiplier`; 1.5 and 0.5 together leave the base speed at 0.75x.
 */
export const walkSpeedEffect: EffectSpec<Character> = {
    default: 1,
    reduce: Reducers.product('Multiplier'),
    apply: (character, value) => {
        const multiplier = typeof value === 'number' ? value : 1;
        character.walkSpeed = character.baseWalkSpeed * multiplier;
    },
};

/**
 * Damage over time. Every recompute (application, removal, each Tick) deals the summed
 * `DamagePerTick` of the active instances, so removal recomputes deal nothing once the last burn is gone.
 */
export const burningEffect: EffectSpec<Character> = {
    default: 0,
    reduce: Reducers.sum('DamagePerTick'),
    apply: (character, value) => {
        const damage = typeof value === 'number' ? value : 0;
        character.health = Math.max(0, character.health - damage);
    },
};

export const BUILTIN_EFFECTS = {
    stunned: stunnedEffect,
    walkSpeed: walkSpeedEffect,
    burning: burningEffect,
} as const;
