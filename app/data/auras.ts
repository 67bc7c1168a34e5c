import { z } from 'zod';
import { AuraConstructor } from '../auras/effect/types';

const StunSettingsSchema = z.object({
    Duration: z.number().positive().default(1),
});

const HasteSettingsSchema = z.object({
    Multiplier: z.number().positive().default(1.5),
    Duration: z.number().positive().optional(),
});

const BurnSettingsSchema = z.object({
    DamagePerTick: z.number().nonnegative().default(5),
    Duration: z.number().positive().default(3),
    Tick: z.number().positive().default(1),
});

const FrostbiteSettingsSchema = z.object({
    Duration: z.number().positive().default(4),
    Slow: z.number().positive().max(1).default(0.5),
});

export const stunAura: AuraConstructor = settings => {
    const { Duration } = StunSettingsSchema.parse(settings);
    return {
        Duration,
        EffectInstances: { stunned: {} },
    };
};

// Without a Duration the haste stays until removed
export const hasteAura: AuraConstructor = settings => {
    const { Multiplier, Duration } = HasteSettingsSchema.parse(settings);
    return {
        ...(Duration !== undefined ? { Duration } : {}),
        EffectInstances: { walkSpeed: { Multiplier } },
    };
};

export const burnAura: AuraConstructor = settings => {
    const { DamagePerTick, Duration, Tick } = BurnSettingsSchema.parse(settings);
    return {
        Duration,
        EffectInstances: { burning: { DamagePerTick, Tick } },
    };
};

/**
 * Slow plus a light burn under one removable handle. The shared Duration reaches both instances.
 */
export const frostbiteAura: AuraConstructor = settings => {
    const { Duration, Slow } = FrostbiteSettingsSchema.parse(settings);
    return {
        Duration,
        EffectInstances: {
            walkSpeed: { Multiplier: Slow },
            burning: { DamagePerTick: 2, Tick: 1 },
        },
    };
};

export const BUILTIN_AURAS = {
    Stun: stunAura,
    Haste: hasteAura,
    Burn: burnAura,
    Frostbite: frostbiteAura,
} as const;
