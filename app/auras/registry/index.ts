import { AuraConstructor, EffectSpec, IAura, IEffect } from '../effect/types';
import { DuplicateRegistrationError, NotFoundError } from '../engine/errors';

/**
 * Append-only definition registry for effects and auras.
 * Entries are frozen on registration and never replaced.
 */
export class Registry<O> {
    private effects: Map<string, IEffect<O>> = new Map();
    private auras: Map<string, IAura> = new Map();

    // ==================== Effects ====================

    registerEffect(id: string, spec: EffectSpec<O>): IEffect<O> {
        if (this.effects.has(id)) {
            throw new DuplicateRegistrationError('effect', id);
        }
        const effect: IEffect<O> = Object.freeze({
            id,
            default: spec.default,
            reduce: spec.reduce,
            apply: spec.apply,
        });
        this.effects.set(id, effect);
        return effect;
    }

    getEffect(id: string): IEffect<O> {
        const effect = this.effects.get(id);
        if (!effect) {
            throw new NotFoundError('effect', id);
        }
        return effect;
    }

    findEffect(id: string): IEffect<O> | undefined {
        return this.effects.get(id);
    }

    // ==================== Auras ====================

    registerAura(id: string, construct: AuraConstructor): IAura {
        if (this.auras.has(id)) {
            throw new DuplicateRegistrationError('aura', id);
        }
        const aura: IAura = Object.freeze({ id, construct });
        this.auras.set(id, aura);
        return aura;
    }

    getAura(id: string): IAura {
        const aura = this.auras.get(id);
        if (!aura) {
            throw new NotFoundError('aura', id);
        }
        return aura;
    }

    findAura(id: string): IAura | undefined {
        return this.auras.get(id);
    }

    // ==================== Queries ====================

    getEffectIds(): string[] {
        return Array.from(this.effects.keys());
    }

    getAuraIds(): string[] {
        return Array.from(this.auras.keys());
    }
}
