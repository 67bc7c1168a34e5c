/**
 * Per-object effect state
 * Holds the registered aura instances of one object and the derived per-effect active sets.
 */
import { FieldValue } from '../../types';
import { AuraInstanceId } from './auraId';
import { AuraInstance, EffectInstance } from './types';

export class ObjectEffectState<O> {
    private readonly auraInstances: Map<AuraInstanceId, AuraInstance<O>> = new Map();
    // Derived cache: union of every registered aura's effect instances, grouped by effect id.
    // Sets keep registration order, which is the fold order.
    private readonly activeByEffect: Map<string, Set<EffectInstance>> = new Map();
    private readonly lastValues: Map<string, FieldValue> = new Map();

    constructor(readonly object: O) { }

    // ==================== Registration ====================

    /**
     * Registers an aura instance and returns the effect ids whose active set changed.
     */
    register(aura: AuraInstance<O>): string[] {
        if (this.auraInstances.has(aura.id)) {
            return [];
        }
        this.auraInstances.set(aura.id, aura);

        const touched: string[] = [];
        for (const instance of aura.effectInstances.values()) {
            let active = this.activeByEffect.get(instance.effectId);
            if (!active) {
                active = new Set();
                this.activeByEffect.set(instance.effectId, active);
            }
            active.add(instance);
            touched.push(instance.effectId);
        }
        return touched;
    }

    /**
     * Unregisters an aura instance and returns the effect ids whose active set changed.
     * Unknown ids return an empty list.
     */
    unregister(id: AuraInstanceId): string[] {
        const aura = this.auraInstances.get(id);
        if (!aura) return [];
        this.auraInstances.delete(id);

        const touched: string[] = [];
        for (const instance of aura.effectInstances.values()) {
            const active = this.activeByEffect.get(instance.effectId);
            if (!active) continue;
            active.delete(instance);
            if (active.size === 0) {
                this.activeByEffect.delete(instance.effectId);
            }
            touched.push(instance.effectId);
        }
        return touched;
    }

    // ==================== Queries ====================

    hasAuraInstance(id: AuraInstanceId): boolean {
        return this.auraInstances.has(id);
    }

    getAuraInstance(id: AuraInstanceId): AuraInstance<O> | undefined {
        return this.auraInstances.get(id);
    }

    getAuraInstances(): AuraInstance<O>[] {
        return Array.from(this.auraInstances.values());
    }

    findByAura(auraName: string): AuraInstance<O>[] {
        return this.getAuraInstances().filter(a => a.auraName === auraName);
    }

    hasAura(auraName: string): boolean {
        for (const aura of this.auraInstances.values()) {
            if (aura.auraName === auraName) return true;
        }
        return false;
    }

    hasEffect(effectId: string): boolean {
        return (this.activeByEffect.get(effectId)?.size ?? 0) > 0;
    }

    /**
     * Active instances of an effect in registration order, optionally leaving out one aura instance.
     */
    getActive(effectId: string, excludeAura?: AuraInstanceId): EffectInstance[] {
        const active = this.activeByEffect.get(effectId);
        if (!active) return [];
        const instances = Array.from(active);
        return excludeAura === undefined
            ? instances
            : instances.filter(i => i.auraInstanceId !== excludeAura);
    }

    getActiveEffectIds(): string[] {
        return Array.from(this.activeByEffect.keys());
    }

    // ==================== Computed values ====================

    recordValue(effectId: string, value: FieldValue): void {
        this.lastValues.set(effectId, value);
    }

    getLastValue(effectId: string): FieldValue | undefined {
        return this.lastValues.get(effectId);
    }

    get isEmpty(): boolean {
        return this.auraInstances.size === 0;
    }

    get auraCount(): number {
        return this.auraInstances.size;
    }
}

/**
 * Externally owned container of per-object states, keyed by object identity.
 * States are created on first application and destroyed once their last aura instance goes away.
 */
export class ObjectStateStore<O> {
    private readonly states: Map<O, ObjectEffectState<O>> = new Map();

    create(object: O): ObjectEffectState<O> {
        const existing = this.states.get(object);
        if (existing) return existing;
        const state = new ObjectEffectState(object);
        this.states.set(object, state);
        return state;
    }

    get(object: O): ObjectEffectState<O> | undefined {
        return this.states.get(object);
    }

    destroy(object: O): boolean {
        return this.states.delete(object);
    }

    get size(): number {
        return this.states.size;
    }
}
