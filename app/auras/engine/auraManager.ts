// Aura engine
// Applies and removes aura instances on host objects and keeps every effect's applied value
// recomputed from the full active set.

import { z } from 'zod';
import {
    AuraTemplateSchema,
    EffectFields,
    EffectFieldsSchema,
    FieldMap,
    FieldMapSchema,
    FieldValue,
    ReservedFieldsSchema,
} from '@/app/types';
import { AuraConstructor, EffectSpec, IAura, IEffect } from '../effect/types';
import { Registry } from '../registry';
import { EngineLogger, shortId } from '../utils/logger';
import { AuraIdGenerator, AuraInstanceId } from './auraId';
import { Clock } from './clock';
import { EngineOptions, resolveEngineConfig } from './config';
import {
    InvalidAuraTemplateError,
    InvalidSettingsError,
    UnknownAuraError,
    UnknownEffectError,
} from './errors';
import { LifecycleScheduler } from './lifecycleScheduler';
import { ObjectMutationQueue } from './mutationQueue';
import { ObjectEffectState, ObjectStateStore } from './objectEffectState';
import { foldEffectValue, recomputeEffect } from './recompute';
import { AuraInstance, AuraInstanceSnapshot, EffectInstance, RemovalReason } from './types';

export class AuraEngine<O> {
    readonly clock: Clock;
    readonly debug: boolean;

    private readonly store = new ObjectStateStore<O>();
    private readonly queue = new ObjectMutationQueue<O>();
    private readonly scheduler: LifecycleScheduler<O>;
    private readonly logger: EngineLogger;

    constructor(options: EngineOptions = {}, readonly registry: Registry<O> = new Registry<O>()) {
        const config = resolveEngineConfig(options);
        this.clock = config.clock;
        this.debug = config.debug;
        this.logger = config.logger;
        this.scheduler = new LifecycleScheduler<O>(
            this.clock,
            {
                onExpire: aura => this.handleExpire(aura),
                onTick: (aura, effectId) => this.handleTick(aura, effectId),
            },
            this.logger
        );
    }

    // ==================== Definitions ====================

    registerEffect(id: string, spec: EffectSpec<O>): IEffect<O> {
        return this.registry.registerEffect(id, spec);
    }

    registerAura(id: string, construct: AuraConstructor): IAura {
        return this.registry.registerAura(id, construct);
    }

    getEffect(id: string): IEffect<O> {
        return this.registry.getEffect(id);
    }

    getAura(id: string): IAura {
        return this.registry.getAura(id);
    }

    // ==================== Mutations ====================

    /**
     * Applies a registered aura to an object.
     * The template is built and validated before anything is registered, so a failing constructor
     * or an unknown effect id leaves the object untouched.
     * @returns id of the new aura instance (registration may be deferred when called from inside an apply)
     */
    applyAura(object: O, auraName: string, settings: FieldMap = {}): AuraInstanceId {
        const aura = this.registry.findAura(auraName);
        if (!aura) {
            throw new UnknownAuraError(auraName);
        }

        const instance = this.buildAuraInstance(object, aura, settings);
        this.queue.run(object, () => this.registerAuraInstance(instance));
        return instance.id;
    }

    /**
     * Removes one aura instance. Unknown ids are ignored, so timer-driven and manual removal can race.
     */
    removeAuraInstance(object: O, id: AuraInstanceId): void {
        // Timers go first so nothing fires for this instance once we return
        if (this.store.get(object)?.hasAuraInstance(id)) {
            this.scheduler.cancel(id);
        }
        this.queue.run(object, () => {
            const state = this.store.get(object);
            const aura = state?.getAuraInstance(id);
            if (!state || !aura) return;
            this.removeBatch(state, [aura], 'removed');
        });
    }

    /**
     * Removes every instance of the named aura, recomputing each touched effect once.
     */
    removeAura(object: O, auraName: string): void {
        for (const aura of this.store.get(object)?.findByAura(auraName) ?? []) {
            this.scheduler.cancel(aura.id);
        }
        this.queue.run(object, () => {
            const state = this.store.get(object);
            if (!state) return;
            const auras = state.findByAura(auraName);
            if (auras.length === 0) return;
            this.removeBatch(state, auras, 'removed');
        });
    }

    removeAllAuras(object: O): void {
        for (const aura of this.store.get(object)?.getAuraInstances() ?? []) {
            this.scheduler.cancel(aura.id);
        }
        this.queue.run(object, () => {
            const state = this.store.get(object);
            if (!state || state.isEmpty) return;
            this.removeBatch(state, state.getAuraInstances(), 'removed');
        });
    }

    /**
     * Removes everything from the object and drops its state container.
     */
    destroyObject(object: O): void {
        this.removeAllAuras(object);
        this.queue.run(object, () => {
            this.store.destroy(object);
        });
    }

    // ==================== Queries ====================

    hasAura(object: O, auraName: string): boolean {
        return this.store.get(object)?.hasAura(auraName) ?? false;
    }

    hasAuraInstance(object: O, id: AuraInstanceId): boolean {
        return this.store.get(object)?.hasAuraInstance(id) ?? false;
    }

    /**
     * True while at least one instance of the effect is active on the object.
     * Throws UnknownEffectError for a name that was never registered, rather than answering false.
     */
    hasEffect(object: O, effectName: string): boolean {
        this.requireEffect(effectName);
        return this.store.get(object)?.hasEffect(effectName) ?? false;
    }

    /**
     * Last value pushed through apply, or the effect's default when nothing is active.
     */
    getEffectValue(object: O, effectName: string): FieldValue {
        const effect = this.requireEffect(effectName);
        const state = this.store.get(object);
        if (!state) return effect.default;
        return state.getLastValue(effectName) ?? foldEffectValue(effect, state.getActive(effectName));
    }

    /**
     * Aura name of every instance on the object, in application order.
     */
    getAuras(object: O): IterableIterator<string> {
        const names = (this.store.get(object)?.getAuraInstances() ?? []).map(a => a.auraName);
        return names.values();
    }

    getAuraInstances(object: O): AuraInstanceSnapshot[] {
        return (this.store.get(object)?.getAuraInstances() ?? []).map(aura => {
            const effects: Record<string, EffectFields> = {};
            for (const [effectId, instance] of aura.effectInstances) {
                effects[effectId] = { ...instance.fields };
            }
            return {
                id: aura.id,
                auraName: aura.auraName,
                sharedFields: { ...aura.sharedFields },
                effects,
            };
        });
    }

    /**
     * Field maps of the effect's active instances, in fold order.
     */
    getActiveEffectInstances(object: O, effectName: string): Readonly<EffectFields>[] {
        this.requireEffect(effectName);
        return (this.store.get(object)?.getActive(effectName) ?? []).map(i => i.fields);
    }

    // ==================== Internals ====================

    private requireEffect(effectName: string): IEffect<O> {
        const effect = this.registry.findEffect(effectName);
        if (!effect) {
            throw new UnknownEffectError(effectName);
        }
        return effect;
    }

    private buildAuraInstance(object: O, aura: IAura, settings: FieldMap): AuraInstance<O> {
        const parsedSettings = FieldMapSchema.safeParse(settings);
        if (!parsedSettings.success) {
            throw new InvalidSettingsError(aura.id, new Error(formatIssues(parsedSettings.error)));
        }

        let rawTemplate: unknown;
        try {
            rawTemplate = aura.construct(parsedSettings.data);
        } catch (error) {
            throw new InvalidSettingsError(aura.id, error);
        }

        const template = AuraTemplateSchema.safeParse(rawTemplate);
        if (!template.success) {
            throw new InvalidAuraTemplateError(aura.id, formatIssues(template.error));
        }

        const { EffectInstances, ...rest } = template.data;
        const shared = EffectFieldsSchema.safeParse(rest);
        if (!shared.success) {
            throw new InvalidAuraTemplateError(aura.id, formatIssues(shared.error));
        }
        const sharedFields = compactFields(shared.data);
        const id = AuraIdGenerator.generateAuraInstanceId();

        const effectInstances = new Map<string, EffectInstance>();
        for (const [effectId, local] of Object.entries(EffectInstances)) {
            if (!this.registry.findEffect(effectId)) {
                throw new UnknownEffectError(effectId, aura.id);
            }

            // Instance-local fields take precedence over shared ones
            const fields = compactFields({ ...sharedFields, ...local });
            const reserved = ReservedFieldsSchema.safeParse(fields);
            if (!reserved.success) {
                throw new InvalidAuraTemplateError(aura.id, `${effectId}: ${formatIssues(reserved.error)}`);
            }

            effectInstances.set(effectId, {
                effectId,
                auraInstanceId: id,
                fields: Object.freeze(fields),
            });
        }

        return {
            id,
            auraName: aura.id,
            object,
            sharedFields: Object.freeze(sharedFields),
            effectInstances,
        };
    }

    private registerAuraInstance(aura: AuraInstance<O>): void {
        const state = this.store.create(aura.object);
        const touched = state.register(aura);
        this.scheduler.arm(aura);

        this.logger.log(`[AuraEngine] Applied ${aura.auraName} (${shortId(aura.id)}), touched: ${touched.join(', ') || 'none'}`);

        for (const effectId of touched) {
            this.recompute(state, effectId);
        }
    }

    /**
     * Removes aura instances as if one by one (cleanup applies see earlier removals),
     * then recomputes each touched effect exactly once.
     */
    private removeBatch(state: ObjectEffectState<O>, auras: AuraInstance<O>[], reason: RemovalReason): void {
        for (const aura of auras) {
            this.scheduler.cancel(aura.id);
        }

        const touched = new Set<string>();
        for (const aura of auras) {
            if (!state.hasAuraInstance(aura.id)) continue;

            for (const instance of aura.effectInstances.values()) {
                if (instance.fields.Cleanup !== true) continue;
                const effect = this.registry.getEffect(instance.effectId);
                const value = foldEffectValue(effect, state.getActive(instance.effectId, aura.id));
                this.logger.log(`[AuraEngine] Cleanup ${instance.effectId} for ${aura.auraName} (${shortId(aura.id)})`);
                effect.apply(state.object, value);
            }

            for (const effectId of state.unregister(aura.id)) {
                touched.add(effectId);
            }
            this.logger.log(`[AuraEngine] ${reason === 'expired' ? 'Expired' : 'Removed'} ${aura.auraName} (${shortId(aura.id)})`);
        }

        for (const effectId of touched) {
            this.recompute(state, effectId);
        }

        if (state.isEmpty) {
            this.store.destroy(state.object);
        }
    }

    private recompute(state: ObjectEffectState<O>, effectId: string): void {
        const effect = this.registry.getEffect(effectId);
        const value = recomputeEffect(effect, state.object, state.getActive(effectId));
        state.recordValue(effectId, value);
    }

    private handleExpire(aura: AuraInstance<O>): void {
        this.queue.run(aura.object, () => {
            const state = this.store.get(aura.object);
            // Consult live state, not the timer: a manual removal may have won the race
            if (!state?.hasAuraInstance(aura.id)) {
                this.logger.warn(`[AuraEngine] Duration fired for ${aura.auraName} (${shortId(aura.id)}) after removal`);
                return;
            }
            this.removeBatch(state, [aura], 'expired');
        });
    }

    private handleTick(aura: AuraInstance<O>, effectId: string): void {
        this.queue.run(aura.object, () => {
            const state = this.store.get(aura.object);
            if (!state?.hasAuraInstance(aura.id)) {
                this.logger.warn(`[AuraEngine] Tick fired for ${aura.auraName} (${shortId(aura.id)}) after removal`);
                return;
            }
            this.logger.log(`[AuraEngine] Tick ${effectId} for ${aura.auraName} (${shortId(aura.id)})`);
            this.recompute(state, effectId);
        });
    }
}

export function createAuraEngine<O>(options: EngineOptions = {}, registry?: Registry<O>): AuraEngine<O> {
    return new AuraEngine<O>(options, registry);
}

function compactFields(source: Record<string, FieldValue | undefined>): EffectFields {
    const fields: EffectFields = {};
    for (const [key, value] of Object.entries(source)) {
        if (value !== undefined) {
            fields[key] = value;
        }
    }
    return fields;
}

function formatIssues(error: z.ZodError): string {
    return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}
