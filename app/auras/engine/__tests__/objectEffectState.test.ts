import { describe, it, expect } from 'vitest';
import { ObjectEffectState, ObjectStateStore } from '../objectEffectState';
import { AuraInstance, EffectInstance } from '../types';
import { AuraInstanceId, createAuraInstanceId } from '../auraId';
import { EffectFields } from '../../../types';

interface TestObject {
    name: string;
}

// Mock AuraInstance Factory
function createMockAura(
    id: string,
    auraName: string,
    effects: Record<string, EffectFields>,
    object: TestObject = { name: 'dummy' }
): AuraInstance<TestObject> {
    const auraId: AuraInstanceId = createAuraInstanceId(id);
    const effectInstances = new Map<string, EffectInstance>();
    for (const [effectId, fields] of Object.entries(effects)) {
        effectInstances.set(effectId, { effectId, auraInstanceId: auraId, fields });
    }
    return { id: auraId, auraName, object, sharedFields: {}, effectInstances };
}

describe('ObjectEffectState', () => {
    it('should group effect instances by effect id in registration order', () => {
        const state = new ObjectEffectState<TestObject>({ name: 'dummy' });
        state.register(createMockAura('a1', 'Haste', { speed: { Multiplier: 2 } }));
        state.register(createMockAura('a2', 'Frost', { speed: { Multiplier: 0.5 }, burning: { DamagePerTick: 1 } }));

        expect(state.getActive('speed').map(i => i.fields)).toEqual([{ Multiplier: 2 }, { Multiplier: 0.5 }]);
        expect(state.getActive('burning')).toHaveLength(1);
        expect(state.getActiveEffectIds()).toEqual(['speed', 'burning']);
    });

    it('should return touched effect ids on register and unregister', () => {
        const state = new ObjectEffectState<TestObject>({ name: 'dummy' });
        const aura = createMockAura('a1', 'Frost', { speed: {}, burning: {} });

        expect(state.register(aura)).toEqual(['speed', 'burning']);
        expect(state.register(aura)).toEqual([]);
        expect(state.unregister(aura.id)).toEqual(['speed', 'burning']);
        expect(state.unregister(aura.id)).toEqual([]);
    });

    it('should drop empty effect groups so hasEffect turns false', () => {
        const state = new ObjectEffectState<TestObject>({ name: 'dummy' });
        const aura = createMockAura('a1', 'Stun', { stunned: {} });
        state.register(aura);
        expect(state.hasEffect('stunned')).toBe(true);

        state.unregister(aura.id);

        expect(state.hasEffect('stunned')).toBe(false);
        expect(state.getActiveEffectIds()).toEqual([]);
        expect(state.isEmpty).toBe(true);
    });

    it('should keep the order of the survivors after a removal', () => {
        const state = new ObjectEffectState<TestObject>({ name: 'dummy' });
        state.register(createMockAura('a1', 'Mark', { trail: { Tag: 'A' } }));
        state.register(createMockAura('a2', 'Mark', { trail: { Tag: 'B' } }));
        state.register(createMockAura('a3', 'Mark', { trail: { Tag: 'C' } }));

        state.unregister(createAuraInstanceId('a2'));
        state.register(createMockAura('a4', 'Mark', { trail: { Tag: 'D' } }));

        expect(state.getActive('trail').map(i => i.fields.Tag)).toEqual(['A', 'C', 'D']);
    });

    it('should leave out one aura instance on request', () => {
        const state = new ObjectEffectState<TestObject>({ name: 'dummy' });
        state.register(createMockAura('a1', 'Mark', { trail: { Tag: 'A' } }));
        state.register(createMockAura('a2', 'Mark', { trail: { Tag: 'B' } }));

        expect(state.getActive('trail', createAuraInstanceId('a1')).map(i => i.fields.Tag)).toEqual(['B']);
    });

    it('should find instances by aura name', () => {
        const state = new ObjectEffectState<TestObject>({ name: 'dummy' });
        state.register(createMockAura('a1', 'Stun', { stunned: {} }));
        state.register(createMockAura('a2', 'Haste', { speed: {} }));
        state.register(createMockAura('a3', 'Stun', { stunned: {} }));

        expect(state.findByAura('Stun').map(a => a.id)).toEqual(['a1', 'a3']);
        expect(state.hasAura('Haste')).toBe(true);
        expect(state.hasAura('Calm')).toBe(false);
        expect(state.auraCount).toBe(3);
    });

    it('should remember the last computed value per effect', () => {
        const state = new ObjectEffectState<TestObject>({ name: 'dummy' });

        expect(state.getLastValue('speed')).toBeUndefined();
        state.recordValue('speed', 1.5);
        expect(state.getLastValue('speed')).toBe(1.5);
    });
});

describe('ObjectStateStore', () => {
    it('should create one state per object identity', () => {
        const store = new ObjectStateStore<TestObject>();
        const hero = { name: 'hero' };
        const twin = { name: 'hero' };

        const state = store.create(hero);

        expect(store.create(hero)).toBe(state);
        expect(store.get(twin)).toBeUndefined();
        expect(store.size).toBe(1);
    });

    it('should destroy states explicitly', () => {
        const store = new ObjectStateStore<TestObject>();
        const hero = { name: 'hero' };
        store.create(hero);

        expect(store.destroy(hero)).toBe(true);
        expect(store.get(hero)).toBeUndefined();
        expect(store.destroy(hero)).toBe(false);
    });
});
