import { describe, it, expect, vi } from 'vitest';
import { LifecycleScheduler, LifecycleCallbacks } from '../lifecycleScheduler';
import { Clock, ManualClock } from '../clock';
import { AuraInstance, EffectInstance } from '../types';
import { createAuraInstanceId } from '../auraId';
import { silentLogger } from '../../utils/logger';
import { EffectFields } from '../../../types';

interface TestObject {
    name: string;
}

function createMockAura(id: string, effects: Record<string, EffectFields>): AuraInstance<TestObject> {
    const auraId = createAuraInstanceId(id);
    const effectInstances = new Map<string, EffectInstance>();
    for (const [effectId, fields] of Object.entries(effects)) {
        effectInstances.set(effectId, { effectId, auraInstanceId: auraId, fields });
    }
    return { id: auraId, auraName: 'Test', object: { name: 'dummy' }, sharedFields: {}, effectInstances };
}

function createCallbacks() {
    return {
        onExpire: vi.fn<LifecycleCallbacks<TestObject>['onExpire']>(),
        onTick: vi.fn<LifecycleCallbacks<TestObject>['onTick']>(),
    };
}

describe('LifecycleScheduler', () => {
    it('should arm one timer per Duration and Tick field', () => {
        const clock = new ManualClock();
        const scheduler = new LifecycleScheduler(clock, createCallbacks(), silentLogger);

        const timers = scheduler.arm(createMockAura('a1', { burning: { Duration: 3, Tick: 1 }, speed: {} }));

        expect(timers.map(t => [t.effectId, t.kind, t.seconds, t.state])).toEqual([
            ['burning', 'duration', 3, 'Armed'],
            ['burning', 'tick', 1, 'Armed'],
        ]);
        expect(clock.pending()).toBe(2);
    });

    it('should not track auras without lifecycle fields', () => {
        const clock = new ManualClock();
        const scheduler = new LifecycleScheduler(clock, createCallbacks(), silentLogger);

        expect(scheduler.arm(createMockAura('a1', { speed: { Multiplier: 2 } }))).toEqual([]);
        expect(scheduler.trackedCount).toBe(0);
    });

    it('should report a duration firing and expire it once the aura is cancelled', () => {
        const clock = new ManualClock();
        const callbacks = createCallbacks();
        const scheduler = new LifecycleScheduler(clock, callbacks, silentLogger);
        const aura = createMockAura('a1', { stunned: { Duration: 1 } });
        const [timer] = scheduler.arm(aura);

        clock.advance(1);

        expect(callbacks.onExpire).toHaveBeenCalledWith(aura, timer);
        expect(timer.state).toBe('Fired');

        expect(scheduler.cancel(aura.id)).toBe(0);
        expect(timer.state).toBe('Expired');
    });

    it('should expire the duration when the callback removes the aura synchronously', () => {
        const clock = new ManualClock();
        const callbacks = createCallbacks();
        const scheduler = new LifecycleScheduler(clock, callbacks, silentLogger);
        const aura = createMockAura('a1', { stunned: { Duration: 1, Tick: 0.25 } });
        callbacks.onExpire.mockImplementation(expired => {
            scheduler.cancel(expired.id);
        });
        const [duration, tick] = scheduler.arm(aura);

        clock.advance(2);

        expect(duration.state).toBe('Expired');
        expect(tick.state).toBe('Cancelled');
        expect(callbacks.onTick).toHaveBeenCalledTimes(3);
        expect(clock.pending()).toBe(0);
    });

    it('should return ticks to Armed after each firing', () => {
        const clock = new ManualClock();
        const callbacks = createCallbacks();
        const scheduler = new LifecycleScheduler(clock, callbacks, silentLogger);
        const aura = createMockAura('a1', { burning: { Tick: 0.5 } });
        const [tick] = scheduler.arm(aura);

        clock.advance(1.5);

        expect(callbacks.onTick).toHaveBeenCalledTimes(3);
        expect(callbacks.onTick).toHaveBeenLastCalledWith(aura, 'burning', tick);
        expect(tick.state).toBe('Armed');
    });

    it('should keep ticking after a tick callback throws', () => {
        const clock = new ManualClock();
        const callbacks = createCallbacks();
        callbacks.onTick.mockImplementationOnce(() => {
            throw new Error('apply failed');
        });
        const scheduler = new LifecycleScheduler(clock, callbacks, silentLogger);
        const aura = createMockAura('a1', { burning: { Tick: 1 } });
        const [tick] = scheduler.arm(aura);

        expect(() => clock.advance(1)).toThrow('apply failed');
        expect(tick.state).toBe('Armed');

        clock.advance(3);

        expect(callbacks.onTick).toHaveBeenCalledTimes(4);
        expect(tick.state).toBe('Armed');
    });

    it('should cancel armed timers and report how many were live', () => {
        const clock = new ManualClock();
        const callbacks = createCallbacks();
        const scheduler = new LifecycleScheduler(clock, callbacks, silentLogger);
        const aura = createMockAura('a1', { burning: { Duration: 5, Tick: 1 } });
        const timers = scheduler.arm(aura);

        expect(scheduler.cancel(aura.id)).toBe(2);
        expect(timers.map(t => t.state)).toEqual(['Cancelled', 'Cancelled']);
        expect(scheduler.cancel(aura.id)).toBe(0);
        expect(scheduler.getTimers(aura.id)).toEqual([]);

        clock.advance(10);
        expect(callbacks.onExpire).not.toHaveBeenCalled();
        expect(callbacks.onTick).not.toHaveBeenCalled();
    });

    it('should ignore callbacks a clock delivers after cancellation', () => {
        const delivered: Array<() => void> = [];
        const leakyClock: Clock = {
            now: () => 0,
            after: (_seconds, callback) => {
                delivered.push(callback);
                return { cancel: () => { } };
            },
            every: (_seconds, callback) => {
                delivered.push(callback);
                return { cancel: () => { } };
            },
        };
        const callbacks = createCallbacks();
        const scheduler = new LifecycleScheduler(leakyClock, callbacks, silentLogger);
        const aura = createMockAura('a1', { burning: { Duration: 1, Tick: 1 } });
        scheduler.arm(aura);
        scheduler.cancel(aura.id);

        delivered.forEach(callback => callback());

        expect(callbacks.onExpire).not.toHaveBeenCalled();
        expect(callbacks.onTick).not.toHaveBeenCalled();
    });
});
