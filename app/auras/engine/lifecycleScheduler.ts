/**
 * Lifecycle scheduler
 * Arms Duration (one-shot) and Tick (repeating) timers for each aura instance and hands their firings
 * back to the engine. It never touches object state itself: the engine decides at fire time whether
 * the owning aura instance is still registered.
 */
import { AuraInstanceId } from './auraId';
import { Clock, TimerHandle } from './clock';
import { AuraInstance } from './types';
import { EngineLogger, shortId } from '../utils/logger';

export type TimerKind = 'duration' | 'tick';

// Armed -> Fired -> Expired (duration) / back to Armed (tick); Armed|Fired -> Cancelled
export type TimerState = 'Armed' | 'Fired' | 'Cancelled' | 'Expired';

export interface ScheduledTimer {
    readonly auraInstanceId: AuraInstanceId;
    readonly effectId: string;
    readonly kind: TimerKind;
    readonly seconds: number;
    state: TimerState;
}

export interface LifecycleCallbacks<O> {
    onExpire(aura: AuraInstance<O>, timer: ScheduledTimer): void;
    onTick(aura: AuraInstance<O>, effectId: string, timer: ScheduledTimer): void;
}

interface Entry {
    timer: ScheduledTimer;
    handle: TimerHandle;
}

export class LifecycleScheduler<O> {
    private entries: Map<AuraInstanceId, Entry[]> = new Map();

    constructor(
        private readonly clock: Clock,
        private readonly callbacks: LifecycleCallbacks<O>,
        private readonly logger: EngineLogger
    ) { }

    /**
     * Arms one timer per reserved lifecycle field found on the aura's effect instances.
     */
    arm(aura: AuraInstance<O>): ScheduledTimer[] {
        if (this.entries.has(aura.id)) {
            return this.getTimers(aura.id);
        }

        const entries: Entry[] = [];
        for (const instance of aura.effectInstances.values()) {
            const { Duration, Tick } = instance.fields;
            if (Duration !== undefined) {
                entries.push(this.schedule(aura, instance.effectId, 'duration', Duration));
            }
            if (Tick !== undefined) {
                entries.push(this.schedule(aura, instance.effectId, 'tick', Tick));
            }
        }

        if (entries.length > 0) {
            this.entries.set(aura.id, entries);
            this.logger.log(`[LifecycleScheduler] Armed ${entries.length} timer(s) for ${aura.auraName} (${shortId(aura.id)})`);
        }
        return entries.map(e => e.timer);
    }

    /**
     * Cancels every timer of the aura instance. Safe to call for unknown or already-cancelled ids.
     * @returns number of timers that were still armed
     */
    cancel(auraInstanceId: AuraInstanceId): number {
        const entries = this.entries.get(auraInstanceId);
        if (!entries) return 0;
        this.entries.delete(auraInstanceId);

        let cancelled = 0;
        for (const { timer, handle } of entries) {
            if (timer.kind === 'duration' && timer.state === 'Fired') {
                timer.state = 'Expired';
                continue;
            }
            if (timer.state === 'Armed' || timer.state === 'Fired') {
                handle.cancel();
                timer.state = 'Cancelled';
                cancelled++;
            }
        }
        return cancelled;
    }

    getTimers(auraInstanceId: AuraInstanceId): ScheduledTimer[] {
        return (this.entries.get(auraInstanceId) ?? []).map(e => e.timer);
    }

    get trackedCount(): number {
        return this.entries.size;
    }

    private schedule(aura: AuraInstance<O>, effectId: string, kind: TimerKind, seconds: number): Entry {
        const timer: ScheduledTimer = {
            auraInstanceId: aura.id,
            effectId,
            kind,
            seconds,
            state: 'Armed',
        };
        const fire = () => this.fire(aura, timer);
        const handle = kind === 'duration'
            ? this.clock.after(seconds, fire)
            : this.clock.every(seconds, fire);
        return { timer, handle };
    }

    private fire(aura: AuraInstance<O>, timer: ScheduledTimer): void {
        // A clock may still deliver a callback after cancellation
        if (timer.state !== 'Armed') {
            this.logger.warn(`[LifecycleScheduler] Ignoring ${timer.kind} timer in state ${timer.state} for ${shortId(timer.auraInstanceId)}`);
            return;
        }

        timer.state = 'Fired';
        if (timer.kind === 'duration') {
            this.callbacks.onExpire(aura, timer);
            if (timer.state === 'Fired' && !this.entries.has(timer.auraInstanceId)) {
                timer.state = 'Expired';
            }
            return;
        }

        try {
            this.callbacks.onTick(aura, timer.effectId, timer);
        } finally {
            // A failed recompute must not stop the next firing
            if (timer.state === 'Fired') {
                timer.state = 'Armed';
            }
        }
    }
}
