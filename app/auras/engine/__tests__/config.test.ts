import { describe, it, expect, vi } from 'vitest';
import { resolveEngineConfig, DEBUG_ENV_VAR } from '../config';
import { ManualClock, SystemClock } from '../clock';
import { InvalidConfigError } from '../errors';
import { silentLogger } from '../../utils/logger';
import { createAuraEngine } from '../auraManager';
import { Reducers } from '../../effect/reducers';

describe('resolveEngineConfig', () => {
    it('should default to a system clock with logging off', () => {
        const config = resolveEngineConfig({}, {});

        expect(config.clock).toBeInstanceOf(SystemClock);
        expect(config.debug).toBe(false);
        expect(config.logger).toBe(silentLogger);
    });

    it('should keep the clock instance it was given', () => {
        const clock = new ManualClock();

        expect(resolveEngineConfig({ clock }, {}).clock).toBe(clock);
    });

    it('should read debug from the environment when the option is omitted', () => {
        expect(resolveEngineConfig({}, { [DEBUG_ENV_VAR]: 'true' }).debug).toBe(true);
        expect(resolveEngineConfig({}, { [DEBUG_ENV_VAR]: '1' }).debug).toBe(true);
        expect(resolveEngineConfig({}, { [DEBUG_ENV_VAR]: 'no' }).debug).toBe(false);
        expect(resolveEngineConfig({ debug: false }, { [DEBUG_ENV_VAR]: '1' }).debug).toBe(false);
    });

    it('should only hand the logger to the engine while debugging', () => {
        const logger = { log: vi.fn(), warn: vi.fn() };

        expect(resolveEngineConfig({ logger, debug: true }, {}).logger).toBe(logger);
        expect(resolveEngineConfig({ logger, debug: false }, {}).logger).toBe(silentLogger);
    });

    it('should reject malformed options', () => {
        const notAClock: unknown = { now: () => 0 };

        expect(() => resolveEngineConfig({ clock: notAClock }, {})).toThrow(InvalidConfigError);
        expect(() => resolveEngineConfig({ clock: notAClock }, {}))
            .toThrow('[AuraEngine] Invalid engine options: clock: clock must provide now(), after() and every()');
    });
});

describe('engine logging', () => {
    it('should trace applications and removals when debug is on', () => {
        const logger = { log: vi.fn(), warn: vi.fn() };
        const engine = createAuraEngine<object>({ clock: new ManualClock(), logger, debug: true });
        engine.registerEffect('bonus', { default: 0, reduce: Reducers.count, apply: () => { } });
        engine.registerAura('Bonus', () => ({ EffectInstances: { bonus: {} } }));
        const target = {};

        const id = engine.applyAura(target, 'Bonus');
        engine.removeAuraInstance(target, id);

        expect(logger.log).toHaveBeenCalledWith(`[AuraEngine] Applied Bonus (${id.slice(0, 8)}), touched: bonus`);
        expect(logger.log).toHaveBeenCalledWith(`[AuraEngine] Removed Bonus (${id.slice(0, 8)})`);
        expect(logger.warn).not.toHaveBeenCalled();
    });
});
