import { z } from 'zod';
import { Clock, SystemClock, isClock } from './clock';
import { InvalidConfigError } from './errors';
import { EngineLogger, consoleLogger, isEngineLogger, silentLogger } from '../utils/logger';

export const DEBUG_ENV_VAR = 'AURA_ENGINE_DEBUG';

export const EngineConfigSchema = z
    .object({
        clock: z.custom<Clock>(isClock, { message: 'clock must provide now(), after() and every()' }).optional(),
        logger: z.custom<EngineLogger>(isEngineLogger, { message: 'logger must provide log() and warn()' }).optional(),
        debug: z.boolean().optional(),
    })
    .strict();

export type EngineOptions = z.input<typeof EngineConfigSchema>;

export interface EngineConfig {
    clock: Clock;
    logger: EngineLogger;
    debug: boolean;
}

/**
 * Validates engine options and fills in defaults.
 * `debug` falls back to the AURA_ENGINE_DEBUG environment variable ("1" or "true").
 * The logger only receives lines while debug is on.
 */
export function resolveEngineConfig(options: unknown = {}, env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const parsed = EngineConfigSchema.safeParse(options);
    if (!parsed.success) {
        throw new InvalidConfigError(
            parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
        );
    }

    const flag = env[DEBUG_ENV_VAR]?.trim().toLowerCase();
    const debug = parsed.data.debug ?? (flag === '1' || flag === 'true');

    return {
        clock: parsed.data.clock ?? new SystemClock(),
        logger: debug ? parsed.data.logger ?? consoleLogger : silentLogger,
        debug,
    };
}
