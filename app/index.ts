export { AuraEngine, createAuraEngine } from './auras/engine/auraManager';
export { Registry } from './auras/registry';
export { Reducers, readNumber } from './auras/effect/reducers';
export { ManualClock, SystemClock } from './auras/engine/clock';
export { resolveEngineConfig, EngineConfigSchema, DEBUG_ENV_VAR } from './auras/engine/config';
export {
    AuraError,
    DuplicateRegistrationError,
    NotFoundError,
    UnknownAuraError,
    UnknownEffectError,
    InvalidSettingsError,
    InvalidAuraTemplateError,
    InvalidConfigError,
} from './auras/engine/errors';
export { createAuraInstanceId } from './auras/engine/auraId';
export { consoleLogger, silentLogger } from './auras/utils/logger';
export {
    FieldValueSchema,
    FieldMapSchema,
    ReservedFieldsSchema,
    AuraTemplateSchema,
    RESERVED_FIELDS,
} from './types';

export type { AuraInstanceId } from './auras/engine/auraId';
export type { Clock, TimerHandle } from './auras/engine/clock';
export type { EngineOptions, EngineConfig } from './auras/engine/config';
export type { AuraInstanceSnapshot } from './auras/engine/types';
export type { EngineLogger } from './auras/utils/logger';
export type { Reducer, Applier, AuraConstructor, EffectSpec, IEffect, IAura } from './auras/effect/types';
export type { FieldValue, FieldMap, EffectFields, AuraTemplate, ReservedField } from './types';
