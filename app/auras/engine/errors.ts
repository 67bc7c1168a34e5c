/**
 * Error taxonomy for registries and aura application.
 * Removal never throws for missing ids or names; those calls are no-ops.
 */

export class AuraError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class DuplicateRegistrationError extends AuraError {
    constructor(readonly kind: 'effect' | 'aura', readonly id: string) {
        super(`[Registry] ${kind === 'effect' ? 'Effect' : 'Aura'} already registered: ${id}`);
    }
}

export class NotFoundError extends AuraError {
    constructor(readonly kind: 'effect' | 'aura', readonly id: string, message?: string) {
        super(message ?? `[Registry] ${kind === 'effect' ? 'Effect' : 'Aura'} not found: ${id}`);
    }
}

export class UnknownAuraError extends NotFoundError {
    constructor(auraName: string) {
        super('aura', auraName, `[AuraEngine] Unknown aura: ${auraName}`);
    }
}

export class UnknownEffectError extends NotFoundError {
    constructor(effectId: string, readonly auraName?: string) {
        super(
            'effect',
            effectId,
            auraName
                ? `[AuraEngine] Aura ${auraName} references unknown effect: ${effectId}`
                : `[AuraEngine] Unknown effect: ${effectId}`
        );
    }
}

/**
 * Settings rejected before or by the aura constructor. The constructor's own error is kept as `cause`.
 */
export class InvalidSettingsError extends AuraError {
    constructor(readonly auraName: string, cause: unknown) {
        super(`[AuraEngine] Invalid settings for aura ${auraName}: ${describeCause(cause)}`, { cause });
    }
}

export class InvalidAuraTemplateError extends AuraError {
    constructor(readonly auraName: string, detail: string) {
        super(`[AuraEngine] Aura ${auraName} produced an invalid template: ${detail}`);
    }
}

export class InvalidConfigError extends AuraError {
    constructor(detail: string) {
        super(`[AuraEngine] Invalid engine options: ${detail}`);
    }
}

function describeCause(cause: unknown): string {
    return cause instanceof Error ? cause.message : String(cause);
}
