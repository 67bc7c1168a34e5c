import { Registry } from '../auras/registry';
import { BUILTIN_AURAS } from './auras';
import { Character } from './character';
import { BUILTIN_EFFECTS } from './effects';

/**
 * Registers the bundled effects (stunned, walkSpeed, burning) and auras (Stun, Haste, Burn, Frostbite).
 */
export function registerBuiltinDefinitions(registry: Registry<Character>): void {
    for (const [id, spec] of Object.entries(BUILTIN_EFFECTS)) {
        registry.registerEffect(id, spec);
    }
    for (const [id, construct] of Object.entries(BUILTIN_AURAS)) {
        registry.registerAura(id, construct);
    }
}

export { createCharacter } from './character';
export type { Character } from './character';
