/**
 * Overlapping stun verification script
 *
 * Checks:
 * 1. Two stuns (1s, 2s): the hero stays stunned after the first one expires
 * 2. The hero is free once the second stun expires
 * 3. Removing a stun by hand before its timer fires leaves no timer behind
 */

import { createAuraEngine } from './app/auras/engine/auraManager';
import { ManualClock } from './app/auras/engine/clock';
import { registerBuiltinDefinitions, createCharacter, Character } from './app/data/index';

const clock = new ManualClock();
const engine = createAuraEngine<Character>({ clock, debug: true });
registerBuiltinDefinitions(engine.registry);

const hero = createCharacter('hero');
let failures = 0;

function check(label: string, actual: unknown, expected: unknown): void {
    const ok = actual === expected;
    if (!ok) failures++;
    console.log(`${ok ? 'OK  ' : 'FAIL'} t=${clock.now().toFixed(2)} ${label}: ${String(actual)} (expected ${String(expected)})`);
}

console.log('--- 1. overlapping stuns ---');
engine.applyAura(hero, 'Stun', { Duration: 1 });
engine.applyAura(hero, 'Stun', { Duration: 2 });
check('stunned after apply', hero.stunned, true);

clock.advance(1);
check('stunned after first expiry', hero.stunned, true);
check('hasEffect after first expiry', engine.hasEffect(hero, 'stunned'), true);

clock.advance(1);
check('stunned after second expiry', hero.stunned, false);

console.log('--- 2. manual removal ---');
const id = engine.applyAura(hero, 'Stun', { Duration: 5 });
engine.removeAuraInstance(hero, id);
check('stunned after removal', hero.stunned, false);
check('pending timers', clock.pending(), 0);

console.log(failures === 0 ? 'All checks passed' : `${failures} check(s) failed`);
process.exitCode = failures === 0 ? 0 : 1;
