/**
 * Minimal host object used by the bundled definitions and the verification script.
 * The engine itself never looks inside it.
 */
export interface Character {
    name: string;
    stunned: boolean;
    baseWalkSpeed: number;
    walkSpeed: number;
    health: number;
}

export function createCharacter(name: string, overrides: Partial<Character> = {}): Character {
    return {
        name,
        stunned: false,
        baseWalkSpeed: 16,
        walkSpeed: 16,
        health: 100,
        ...overrides,
    };
}
