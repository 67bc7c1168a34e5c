/**
 * Aura instance ID types
 * Branded Type keeps aura instance ids from being mixed up with aura names
 */
import { v4 as uuidv4 } from 'uuid';

export type AuraInstanceId = string & { readonly __brand: 'AuraInstanceId' };

/**
 * Wraps a string (e.g. one read back from a log) as an AuraInstanceId
 */
export function createAuraInstanceId(id: string): AuraInstanceId {
    return id as AuraInstanceId;
}

/**
 * ID generation utilities
 */
export const AuraIdGenerator = {
    /**
     * Fresh GUID for a newly applied aura instance
     */
    generateAuraInstanceId(): AuraInstanceId {
        return createAuraInstanceId(uuidv4());
    },
};
