import type { CanonicalAddress, CanonicalValue } from '../types/verification_types';

// Letters of any script, combining marks and digits form tokens
export function tokenize(text: string): Set<string> {
    return new Set(
        text.normalize('NFKC')
            .toLowerCase()
            .split(/[^\p{L}\p{M}\p{N}]+/u)
            .filter(t => t.length > 0)
    );
}

/**
 * Jaccard overlap of the two token sets: |A ∩ B| / |A ∪ B|.
 * Text without any token matches nothing, not even other empty text.
 */
export function tokenOverlapRatio(a: string, b: string): number {
    const left = tokenize(a);
    const right = tokenize(b);
    if (left.size === 0 || right.size === 0) return 0;

    let shared = 0;
    for (const token of left) {
        if (right.has(token)) shared++;
    }
    return shared / (left.size + right.size - shared);
}

export function isAddress(value: CanonicalValue): value is CanonicalAddress {
    return typeof value === 'object';
}

export function formatAddress(address: CanonicalAddress): string {
    return [address.street, address.city, address.region, address.postalCode]
        .filter((part): part is string => part !== null && part.length > 0)
        .join(', ');
}

/** Flattens any canonical value to the string used for comparison and display. */
export function canonicalKey(value: CanonicalValue): string {
    return isAddress(value) ? formatAddress(value) : value;
}

export function valueSimilarity(a: CanonicalValue, b: CanonicalValue): number {
    return tokenOverlapRatio(canonicalKey(a), canonicalKey(b));
}
