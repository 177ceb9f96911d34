export type CharacterHint = 'numeric' | 'alpha';

// Characters OCR engines commonly confuse with digits
const NUMERIC_CONFUSIONS: Record<string, string> = {
    'O': '0', 'o': '0',
    'S': '5', 's': '5',
    'I': '1', 'l': '1', 'i': '1',
    'B': '8',
    'Z': '2',
};

const ALPHA_CONFUSIONS: Record<string, string> = {
    '0': 'O', '5': 'S', '1': 'I', '8': 'B', '2': 'Z',
};

/** Swaps look-alike characters according to what the field is expected to hold. */
export function applyConfusionCorrections(text: string, hint: CharacterHint): string {
    const map = hint === 'numeric' ? NUMERIC_CONFUSIONS : ALPHA_CONFUSIONS;
    let out = '';
    for (const ch of text) {
        out += map[ch] ?? ch;
    }
    return out;
}

export function cleanWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

export function titleCase(text: string): string {
    return cleanWhitespace(text)
        .split(' ')
        .filter(part => part.length > 0)
        .map(part => part.charAt(0).toUpperCase() + part.slice(1).toLowerCase())
        .join(' ');
}

export function stripOrdinals(text: string): string {
    return text.replace(/\b(\d{1,2})(st|nd|rd|th)\b/gi, '$1');
}
