export type DocumentMimeType = 'application/pdf' | 'image/png' | 'image/jpeg' | 'image/webp' | 'application/octet-stream';

/** Sniffs the container format from the leading magic bytes. */
export function detectMimeType(bytes: Buffer): DocumentMimeType {
    if (bytes.subarray(0, 4).toString('latin1') === '%PDF') return 'application/pdf';
    if (bytes[0] === 0x89 && bytes.subarray(1, 4).toString('latin1') === 'PNG') return 'image/png';
    if (bytes[0] === 0xff && bytes[1] === 0xd8) return 'image/jpeg';
    if (bytes.subarray(0, 4).toString('latin1') === 'RIFF' && bytes.subarray(8, 12).toString('latin1') === 'WEBP') return 'image/webp';
    return 'application/octet-stream';
}

export function isImage(mimeType: DocumentMimeType): boolean {
    return mimeType.startsWith('image/');
}

export function toDataUri(bytes: Buffer, mimeType: DocumentMimeType = detectMimeType(bytes)): string {
    return `data:${mimeType};base64,${bytes.toString('base64')}`;
}
