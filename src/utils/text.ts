/**
 * Number of Unicode code points in a string.
 * Surrogate pairs count once, unlike String#length.
 */
export function countCharacters(text: string): number {
    return Array.from(text).length;
}

export function hasExtractableText(text: string): boolean {
    return text.length > 0;
}
