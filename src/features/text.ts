/** Length in code points, so astral characters count once. */
export function charLength(text: string): number {
    let length = 0;
    for (const _char of text) {
        length++;
    }
    return length;
}

export function truncate(text: string, max = 200): string {
    return text.length > max ? `${text.slice(0, max)}…` : text;
}
