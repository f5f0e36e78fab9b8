/**
 * Character-offset pagination for long posts.
 *
 * A truncated chunk ends with a plain-text notice carrying the next
 * `start_index`; that notice is the only resume mechanism, so its wording
 * is fixed and `parseContinuationIndex` reads it back. Offsets count
 * UTF-16 code units; a window never ends between the halves of a surrogate pair.
 */

export const NO_MORE_CONTENT = 'No more content available.';

const CONTINUATION = /\n\n\[Content truncated\. Use start_index=(\d+) to continue reading\.\]$/;

export function continuationNotice(nextIndex: number): string {
    return `\n\n[Content truncated. Use start_index=${nextIndex} to continue reading.]`;
}

function isHighSurrogate(code: number): boolean {
    return code >= 0xd800 && code <= 0xdbff;
}

/** Keep a surrogate pair in one chunk: back off one unit, or step over it when the window is a single unit. */
function windowEnd(text: string, startIndex: number, end: number): number {
    if (end >= text.length || !isHighSurrogate(text.charCodeAt(end - 1))) return end;
    return end - 1 > startIndex ? end - 1 : end + 1;
}

export function paginate(text: string, startIndex: number, maxLength: number): string {
    if (startIndex >= text.length) return NO_MORE_CONTENT;

    const end = windowEnd(text, startIndex, startIndex + maxLength);
    const chunk = text.slice(startIndex, end);
    return end < text.length ? chunk + continuationNotice(end) : chunk;
}

/** Next start_index announced by a chunk, or undefined if the chunk was the last one. */
export function parseContinuationIndex(chunk: string): number | undefined {
    const m = CONTINUATION.exec(chunk);
    return m ? Number(m[1]) : undefined;
}

/** The chunk without its continuation notice. */
export function stripContinuation(chunk: string): string {
    return chunk.replace(CONTINUATION, '');
}
