import { Alphabet } from '../cipher/alphabet.js';
import { EmptyInputError } from '../errors/cipherErrors.js';

/**
 * Separators tried in order; the first one present in the content wins.
 */
const LIST_SEPARATORS = [',', '\n', ' '] as const;

/**
 * Splits list text (keys, words) into unique trimmed entries, first
 * occurrence first. Content with no separator is a single entry.
 *
 * @throws EmptyInputError when the content is blank
 */
export function parseList(content: string): string[] {
    const trimmed = content.trim();
    if (trimmed.length === 0) {
        throw new EmptyInputError('List');
    }

    for (const separator of LIST_SEPARATORS) {
        if (!trimmed.includes(separator)) continue;

        const entries = unique(
            trimmed
                .split(separator)
                .map(entry => entry.trim())
                .filter(entry => entry.length > 0)
        );
        if (entries.length > 0) {
            return entries;
        }
    }

    return [trimmed];
}

/**
 * Non-blank lines, trimmed, in order. Duplicates are kept.
 */
export function parseLines(content: string): string[] {
    return content
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line.length > 0);
}

/**
 * One alphabet per non-blank line.
 *
 * @throws EmptyInputError when there are no lines
 * @throws InvalidAlphabetError for the first malformed line
 */
export function parseAlphabetList(content: string): Alphabet[] {
    const lines = parseLines(content);
    if (lines.length === 0) {
        throw new EmptyInputError('Alphabet list');
    }
    return lines.map(line => Alphabet.create(line));
}

function unique(entries: readonly string[]): string[] {
    return [...new Set(entries)];
}
