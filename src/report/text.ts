/**
 * Text helpers for model output.
 */

import { isRecord } from '../lib/utils';

/**
 * Flatten model output into plain text.
 * Objects become `Key: value` lines, arrays become `- item` lines, JSON
 * text is unwrapped first. Markdown emphasis and headings are stripped and
 * `[insert ...]` placeholders become `N/A`.
 */
export function cleanContent(content: unknown): string {
    if (isRecord(content)) {
        return Object.entries(content)
            .map(([key, value]) => `${titleCase(key.replace(/_/g, ' '))}: ${cleanContent(value)}`)
            .join('\n');
    }
    if (Array.isArray(content)) {
        return content.map(item => `- ${cleanContent(item)}`).join('\n');
    }

    const text = String(content ?? '');
    const parsed = parseStructured(text);
    if (parsed !== undefined) {
        return cleanContent(parsed);
    }

    return text
        .replace(/\*\*|__|\*|_|#+\s?/g, '')
        .replace(/\[insert.*?\]/g, 'N/A')
        .trim();
}

function parseStructured(text: string): unknown {
    const trimmed = text.trim();
    if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) {
        return undefined;
    }
    try {
        const value: unknown = JSON.parse(trimmed);
        return isRecord(value) || Array.isArray(value) ? value : undefined;
    } catch {
        return undefined;
    }
}

function titleCase(text: string): string {
    return text
        .split(' ')
        .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
        .join(' ');
}

/**
 * Body of the first fenced python block, or the whole text when there is none.
 */
export function extractCode(text: string): string {
    const match = /```python\n([\s\S]*?)```/.exec(text);
    return match ? match[1] : text;
}

/**
 * Escape the LaTeX control characters that show up in data values.
 */
export function escapeLatex(text: string): string {
    return text.replace(/[$%&#_]/g, char => `\\${char}`);
}

const BEGIN_ITEMIZE = '\\begin{itemize}';
const END_ITEMIZE = '\\end{itemize}';

/**
 * Append the `\end{itemize}` tags a section is missing.
 */
export function repairItemize(text: string): { text: string; added: number } {
    const missing = countOccurrences(text, BEGIN_ITEMIZE) - countOccurrences(text, END_ITEMIZE);
    if (missing <= 0) {
        return { text, added: 0 };
    }
    return { text: text + END_ITEMIZE.repeat(missing), added: missing };
}

function countOccurrences(text: string, needle: string): number {
    return text.split(needle).length - 1;
}

/**
 * True when the text already carries LaTeX commands.
 */
export function looksLikeLatex(text: string): boolean {
    return /\\[a-zA-Z]+/.test(text);
}
