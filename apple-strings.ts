// SPDX-FileCopyrightText: 2024 UnionTech Software Technology Co., Ltd.
//
// SPDX-License-Identifier: GPL-3.0-or-later

import { ParseError } from './errors';
import { readTextFile } from './textfile';
import type { StringTableEntry } from './types';

const WHITESPACE = /\s/;
// characters of an unquoted (old-style property list) key
const KEY_CHAR = /[\w.$:\/-]/;

/**
 * Parses the content of an Xcode `.strings` file.
 *
 * Entries keep their order in the file. The block comment directly in front of an
 * entry becomes its `comment`, verbatim. In values `\"` and `\n` are unescaped,
 * every other escape sequence is kept as written so that it serializes back
 * unchanged.
 *
 * @param source used in error messages only
 * @throws ParseError on unterminated strings or comments, a missing `=` or `;`,
 *         or any text that is not a comment or an entry
 */
export function parseStrings(text: string, source: string = '<string>'): StringTableEntry[]
{
    const content = text.startsWith('\uFEFF') ? text.slice(1) : text;
    const entries: StringTableEntry[] = [];
    let pos = 0;
    let pendingComment: string | null = null;

    function fail(message: string): never {
        throw new ParseError(message, source, pos);
    }

    function skipWhitespace() {
        while (pos < content.length && WHITESPACE.test(content[pos])) pos++;
    }

    function readQuoted(unescape: boolean): string {
        const start = pos;
        let result = '';
        pos++; // opening quote
        while (pos < content.length) {
            const ch = content[pos];
            if (ch === '"') {
                pos++;
                return result;
            }
            if (ch === '\\') {
                if (pos + 1 >= content.length) break;
                const next = content[pos + 1];
                if (next === '\n') {
                    // line continuation
                } else if (unescape && next === '"') {
                    result += '"';
                } else if (unescape && next === 'n') {
                    result += '\n';
                } else {
                    result += ch + next;
                }
                pos += 2;
                continue;
            }
            result += ch;
            pos++;
        }
        pos = start;
        return fail('unterminated string');
    }

    function readKey(): string {
        if (content[pos] === '"') return readQuoted(false);
        const start = pos;
        while (pos < content.length && KEY_CHAR.test(content[pos])) pos++;
        if (pos === start) fail(`unexpected character '${content[pos]}'`);
        return content.slice(start, pos);
    }

    function expect(ch: string, what: string) {
        skipWhitespace();
        if (content[pos] !== ch) fail(`missing ${what}`);
        pos++;
    }

    while (true) {
        skipWhitespace();
        if (pos >= content.length) break;

        if (content.startsWith('/*', pos)) {
            const end = content.indexOf('*/', pos + 2);
            if (end < 0) fail('unterminated comment');
            pendingComment = content.slice(pos + 2, end);
            pos = end + 2;
            continue;
        }
        if (content.startsWith('//', pos)) {
            const end = content.indexOf('\n', pos);
            pos = end < 0 ? content.length : end + 1;
            pendingComment = null;
            continue;
        }

        const key = readKey();
        expect('=', "'='");
        skipWhitespace();
        if (content[pos] !== '"') fail('missing quoted value');
        const value = readQuoted(true);
        expect(';', "';'");

        entries.push({ key, value, comment: pendingComment ?? '' });
        pendingComment = null;
    }

    return entries;
}

export function parseStringsFile(filePath: string, encoding?: BufferEncoding): StringTableEntry[]
{
    return parseStrings(readTextFile(filePath, encoding), filePath);
}

export function escapeStringsValue(value: string): string
{
    return value.replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

export function serializeEntry(entry: StringTableEntry): string
{
    return `/*${entry.comment}*/\n"${entry.key}" = "${escapeStringsValue(entry.value)}";\n\n`;
}

export function serializeStrings(entries: StringTableEntry[]): string
{
    return entries.map(serializeEntry).join('');
}

// First entry with the given key; later duplicates are ignored.
export function findEntry(entries: StringTableEntry[], key: string): StringTableEntry | undefined
{
    return entries.find(entry => entry.key === key);
}
