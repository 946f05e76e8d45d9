// SPDX-FileCopyrightText: 2024 UnionTech Software Technology Co., Ltd.
//
// SPDX-License-Identifier: GPL-3.0-or-later

import { findEntry, parseStrings, parseStringsFile, serializeStrings } from './apple-strings';
import { translation } from './settings';
import type { StringTableEntry } from './types';

export function isFlaggedUntranslated(entry: StringTableEntry): boolean
{
    return entry.comment.includes(translation.untranslatedFlag);
}

/**
 * Transifex fills untranslated `.strings` entries with the English text, which
 * looks exactly like a translation that happens to equal the source. Say
 * `"CANCEL_ACTION" = "Cancel";` is untranslated for French and later the English
 * becomes "Stop": on the next pull the merge would see the old French "Cancel",
 * take it for a real translation and keep showing it.
 *
 * So every incoming entry whose value equals the master value gets
 * `[UNTRANSLATED]` prepended to its comment, and a flagged entry is never used
 * as a fallback afterwards. Keys missing from the master are left alone, and so
 * is everything when the master can't be read.
 *
 * @returns the re-serialized string table
 */
export function flagUntranslatedStrings(masterPath: string, freshRaw: string): string
{
    const fresh = parseStrings(freshRaw, 'fresh translation');

    let master: StringTableEntry[] = [];
    try {
        master = parseStringsFile(masterPath);
    } catch (error) {
        console.error(`flagUntranslatedStrings: failed to read master: ${masterPath} -- ${error}`);
    }

    for (const entry of fresh) {
        const english = findEntry(master, entry.key);
        if (english === undefined || entry.value !== english.value) continue;
        if (!isFlaggedUntranslated(entry)) {
            entry.comment = translation.untranslatedFlag + entry.comment;
        }
    }

    return serializeStrings(fresh);
}
