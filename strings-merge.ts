// SPDX-FileCopyrightText: 2024 UnionTech Software Technology Co., Ltd.
//
// SPDX-License-Identifier: GPL-3.0-or-later

import { findEntry, parseStrings, parseStringsFile, serializeEntry } from './apple-strings';
import { pull } from './settings';
import { flagUntranslatedStrings, isFlaggedUntranslated } from './untranslated-flag';
import type { StringTableEntry } from './types';

// The last usable translation of `key`, or undefined when there is none or it
// is itself an untranslated English fallback.
function previousTranslation(existing: StringTableEntry[], key: string): string | undefined
{
    const entry = findEntry(existing, key);
    if (entry === undefined || isFlaggedUntranslated(entry)) return undefined;
    return entry.value;
}

/**
 * Merges a freshly pulled `.strings` translation with the one already on disk.
 *
 * An entry still holding the English text falls back to the previous
 * translation when there is one that differs from the English. Entries that are
 * translated are never touched, and comments always come from the fresh file.
 * The existing translation is read in `encoding` (a byte order mark wins); when
 * it can't be read or decoded the flagged fresh content is returned as is.
 */
export function mergeStringsTranslations(masterPath: string, lang: string, existingPath: string, freshRaw: string,
    encoding: BufferEncoding = pull.defaultEncoding): string
{
    const flagged = flagUntranslatedStrings(masterPath, freshRaw);
    const fresh = parseStrings(flagged, `fresh translation (${lang})`);
    const master = parseStringsFile(masterPath);

    let existing: StringTableEntry[];
    try {
        existing = parseStringsFile(existingPath, encoding);
    } catch (error) {
        console.error(`mergeStringsTranslations: failed to open existing translation: ${existingPath} -- ${error}`);
        return flagged;
    }

    let merged = '';
    for (const entry of fresh) {
        const english = findEntry(master, entry.key)?.value;
        const previous = previousTranslation(existing, entry.key);

        let value = entry.value;
        if (value === english && previous !== undefined && previous !== english) {
            value = previous;
        }

        merged += serializeEntry({ ...entry, value });
    }
    return merged;
}
