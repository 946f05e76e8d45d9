// SPDX-FileCopyrightText: 2024 UnionTech Software Technology Co., Ltd.
//
// SPDX-License-Identifier: GPL-3.0-or-later

import { detectDialect, ensureSubmapping, mappingKeys, type MappingDocument, parseMapping, parseMappingFile, serializeMapping, submapping } from './yaml-mapping';
import { pull, translation } from './settings';

/**
 * Merges YAML translations (such as the store assets).
 *
 * Transifex does not backfill missing YAML values with the English, so a key
 * that is absent or empty in the fresh file is untranslated, and gets the
 * previous translation when there is one. Both Transifex YAML styles are
 * handled: "Ruby" with every string under the language key and "Generic" with
 * the strings at the top level; the master file decides which one applies.
 * The existing translation is read in `encoding`, the one it was written in.
 */
export function mergeYamlTranslations(masterPath: string, lang: string, existingPath: string, freshRaw: string,
    encoding: BufferEncoding = pull.defaultEncoding, sourceLanguage: string = translation.sourceLanguage): string
{
    const freshDoc = parseMapping(freshRaw, `fresh translation (${lang})`);
    const masterDoc = parseMappingFile(masterPath);
    const dialect = detectDialect(masterDoc, sourceLanguage);

    let existingDoc: MappingDocument;
    try {
        existingDoc = parseMappingFile(existingPath, encoding);
    } catch (error) {
        console.error(`mergeYamlTranslations: failed to open existing translation: ${existingPath} -- ${error}`);
        return freshRaw;
    }

    const existing = submapping(existingDoc, dialect, lang);
    if (existing === undefined) {
        console.log(`mergeYamlTranslations: ${existingPath} has no "${lang}" strings, nothing to fall back on`);
        return serializeMapping(freshDoc);
    }

    const fresh = ensureSubmapping(freshDoc, dialect, lang);
    for (const key of mappingKeys(masterDoc, dialect, sourceLanguage)) {
        const previous = existing.get(key);
        if (!fresh.get(key) && previous) {
            fresh.set(key, previous);
        }
    }

    return serializeMapping(freshDoc);
}
