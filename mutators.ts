// SPDX-FileCopyrightText: 2024 UnionTech Software Technology Co., Ltd.
//
// SPDX-License-Identifier: GPL-3.0-or-later

import { mergeStringsTranslations } from './strings-merge';
import { mergeYamlTranslations } from './yaml-merge';
import type { ResourceFormat } from './types';

/**
 * Turns a freshly downloaded translation into the content written to disk.
 *
 * `masterPath` is the English file, `lang` the output language code,
 * `transPath` the translation file about to be overwritten, in `encoding`.
 */
export interface Mutator {
    readonly name: string;
    apply(masterPath: string, lang: string, transPath: string, freshRaw: string, encoding?: BufferEncoding): string;
}

export const Identity: Mutator = {
    name: 'identity',
    apply: (_masterPath, _lang, _transPath, freshRaw) => freshRaw
};

export const StringTableMerge: Mutator = {
    name: 'strings-merge',
    apply: mergeStringsTranslations
};

export const MappingMerge: Mutator = {
    name: 'yaml-merge',
    apply: (masterPath, lang, transPath, freshRaw, encoding) => mergeYamlTranslations(masterPath, lang, transPath, freshRaw, encoding)
};

// Transifex can't express modifiers such as 'ug@Latn', so the downloaded YAML
// says 'ug:'. Swaps the leading language key for `toLang`.
export function adaptLanguageCode(toLang: string, raw: string): string
{
    const colon = raw.indexOf(':');
    if (colon < 0) return raw;
    return toLang + raw.slice(colon);
}

// Rewrites the language key to the output language code, then hands over to `next`.
export function langCodeAdapt(next: Mutator = Identity): Mutator
{
    return {
        name: next === Identity ? 'lang-code-adapt' : `lang-code-adapt+${next.name}`,
        apply: (masterPath, lang, transPath, freshRaw, encoding) =>
            next.apply(masterPath, lang, transPath, adaptLanguageCode(lang, freshRaw), encoding)
    };
}

export function mutatorForFormat(format: ResourceFormat, adaptLang: boolean): Mutator
{
    const base = format === 'strings' ? StringTableMerge
        : format === 'yaml' ? MappingMerge
        : Identity;
    return adaptLang ? langCodeAdapt(base) : base;
}
