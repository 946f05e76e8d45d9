// SPDX-FileCopyrightText: 2024 UnionTech Software Technology Co., Ltd.
//
// SPDX-License-Identifier: GPL-3.0-or-later

export type StringTableEntry = {
    key: string,
    value: string,
    comment: string // text between `/*` and `*/`, may carry the untranslated flag
}

// 'wrapped': Transifex "Ruby" YAML, all strings under the language key
// 'flat': Transifex "Generic" YAML, strings at the top level
export type MappingDialect = 'wrapped' | 'flat';

export type LanguageStats = {
    completion: number, // fraction, 0..1
    translatedStrings: number,
    untranslatedStrings: number,
    totalStrings: number,
    reviewedStrings?: number,
    proofreadStrings?: number
}

export type ResourceRef = {
    organization: string, // "o:psiphon"
    project: string, // "o:psiphon:p:psiphon-ios"
    resource: string // "o:psiphon:p:psiphon-ios:r:localizable-strings"
}

export type TransifexConfig = {
    accessKey: string,
    apiBaseUrl: string,
    pollIntervalMs: number,
    maxPolls: number
}

export type ResourceFormat = 'strings' | 'yaml' | 'none';

export type PullJob = {
    resource: ResourceRef,
    languages: Map<string, string>, // Transifex language code -> output language code
    masterPath: string,
    outputPattern: string, // contains `<lang>`
    format: ResourceFormat,
    adaptLanguageCode: boolean,
    bom: boolean,
    encoding: BufferEncoding,
    project?: string
}

// What the pull needs from a translation service; `TransifexClient` is the real one.
export type TranslationSource = {
    getCompletionStats(ref: ResourceRef): Promise<Record<string, LanguageStats>>,
    downloadTranslation(ref: ResourceRef, languageCode: string): Promise<string>
}
