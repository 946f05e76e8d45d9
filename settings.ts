// SPDX-FileCopyrightText: 2024 UnionTech Software Technology Co., Ltd.
//
// SPDX-License-Identifier: GPL-3.0-or-later

export const transifex = {
    apiBaseUrl: "https://rest.api.transifex.com",
    apiTokenFilename: "transifex_api_token",
    apiTokenEnv: "TRANSIFEX_API_TOKEN",
    // async download jobs usually finish within a few seconds
    downloadPollIntervalMs: 1000,
    downloadMaxPolls: 60
}

export const translation = {
    // master files are always English
    sourceLanguage: "en",
    // an unused language at or above this completion fraction gets a notice
    completionPrintThreshold: 0.5,
    // marks string table entries that Transifex filled with the English text
    untranslatedFlag: "[UNTRANSLATED]"
}

export const pull: { defaultConfigFile: string, defaultEncoding: BufferEncoding } = {
    defaultConfigFile: "transifex-pull.yml",
    defaultEncoding: "utf8"
}
