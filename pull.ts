// SPDX-FileCopyrightText: 2024 UnionTech Software Technology Co., Ltd.
//
// SPDX-License-Identifier: GPL-3.0-or-later

import { outputPathFor } from './config';
import { Identity, type Mutator, mutatorForFormat } from './mutators';
import { pull, translation } from './settings';
import { ensureParentDirectory, writeTranslationFile } from './textfile';
import type { LanguageStats, PullJob, ResourceRef, TranslationSource } from './types';

export type ProcessResourceOptions = {
    resource: ResourceRef,
    languages: ReadonlyMap<string, string>, // Transifex language code -> output language code, in write order
    masterPath: string, // the English version of the resource
    outputPath: (languageCode: string) => string,
    mutator?: Mutator, // fresh content is written verbatim without one
    bom?: boolean,
    encoding?: BufferEncoding,
    project?: string
}

// Languages translated well enough that not pulling them is probably an oversight.
export function findSkippedLanguages(stats: Record<string, LanguageStats>, languages: ReadonlyMap<string, string>): string[]
{
    return Object.keys(stats).filter(lang =>
        stats[lang].completion >= translation.completionPrintThreshold
        && !languages.has(lang)
        && lang !== translation.sourceLanguage);
}

export function describeSkippedLanguage(lang: string, stats: LanguageStats): string
{
    return `Skipping language "${lang}" with ${(stats.completion * 100).toFixed(0)}% translation `
        + `(${stats.translatedStrings} of ${stats.totalStrings})`;
}

/**
 * Pulls every language of `languages` for one resource and writes the files.
 * Line endings are always `\n`.
 *
 * @returns the written file paths, in write order
 */
export async function processResource(options: ProcessResourceOptions, source: TranslationSource): Promise<string[]>
{
    const { resource, languages, masterPath, outputPath } = options;
    const mutator = options.mutator ?? Identity;
    const bom = options.bom ?? false;
    const encoding = options.encoding ?? pull.defaultEncoding;

    console.log(`\nResource: ${resource.resource}${options.project ? ` (${options.project})` : ''}`);

    const stats = await source.getCompletionStats(resource);
    for (const lang of findSkippedLanguages(stats, languages)) {
        console.log(describeSkippedLanguage(lang, stats[lang]));
    }

    const written: string[] = [];
    for (const [inLang, outLang] of languages) {
        console.log(`Downloading ${inLang}...`);
        const fresh = await source.downloadTranslation(resource, inLang);

        const filePath = outputPath(outLang);
        ensureParentDirectory(filePath);

        const content = mutator.apply(masterPath, outLang, filePath, fresh, encoding);
        writeTranslationFile(filePath, content, bom, encoding);
        written.push(filePath);
    }
    return written;
}

export function runPullJob(job: PullJob, source: TranslationSource): Promise<string[]>
{
    return processResource({
        resource: job.resource,
        languages: job.languages,
        masterPath: job.masterPath,
        outputPath: lang => outputPathFor(job, lang),
        mutator: mutatorForFormat(job.format, job.adaptLanguageCode),
        bom: job.bom,
        encoding: job.encoding,
        project: job.project
    }, source);
}
