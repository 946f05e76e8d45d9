// SPDX-FileCopyrightText: 2024 UnionTech Software Technology Co., Ltd.
//
// SPDX-License-Identifier: GPL-3.0-or-later

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import * as YAML from 'js-yaml';
import { parse } from 'ini';
import { z } from 'zod';
import { ConfigError } from './errors';
import { decomposeResourceUrl, parseResourceId } from './transifex';
import { pull, transifex } from './settings';
import type { PullJob, ResourceFormat, TransifexConfig } from './types';

const programDir = path.dirname(fileURLToPath(import.meta.url));

/**
 * Where the API token lives: the path given on the command line, then
 * `transifex_api_token` in the working directory, then beside this program.
 */
export function findApiTokenFile(explicit?: string, cwd: string = process.cwd()): string | undefined
{
    const candidates = [
        explicit,
        path.join(cwd, transifex.apiTokenFilename),
        path.join(programDir, transifex.apiTokenFilename)
    ];
    return candidates.find((candidate): candidate is string => candidate !== undefined && fs.existsSync(candidate));
}

function readApiToken(file: string): string
{
    try {
        return fs.readFileSync(file, 'utf8').trim();
    } catch (error) {
        throw new ConfigError(`Unable to read API token file ${file}: ${error}`);
    }
}

/**
 * Builds the client configuration once at start-up. The token comes from the
 * explicit file, then the `TRANSIFEX_API_TOKEN` environment variable, then the
 * default token file locations.
 */
export function loadTransifexConfig(tokenFile?: string, env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): TransifexConfig
{
    let accessKey: string;
    if (tokenFile !== undefined && fs.existsSync(tokenFile)) {
        accessKey = readApiToken(tokenFile);
    } else {
        if (tokenFile !== undefined) {
            console.error(`API token file ${tokenFile} does not exist, looking elsewhere...`);
        }
        const fromEnv = env[transifex.apiTokenEnv]?.trim();
        if (fromEnv) {
            accessKey = fromEnv;
        } else {
            const file = findApiTokenFile(undefined, cwd);
            if (file === undefined) {
                throw new ConfigError('Unable to find API token file');
            }
            accessKey = readApiToken(file);
        }
    }
    if (accessKey === '') {
        throw new ConfigError('Unable to load config contents');
    }
    return {
        accessKey,
        apiBaseUrl: transifex.apiBaseUrl,
        pollIntervalMs: transifex.downloadPollIntervalMs,
        maxPolls: transifex.downloadMaxPolls
    };
}

const PullResource = z.object({
    url: z.string().optional(),
    id: z.string().optional(),
    master: z.string(),
    output: z.string().refine(value => value.includes('<lang>'), { message: 'must contain <lang>' }),
    format: z.enum(['strings', 'yaml', 'none']).default('none'),
    adaptLanguageCode: z.boolean().default(false),
    bom: z.boolean().default(false),
    encoding: z.string().default(pull.defaultEncoding)
        .refine((value): value is BufferEncoding => Buffer.isEncoding(value), { message: 'unknown encoding' }),
    project: z.string().optional(),
    // either a list of codes pulled under the same name, or remote -> output code
    languages: z.union([z.array(z.string()), z.record(z.string())])
}).refine(res => res.url !== undefined || res.id !== undefined, { message: 'url or id is required' });

const PullConfigFile = z.object({
    resources: z.array(PullResource).min(1)
});

const TxMainSection = z.object({
    lang_map: z.string().optional()
});

const TxResourceSection = z.object({
    file_filter: z.string(),
    source_file: z.string(),
    type: z.string(),
    lang_map: z.string().optional()
});

function describeIssues(error: z.ZodError): string
{
    return error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

// "pt_BR: pt-BR, zh_CN: zh-Hans" -> Map { pt_BR => pt-BR, zh_CN => zh-Hans }
export function parseLangMap(value: string): Map<string, string>
{
    const map = new Map<string, string>();
    for (const pair of value.split(',')) {
        if (pair.trim() === '') continue;
        const [remote, local] = pair.split(':').map(part => part.trim());
        if (!remote || !local) {
            throw new ConfigError(`Invalid lang_map entry: "${pair.trim()}"`);
        }
        map.set(remote, local);
    }
    return map;
}

function formatFromTxType(type: string): ResourceFormat
{
    switch (type.toUpperCase()) {
        case 'STRINGS':
            return 'strings';
        case 'YML':
        case 'YAML_GENERIC':
            return 'yaml';
        default:
            return 'none';
    }
}

function loadYamlPullConfig(configPath: string, content: string): PullJob[]
{
    const baseDir = path.dirname(configPath);
    const parsed = PullConfigFile.safeParse(YAML.load(content));
    if (!parsed.success) {
        throw new ConfigError(`Invalid pull configuration ${configPath}: ${describeIssues(parsed.error)}`);
    }
    return parsed.data.resources.map(res => {
        const languages = Array.isArray(res.languages)
            ? new Map(res.languages.map((code): [string, string] => [code, code]))
            : new Map(Object.entries(res.languages));
        return {
            resource: res.url !== undefined ? decomposeResourceUrl(res.url) : parseResourceId(res.id ?? ''),
            languages,
            masterPath: path.resolve(baseDir, res.master),
            outputPattern: path.resolve(baseDir, res.output),
            format: res.format,
            adaptLanguageCode: res.adaptLanguageCode,
            bom: res.bom,
            encoding: res.encoding,
            project: res.project
        };
    });
}

// Transifex CLI configuration, `<repo>/.tx/config`
function loadTxConfig(configPath: string, content: string): PullJob[]
{
    const repoPath = path.dirname(path.dirname(path.resolve(configPath)));
    const txConfig = parse(content);
    const main = TxMainSection.safeParse(txConfig['main'] ?? {});
    if (!main.success) {
        throw new ConfigError(`Invalid [main] section in ${configPath}: ${describeIssues(main.error)}`);
    }
    const mainLangMap = parseLangMap(main.data.lang_map ?? '');

    const jobs: PullJob[] = [];
    for (const key in txConfig) {
        if (key === 'main') continue;
        const section = TxResourceSection.safeParse(txConfig[key]);
        if (!section.success) {
            throw new ConfigError(`Invalid section [${key}] in ${configPath}: ${describeIssues(section.error)}`);
        }
        const res = section.data;
        const languages = new Map([...mainLangMap, ...parseLangMap(res.lang_map ?? '')]);
        if (languages.size === 0) {
            throw new ConfigError(`Section [${key}] in ${configPath} has no lang_map, nothing to pull`);
        }
        const resource = parseResourceId(key);
        jobs.push({
            resource,
            languages,
            masterPath: path.resolve(repoPath, res.source_file),
            outputPattern: path.resolve(repoPath, res.file_filter),
            format: formatFromTxType(res.type),
            adaptLanguageCode: false,
            bom: false,
            encoding: pull.defaultEncoding,
            project: resource.project
        });
    }
    return jobs;
}

/**
 * Reads what to pull, either from a YAML pull configuration or from a Transifex
 * CLI `.tx/config`. Relative paths are resolved against the configuration's
 * directory (the repository root for `.tx/config`).
 */
export function loadPullConfig(configPath: string): PullJob[]
{
    let content: string;
    try {
        content = fs.readFileSync(configPath, 'utf8');
    } catch (error) {
        throw new ConfigError(`Unable to read pull configuration ${configPath}: ${error}`);
    }
    const ext = path.extname(configPath).toLowerCase();
    if (ext === '.yml' || ext === '.yaml') {
        return loadYamlPullConfig(configPath, content);
    }
    return loadTxConfig(configPath, content);
}

export function outputPathFor(job: PullJob, languageCode: string): string
{
    return job.outputPattern.replace(/<lang>/g, languageCode);
}
