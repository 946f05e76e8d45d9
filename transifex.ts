// SPDX-FileCopyrightText: 2024 UnionTech Software Technology Co., Ltd.
//
// SPDX-License-Identifier: GPL-3.0-or-later

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { ConfigError, RequestError } from './errors';
import type { LanguageStats, ResourceRef, TransifexConfig, TranslationSource } from './types';

const JsonApiObject = z.object({
    id: z.string(),
    type: z.string(),
    attributes: z.record(z.unknown()).default({})
});
export type TransifexObject = z.infer<typeof JsonApiObject>;

const JsonApiDocument = z.object({ data: JsonApiObject });

const JsonApiErrors = z.object({
    errors: z.array(z.object({ code: z.string(), detail: z.string() }))
});

const LanguageStatsPage = z.object({
    data: z.array(z.object({
        id: z.string(),
        attributes: z.object({
            translated_strings: z.number(),
            untranslated_strings: z.number(),
            total_strings: z.number(),
            reviewed_strings: z.number().optional(),
            proofread_strings: z.number().optional()
        }),
        relationships: z.object({
            language: z.object({ data: z.object({ id: z.string() }) })
        })
    })),
    links: z.object({ next: z.string().nullish() }).partial().default({})
});
type LanguageStatsItem = z.infer<typeof LanguageStatsPage>['data'][number];

const AsyncDownloadJob = z.object({
    data: z.object({
        id: z.string(),
        attributes: z.object({
            status: z.string(),
            errors: z.array(z.object({ code: z.string(), detail: z.string() })).default([])
        })
    })
});

// url: string, like "https://www.transifex.com/psiphon/psiphon-ios/localizable-strings/"
export function decomposeResourceUrl(url: string): ResourceRef
{
    const parts = url.replace(/\/+$/, '').split('/');
    if (parts.length < 4 || parts.slice(-3).some(part => part === '')) {
        throw new ConfigError(`Not a Transifex resource URL: ${url}`);
    }
    const [org, proj, res] = parts.slice(-3);
    const organization = `o:${org}`;
    const project = `${organization}:p:${proj}`;
    return { organization, project, resource: `${project}:r:${res}` };
}

// resourceId: string, like "o:psiphon:p:psiphon-ios:r:localizable-strings"
export function parseResourceId(resourceId: string): ResourceRef
{
    const match = /^o:([^:]+):p:([^:]+):r:([^:]+)$/.exec(resourceId.trim());
    if (match === null) {
        throw new ConfigError(`Not a Transifex resource id: ${resourceId}`);
    }
    const organization = `o:${match[1]}`;
    const project = `${organization}:p:${match[2]}`;
    return { organization, project, resource: `${project}:r:${match[3]}` };
}

export function languageCodeFromId(languageId: string): string
{
    return languageId.startsWith('l:') ? languageId.slice(2) : languageId;
}

function toLanguageStats(item: LanguageStatsItem): LanguageStats
{
    const attrs = item.attributes;
    return {
        completion: attrs.total_strings > 0 ? attrs.translated_strings / attrs.total_strings : 0,
        translatedStrings: attrs.translated_strings,
        untranslatedStrings: attrs.untranslated_strings,
        totalStrings: attrs.total_strings,
        reviewedStrings: attrs.reviewed_strings,
        proofreadStrings: attrs.proofread_strings
    };
}

function toRequestError(error: unknown, what: string): unknown
{
    if (!axios.isAxiosError(error)) return error;
    if (error.response && error.response.status >= 400) {
        const body = JsonApiErrors.safeParse(error.response.data);
        if (body.success && body.data.errors.length > 0) {
            const { code, detail } = body.data.errors[0];
            console.error(`Error Code: ${code}, Error Detail: ${detail}`);
            return new RequestError(`${what}: ${detail}`, error.response.status, code);
        }
        return new RequestError(what, error.response.status);
    }
    console.error('An error occurred:', error.message);
    return new RequestError(`${what}: ${error.message}`, error.response?.status ?? 0);
}

function sleep(ms: number): Promise<void>
{
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Transifex REST API (v3) client. Organization, project and resource objects are
 * fetched once per client and reused for every language.
 */
export class TransifexClient implements TranslationSource
{
    private readonly organizations = new Map<string, TransifexObject>();
    private readonly projects = new Map<string, TransifexObject>();
    private readonly resources = new Map<string, TransifexObject>();

    constructor(private readonly config: TransifexConfig, private readonly http: AxiosInstance = axios.create())
    {
    }

    private url(path: string): string
    {
        return `${this.config.apiBaseUrl.replace(/\/+$/, '')}${path}`;
    }

    private headers()
    {
        return {
            Authorization: `Bearer ${this.config.accessKey}`,
            'Content-Type': 'application/vnd.api+json'
        };
    }

    private async apiGet(url: string): Promise<unknown>
    {
        try {
            const response = await this.http.get(url, { headers: this.headers() });
            return response.data;
        } catch (error) {
            throw toRequestError(error, `GET ${url}`);
        }
    }

    private async getObject(cache: Map<string, TransifexObject>, collection: string, id: string): Promise<TransifexObject>
    {
        const cached = cache.get(id);
        if (cached !== undefined) return cached;
        const { data } = JsonApiDocument.parse(await this.apiGet(this.url(`/${collection}/${encodeURIComponent(id)}`)));
        cache.set(id, data);
        return data;
    }

    async getObjects(ref: ResourceRef)
    {
        const organization = await this.getObject(this.organizations, 'organizations', ref.organization);
        const project = await this.getObject(this.projects, 'projects', ref.project);
        const resource = await this.getObject(this.resources, 'resources', ref.resource);
        return { organization, project, resource };
    }

    private async getAllStatsPages(url: string): Promise<LanguageStatsItem[]>
    {
        const page = LanguageStatsPage.parse(await this.apiGet(url));
        if (page.links.next) {
            return page.data.concat(await this.getAllStatsPages(page.links.next));
        }
        return page.data;
    }

    // Completion rates of every language of the resource, keyed by language code.
    async getCompletionStats(ref: ResourceRef): Promise<Record<string, LanguageStats>>
    {
        const { project, resource } = await this.getObjects(ref);
        const query = `filter[project]=${encodeURIComponent(project.id)}&filter[resource]=${encodeURIComponent(resource.id)}`;
        const items = await this.getAllStatsPages(this.url(`/resource_language_stats?${query}`));
        const stats: Record<string, LanguageStats> = {};
        for (const item of items) {
            stats[languageCodeFromId(item.relationships.language.data.id)] = toLanguageStats(item);
        }
        return stats;
    }

    /**
     * Downloads the translation file of one language. Transifex prepares the
     * file asynchronously: the job is polled until it redirects to the file.
     */
    async downloadTranslation(ref: ResourceRef, languageCode: string): Promise<string>
    {
        const { resource } = await this.getObjects(ref);
        const jobsUrl = this.url('/resource_translations_async_downloads');
        let jobId: string;
        try {
            const response = await this.http.post(jobsUrl, {
                data: {
                    attributes: { content_encoding: 'text', file_type: 'default', mode: 'default' },
                    relationships: {
                        language: { data: { id: `l:${languageCode}`, type: 'languages' } },
                        resource: { data: { id: resource.id, type: 'resources' } }
                    },
                    type: 'resource_translations_async_downloads'
                }
            }, { headers: this.headers() });
            jobId = AsyncDownloadJob.parse(response.data).data.id;
        } catch (error) {
            throw toRequestError(error, `download ${resource.id} ${languageCode}`);
        }

        const fileUrl = await this.waitForDownload(`${jobsUrl}/${encodeURIComponent(jobId)}`, `${resource.id} ${languageCode}`);
        try {
            // the file lives on a pre-signed URL, no credentials
            const response = await this.http.get<string>(fileUrl, { responseType: 'text' });
            return response.data;
        } catch (error) {
            throw toRequestError(error, `${resource.id} ${languageCode} ${fileUrl}`);
        }
    }

    private async waitForDownload(jobUrl: string, what: string): Promise<string>
    {
        for (let attempt = 0; attempt < this.config.maxPolls; attempt++) {
            let status: number;
            let location: unknown;
            let body: unknown;
            try {
                const response = await this.http.get(jobUrl, {
                    headers: this.headers(),
                    maxRedirects: 0,
                    validateStatus: code => code >= 200 && code < 400
                });
                status = response.status;
                location = response.headers['location'];
                body = response.data;
            } catch (error) {
                throw toRequestError(error, what);
            }

            if (status === 303) {
                if (typeof location !== 'string') {
                    throw new RequestError(`${what}: redirect without location`, status);
                }
                return location;
            }

            const job = AsyncDownloadJob.parse(body).data.attributes;
            if (job.status === 'failed') {
                const detail = job.errors.map(e => `${e.code}: ${e.detail}`).join('; ');
                throw new RequestError(`${what}: download job failed ${detail}`, status);
            }
            await sleep(this.config.pollIntervalMs);
        }
        throw new RequestError(`${what}: download not ready after ${this.config.maxPolls} polls`, 408);
    }
}
