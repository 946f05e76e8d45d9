// SPDX-FileCopyrightText: 2024 UnionTech Software Technology Co., Ltd.
//
// SPDX-License-Identifier: GPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describeSkippedLanguage, findSkippedLanguages, processResource, runPullJob } from '../pull';
import type { Mutator } from '../mutators';
import { readTextFile } from '../textfile';
import type { LanguageStats, PullJob, ResourceRef, TranslationSource } from '../types';

const RESOURCE: ResourceRef = {
  organization: 'o:acme',
  project: 'o:acme:p:app',
  resource: 'o:acme:p:app:r:strings',
};

function stat(translated: number, total: number): LanguageStats {
  return {
    completion: total > 0 ? translated / total : 0,
    translatedStrings: translated,
    untranslatedStrings: total - translated,
    totalStrings: total,
  };
}

function fakeSource(stats: Record<string, LanguageStats>, files: Record<string, string>, events: string[] = []): TranslationSource {
  return {
    getCompletionStats: async () => stats,
    downloadTranslation: async (_ref, lang) => {
      events.push(`download ${lang}`);
      const content = files[lang];
      if (content === undefined) throw new Error(`no file for ${lang}`);
      return content;
    },
  };
}

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pull-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('skipped languages', () => {
  it('lists well translated languages that are not pulled, except English', () => {
    const stats = { de: stat(8, 10), fr: stat(10, 10), en: stat(10, 10), it: stat(3, 10), nl: stat(5, 10) };
    expect(findSkippedLanguages(stats, new Map([['fr', 'fr']]))).toEqual(['de', 'nl']);
  });

  it('describes the language with its completion and counts', () => {
    expect(describeSkippedLanguage('de', stat(8, 10))).toBe('Skipping language "de" with 80% translation (8 of 10)');
  });
});

describe('processResource', () => {
  it('prints skipped languages before downloading anything', async () => {
    const events: string[] = [];
    vi.spyOn(console, 'log').mockImplementation((message: string) => { events.push(message); });
    const source = fakeSource({ de: stat(8, 10), fr: stat(9, 10) }, { fr: 'x' }, events);

    await processResource({
      resource: RESOURCE,
      languages: new Map([['fr', 'fr']]),
      masterPath: path.join(dir, 'en.txt'),
      outputPath: lang => path.join(dir, `${lang}.txt`),
    }, source);

    const notice = events.indexOf('Skipping language "de" with 80% translation (8 of 10)');
    expect(notice).toBeGreaterThanOrEqual(0);
    expect(notice).toBeLessThan(events.indexOf('download fr'));
  });

  it('writes each language in order with Unix line endings', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const source = fakeSource({}, { fr: 'a\r\nb\r\n', de: 'c\n' });

    const written = await processResource({
      resource: RESOURCE,
      languages: new Map([['fr', 'fr'], ['de', 'de']]),
      masterPath: path.join(dir, 'en.txt'),
      outputPath: lang => path.join(dir, 'out', lang, 'strings.txt'),
    }, source);

    expect(written).toEqual([path.join(dir, 'out', 'fr', 'strings.txt'), path.join(dir, 'out', 'de', 'strings.txt')]);
    expect(fs.readFileSync(written[0], 'utf8')).toBe('a\nb\n');
    expect(fs.readFileSync(written[1], 'utf8')).toBe('c\n');
  });

  it('normalizes line endings the mutator produces', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const mutator: Mutator = { name: 'crlf', apply: () => 'x\r\ny\r\n' };
    const [file] = await processResource({
      resource: RESOURCE,
      languages: new Map([['fr', 'fr']]),
      masterPath: path.join(dir, 'en.txt'),
      outputPath: lang => path.join(dir, `${lang}.txt`),
      mutator,
    }, fakeSource({}, { fr: 'ignored' }));
    expect(fs.readFileSync(file, 'utf8')).toBe('x\ny\n');
  });

  it('writes a byte order mark in the requested encoding', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const [file] = await processResource({
      resource: RESOURCE,
      languages: new Map([['fr', 'fr']]),
      masterPath: path.join(dir, 'en.txt'),
      outputPath: lang => path.join(dir, `${lang}.txt`),
      bom: true,
      encoding: 'utf16le',
    }, fakeSource({}, { fr: 'ab' }));

    const bytes = fs.readFileSync(file);
    expect([...bytes]).toEqual([0xFF, 0xFE, 0x61, 0x00, 0x62, 0x00]);
    expect(readTextFile(file)).toBe('ab');
  });

  it('hands the mutator the output language and path', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const events: string[] = [];
    const apply = vi.fn((_m: string, _l: string, _t: string, fresh: string) => fresh.toUpperCase());
    const masterPath = path.join(dir, 'en.txt');
    const outputPath = (lang: string) => path.join(dir, `${lang}.lproj`, 'Localizable.strings');

    const [file] = await processResource({
      resource: RESOURCE,
      languages: new Map([['zh_CN', 'zh-Hans']]),
      masterPath,
      outputPath,
      mutator: { name: 'upper', apply },
    }, fakeSource({}, { zh_CN: 'hello' }, events));

    expect(events).toEqual(['download zh_CN']);
    expect(apply).toHaveBeenCalledWith(masterPath, 'zh-Hans', outputPath('zh-Hans'), 'hello', 'utf8');
    expect(fs.readFileSync(file, 'utf8')).toBe('HELLO');
  });

  it('writes into an output directory that already exists', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    fs.mkdirSync(path.join(dir, 'fr'));
    const [file] = await processResource({
      resource: RESOURCE,
      languages: new Map([['fr', 'fr']]),
      masterPath: path.join(dir, 'en.txt'),
      outputPath: lang => path.join(dir, lang, 'strings.txt'),
    }, fakeSource({}, { fr: 'bonjour' }));
    expect(fs.readFileSync(file, 'utf8')).toBe('bonjour');
  });

  it('propagates download failures', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    await expect(processResource({
      resource: RESOURCE,
      languages: new Map([['fr', 'fr']]),
      masterPath: path.join(dir, 'en.txt'),
      outputPath: lang => path.join(dir, `${lang}.txt`),
    }, fakeSource({}, {}))).rejects.toThrow('no file for fr');
  });
});

describe('runPullJob', () => {
  it('merges a strings resource over the committed translation', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    fs.mkdirSync(path.join(dir, 'en.lproj'));
    fs.mkdirSync(path.join(dir, 'de.lproj'));
    fs.writeFileSync(path.join(dir, 'en.lproj', 'Localizable.strings'), '"HELLO" = "Hello";\n"BYE" = "Bye";\n');
    fs.writeFileSync(path.join(dir, 'de.lproj', 'Localizable.strings'), '"HELLO" = "Hallo";\r\n"BYE" = "Tschuess";\r\n');

    const job: PullJob = {
      resource: RESOURCE,
      languages: new Map([['de', 'de']]),
      masterPath: path.join(dir, 'en.lproj', 'Localizable.strings'),
      outputPattern: path.join(dir, '<lang>.lproj', 'Localizable.strings'),
      format: 'strings',
      adaptLanguageCode: false,
      bom: false,
      encoding: 'utf8',
    };
    const source = fakeSource({ de: stat(1, 2) }, { de: '/* hi */\r\n"HELLO" = "Hello";\r\n"BYE" = "Servus";\r\n' });

    const [file] = await runPullJob(job, source);
    expect(file).toBe(path.join(dir, 'de.lproj', 'Localizable.strings'));
    expect(fs.readFileSync(file, 'utf8')).toBe(
      '/*[UNTRANSLATED] hi */\n"HELLO" = "Hallo";\n\n/**/\n"BYE" = "Servus";\n\n');
  });

  async function pullTwice(encoding: BufferEncoding, first: string, second: string): Promise<string> {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    fs.writeFileSync(path.join(dir, 'en.strings'), '"K" = "Coffee";\n');
    const job: PullJob = {
      resource: RESOURCE,
      languages: new Map([['fr', 'fr']]),
      masterPath: path.join(dir, 'en.strings'),
      outputPattern: path.join(dir, '<lang>.strings'),
      format: 'strings',
      adaptLanguageCode: false,
      bom: false,
      encoding,
    };
    await runPullJob(job, fakeSource({}, { fr: first }));
    const [file] = await runPullJob(job, fakeSource({}, { fr: second }));
    return file;
  }

  it('falls back on a translation it wrote in a single byte encoding', async () => {
    const file = await pullTwice('latin1', '"K" = "Café";\n', '"K" = "Coffee";\n');
    expect(fs.readFileSync(file, 'latin1')).toBe('/*[UNTRANSLATED]*/\n"K" = "Café";\n\n');
  });

  it('falls back on a translation it wrote as UTF-16 without a byte order mark', async () => {
    const file = await pullTwice('utf16le', '"K" = "Café";\n', '"K" = "Coffee";\n');
    expect(fs.readFileSync(file, 'utf16le')).toBe('/*[UNTRANSLATED]*/\n"K" = "Café";\n\n');
  });
});
