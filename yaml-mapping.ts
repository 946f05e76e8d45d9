// SPDX-FileCopyrightText: 2024 UnionTech Software Technology Co., Ltd.
//
// SPDX-License-Identifier: GPL-3.0-or-later

import { type Document, isMap, isScalar, parseDocument } from 'yaml';
import { ParseError } from './errors';
import { readTextFile } from './textfile';
import type { MappingDialect } from './types';

export type MappingDocument = Document.Parsed;

// The part of a document that holds the actual strings. Both a document and
// a map node fit.
export type Mapping = {
    get(key: unknown): unknown,
    set(key: unknown, value: unknown): void
}

// Comments, key order and scalar styles survive a parse/serialize round trip.
export function parseMapping(text: string, source: string = '<string>'): MappingDocument
{
    const doc = parseDocument(text);
    if (doc.errors.length > 0) {
        const [first] = doc.errors;
        throw new ParseError(first.message, source, first.pos[0]);
    }
    return doc;
}

export function parseMappingFile(filePath: string, encoding?: BufferEncoding): MappingDocument
{
    return parseMapping(readTextFile(filePath, encoding), filePath);
}

export function serializeMapping(doc: MappingDocument): string
{
    // no folding, long strings stay on their line
    return doc.toString({ lineWidth: 0 });
}

// Wrapped when the source language key holds a non-empty map of strings.
export function detectDialect(master: MappingDocument, sourceLanguage: string): MappingDialect
{
    if (!isMap(master.contents)) return 'flat';
    const node = master.get(sourceLanguage);
    return isMap(node) && node.items.length > 0 ? 'wrapped' : 'flat';
}

export function submapping(doc: MappingDocument, dialect: MappingDialect, lang: string): Mapping | undefined
{
    if (dialect === 'flat') {
        return isMap(doc.contents) ? doc : undefined;
    }
    const node = doc.get(lang);
    return isMap(node) ? node : undefined;
}

// Like `submapping`, but creates the language map when the document lacks it,
// so that values set on the result end up in `doc`.
export function ensureSubmapping(doc: MappingDocument, dialect: MappingDialect, lang: string): Mapping
{
    const existing = submapping(doc, dialect, lang);
    if (existing !== undefined) return existing;
    if (dialect === 'flat') {
        if (doc.contents !== null && !isMap(doc.contents)) {
            throw new ParseError('top level is not a mapping', `${lang} translation`);
        }
        return doc;
    }
    doc.set(lang, doc.createNode({}));
    const created = doc.get(lang);
    if (!isMap(created)) {
        throw new ParseError(`"${lang}" is not a mapping`, `${lang} translation`);
    }
    return created;
}

// Keys of the map that holds the strings, in document order.
export function mappingKeys(doc: MappingDocument, dialect: MappingDialect, lang: string): unknown[]
{
    const node = dialect === 'flat' ? doc.contents : doc.get(lang);
    if (!isMap(node)) return [];
    return node.items.map(pair => isScalar(pair.key) ? pair.key.value : pair.key);
}
