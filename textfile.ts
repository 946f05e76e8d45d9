// SPDX-FileCopyrightText: 2024 UnionTech Software Technology Co., Ltd.
//
// SPDX-License-Identifier: GPL-3.0-or-later

import fs from 'node:fs';
import path from 'node:path';

// Node encodings that TextDecoder can check strictly. Single byte encodings
// decode every byte and go through Buffer.
const STRICT_DECODERS: Partial<Record<BufferEncoding, string>> = {
    'utf8': 'utf-8',
    'utf-8': 'utf-8',
    'utf16le': 'utf-16le',
    'ucs2': 'utf-16le',
    'ucs-2': 'utf-16le'
};

function decode(bytes: Buffer, encoding: BufferEncoding): string
{
    const label = STRICT_DECODERS[encoding];
    if (label === undefined) {
        return bytes.toString(encoding);
    }
    // throws a TypeError on bytes that are not valid in `encoding`
    return new TextDecoder(label, { fatal: true, ignoreBOM: true }).decode(bytes);
}

/**
 * Reads a translation file written in `encoding`. A UTF-8 or UTF-16 byte order
 * mark takes precedence; Xcode still writes some .strings files as UTF-16.
 *
 * @throws TypeError when the content is not valid in the encoding
 */
export function readTextFile(filePath: string, encoding: BufferEncoding = 'utf8'): string
{
    const buffer = fs.readFileSync(filePath);
    if (buffer.length >= 2 && buffer[0] === 0xFF && buffer[1] === 0xFE) {
        return decode(buffer.subarray(2), 'utf16le');
    }
    if (buffer.length >= 2 && buffer[0] === 0xFE && buffer[1] === 0xFF) {
        return decode(Buffer.from(buffer.subarray(2)).swap16(), 'utf16le');
    }
    if (buffer.length >= 3 && buffer[0] === 0xEF && buffer[1] === 0xBB && buffer[2] === 0xBF) {
        return decode(buffer.subarray(3), 'utf8');
    }
    return decode(buffer, encoding);
}

export function ensureParentDirectory(filePath: string)
{
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
}

export function normalizeLineEndings(content: string): string
{
    return content.replace(/\r\n/g, '\n');
}

export function writeTranslationFile(filePath: string, content: string, bom: boolean, encoding: BufferEncoding)
{
    const normalized = normalizeLineEndings(content);
    fs.writeFileSync(filePath, bom ? `\uFEFF${normalized}` : normalized, { encoding });
}
