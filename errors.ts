// SPDX-FileCopyrightText: 2024 UnionTech Software Technology Co., Ltd.
//
// SPDX-License-Identifier: GPL-3.0-or-later

// Malformed .strings or YAML text.
export class ParseError extends Error {
    constructor(message: string, readonly source: string, readonly offset?: number) {
        super(offset === undefined ? `${source}: ${message}` : `${source}:${offset}: ${message}`);
        this.name = 'ParseError';
    }
}

// Non-success response from the Transifex API or the file download.
export class RequestError extends Error {
    constructor(message: string, readonly status: number, readonly code?: string) {
        super(`Request failed with code ${status}: ${message}`);
        this.name = 'RequestError';
    }
}

// Missing API token or unusable pull configuration.
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}
