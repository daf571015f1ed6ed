import type { IncomingHttpHeaders } from 'node:http';

import type { HttpDict } from './HttpDict.js';

/**
 * Header names are lower-cased, absent values become a single empty string.
 */
export function headersToDict(headers: IncomingHttpHeaders): HttpDict {
    const dict: HttpDict = Object.create(null);
    for (const [name, value] of Object.entries(headers)) {
        appendValues(dict, name.toLowerCase(), Array.isArray(value) ? value : [value ?? '']);
    }
    return dict;
}

export function searchParamsToDict(search: URLSearchParams): HttpDict {
    const dict: HttpDict = Object.create(null);
    for (const name of new Set(search.keys())) {
        dict[name] = search.getAll(name);
    }
    return dict;
}

function appendValues(dict: HttpDict, name: string, values: string[]) {
    const existing = dict[name];
    dict[name] = existing ? [...existing, ...values] : [...values];
}
