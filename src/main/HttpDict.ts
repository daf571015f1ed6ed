/**
 * Request headers and query parameters, keyed by name,
 * each of which can have multiple values.
 */
export type HttpDict = Record<string, string[]>;
