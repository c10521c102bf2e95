/**
 * Bodies rendered for requests rejected outside the lookup pipeline.
 * None of them carry upstream or internal detail.
 */

export const FORBIDDEN_BODY = { detail: 'Forbidden' } as const;

export const INVALID_REQUEST_BODY = { detail: 'Invalid request.' } as const;

export const NOT_FOUND_BODY = { detail: 'Not Found' } as const;
