import type { ZodError, ZodIssue } from 'zod';
import { ErrorScope, ErrorType } from '../errors/types.js';
import type { Issue, Severity } from '../errors/types.js';

/**
 * Result of a validation flow. Successful results may still carry warnings.
 */
export type Result<T, C = unknown> =
    | { ok: true; data: T; issues: Issue<C>[] }
    | { ok: false; issues: Issue<C>[] };

export function ok<T, C = unknown>(data: T, issues: Issue<C>[] = []): Result<T, C> {
    return { ok: true, data, issues };
}

export function fail<T, C = unknown>(issues: Issue<C>[]): Result<T, C> {
    return { ok: false, issues };
}

/**
 * Convert a ZodError into Issues.
 * Union failures are flattened so every branch's complaint is reported.
 */
export function zodToIssues<C = unknown>(
    err: ZodError,
    severity: Severity = 'error',
    scope: ErrorScope | string = ErrorScope.CONFIG
): Issue<C>[] {
    const issues: Issue<C>[] = [];

    const visit = (issue: ZodIssue): void => {
        if (issue.code === 'invalid_union' && issue.unionErrors.length > 0) {
            for (const unionError of issue.unionErrors) {
                unionError.issues.forEach(visit);
            }
            return;
        }
        issues.push({
            code: 'schema_validation',
            message: issue.message,
            scope,
            type: ErrorType.USER,
            severity,
            path: issue.path,
        });
    };

    err.issues.forEach(visit);
    return issues;
}
