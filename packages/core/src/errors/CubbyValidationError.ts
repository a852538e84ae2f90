import { CubbyBaseError } from './CubbyBaseError.js';
import type { Issue } from './types.js';

/**
 * Validation failure carrying one or more issues.
 * The message is taken from the first error-severity issue.
 */
export class CubbyValidationError extends CubbyBaseError {
    readonly issues: Issue[];

    constructor(issues: Issue[]) {
        const first = issues.find((i) => i.severity === 'error') ?? issues[0];
        super(first?.message ?? 'Validation failed');
        this.issues = issues;
    }

    get errors(): Issue[] {
        return this.issues.filter((i) => i.severity === 'error');
    }

    get warnings(): Issue[] {
        return this.issues.filter((i) => i.severity === 'warning');
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            message: this.message,
            issues: this.issues,
        };
    }
}
