const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

type Env = Record<string, string | undefined>;

/**
 * @returns undefined when the value is not a recognised boolean spelling
 */
export function parseBooleanEnvValue(value: string): boolean | undefined {
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;
    return undefined;
}

/**
 * Returns undefined for unset or non-integer values so schema defaults apply.
 */
export function readIntegerEnv(name: string, env: Env = process.env): number | undefined {
    const value = env[name]?.trim();
    if (!value || !/^-?\d+$/.test(value)) return undefined;
    return Number.parseInt(value, 10);
}
