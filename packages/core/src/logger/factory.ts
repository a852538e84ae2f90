/**
 * Logger Factory
 *
 * Creates logger instances from store configuration.
 */

import type { LoggerConfig } from './schemas.js';
import type { Logger } from './types.js';
import { CubbyLogComponent } from './types.js';
import { CubbyLogger } from './logger.js';
import { createTransports } from './transport-factory.js';

export interface CreateLoggerOptions {
    /** Validated logger configuration */
    config: LoggerConfig;
    /** Store name written on every entry */
    name: string;
    /** Component identifier (defaults to STORE) */
    component?: CubbyLogComponent;
}

/**
 * @example
 * ```typescript
 * const logger = createLogger({
 *   config: validatedConfig.logger,
 *   name: 'uploads',
 * });
 *
 * logger.info('Store opened');
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
    const { config, name, component = CubbyLogComponent.STORE } = options;

    return new CubbyLogger({
        level: config.level,
        component,
        name,
        transports: createTransports(config.transports),
    });
}
