import { CubbyRuntimeError } from '../errors/CubbyRuntimeError.js';
import { ErrorScope, ErrorType } from '../errors/types.js';
import { LoggerErrorCode } from './error-codes.js';

export class LoggerError {
    /**
     * A transport could not be set up, e.g. its log directory is not writable
     */
    static transportInitializationFailed(
        transportType: string,
        error: unknown,
        details: Record<string, unknown> = {}
    ): CubbyRuntimeError {
        const reason = error instanceof Error ? error.message : String(error);
        return new CubbyRuntimeError(
            LoggerErrorCode.TRANSPORT_INITIALIZATION_FAILED,
            ErrorScope.LOGGER,
            ErrorType.SYSTEM,
            `Could not start the ${transportType} log transport: ${reason}`,
            { transportType, reason, ...details },
            { cause: error }
        );
    }
}
