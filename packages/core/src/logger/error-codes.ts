export enum LoggerErrorCode {
    TRANSPORT_INITIALIZATION_FAILED = 'logger_transport_initialization_failed',
}
