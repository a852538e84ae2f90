import type { LoggerTransport } from '../types.js';

/** For hosts that embed a store and want it quiet */
export class SilentTransport implements LoggerTransport {
    write(): void {}
}
