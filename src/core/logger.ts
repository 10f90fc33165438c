/**
 * Structured logging seam. Components receive a Logger instead of writing
 * to the console; the CLI supplies one that renders through @clack/prompts.
 */

export type LogFields = Record<string, unknown>;

export interface Logger {
    debug(event: string, fields?: LogFields): void;
    info(event: string, fields?: LogFields): void;
    warn(event: string, fields?: LogFields): void;
    error(event: string, fields?: LogFields): void;
}

const noop = (): void => {};

/** Library default: discards everything. */
export const silentLogger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
};
