/**
 * Console logger shared by the services and the CLI
 */

import chalk from 'chalk';

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
}

let verbose = false;

/**
 * Enables debug output (the CLI's --verbose flag)
 */
export function setVerbose(enabled: boolean): void {
    verbose = enabled;
}

export function isVerbose(): boolean {
    return verbose;
}

export const logger: Logger = {
    debug(message, ...args) {
        if (verbose) {
            console.log(chalk.gray(message), ...args);
        }
    },
    info(message, ...args) {
        console.log(message, ...args);
    },
    warn(message, ...args) {
        console.warn(chalk.yellow(message), ...args);
    },
    error(message, ...args) {
        console.error(chalk.red(message), ...args);
    },
};
