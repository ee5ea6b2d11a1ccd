/**
 * Formats output with colors for better readability
 */
export const colors = {
    green: (text: string) => `\x1b[32m${text}\x1b[0m`,
    yellow: (text: string) => `\x1b[33m${text}\x1b[0m`,
    red: (text: string) => `\x1b[31m${text}\x1b[0m`,
    cyan: (text: string) => `\x1b[36m${text}\x1b[0m`,
    magenta: (text: string) => `\x1b[35m${text}\x1b[0m`,
    dim: (text: string) => `\x1b[2m${text}\x1b[0m`,
    bold: (text: string) => `\x1b[1m${text}\x1b[0m`,
};

/**
 * Output verbosity, set once from the global CLI flags
 */
export interface OutputOptions {
    quiet: boolean;
    verbose: boolean;
}

const output: OutputOptions = {
    quiet: false,
    verbose: false,
};

export function configureOutput(options: Partial<OutputOptions>): void {
    if (options.quiet !== undefined) output.quiet = options.quiet;
    if (options.verbose !== undefined) output.verbose = options.verbose;
}

export function isVerbose(): boolean {
    return output.verbose && !output.quiet;
}

/**
 * Prints a success message
 */
export function success(message: string): void {
    if (output.quiet) return;
    console.log(colors.green('✓'), message);
}

/**
 * Prints an error message and exits
 */
export function error(message: string): never {
    console.error(colors.red('✗'), message);
    process.exit(1);
}

/**
 * Prints an error message without exiting
 */
export function printError(message: string): void {
    console.error(colors.red('✗'), message);
}

/**
 * Prints an info message
 */
export function info(message: string): void {
    if (output.quiet) return;
    console.log(colors.cyan('ℹ'), message);
}

/**
 * Prints a warning message
 */
export function warn(message: string): void {
    console.log(colors.yellow('⚠'), message);
}

/**
 * Prints a message only in verbose mode
 */
export function debug(message: string): void {
    if (!isVerbose()) return;
    console.log(colors.dim(message));
}
