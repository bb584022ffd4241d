import type { Config } from './config.js';

export interface OutputStream {
    write(chunk: string, callback: (error?: Error | null) => void): boolean;
}

export interface IOStreams {
    out: OutputStream;
    isStdoutTTY(): boolean;
    canPrompt(): boolean;
}

/**
 * IO streams bound to the current process
 */
export function systemIO(config: Pick<Config, 'prompt'>): IOStreams {
    return {
        out: process.stdout,
        isStdoutTTY: () => process.stdout.isTTY === true,
        canPrompt: () =>
            config.prompt !== 'disabled' &&
            process.stdin.isTTY === true &&
            process.stdout.isTTY === true,
    };
}

/**
 * Write to a stream, resolving once the data has been handed off
 */
export function writeOut(out: OutputStream, data: string): Promise<void> {
    return new Promise((resolve, reject) => {
        out.write(data, (error) => {
            if (error) {
                reject(error);
            } else {
                resolve();
            }
        });
    });
}
