import * as readline from 'readline';
import chalk from 'chalk';

export interface Prompter {
    /** Resolves to the zero-based index of the chosen option */
    select(message: string, options: string[]): Promise<number>;
}

/**
 * Parse a 1-based menu answer into an option index
 */
export function parseSelection(answer: string, optionCount: number): number {
    const trimmed = answer.trim();
    const choice = /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
    if (isNaN(choice) || choice < 1 || choice > optionCount) {
        throw new Error(`invalid selection: ${trimmed}`);
    }
    return choice - 1;
}

/**
 * Numbered-menu prompt on stdin; the menu itself goes to stderr so stdout
 * stays clean for command output
 */
export class ReadlinePrompter implements Prompter {
    constructor(
        private input: NodeJS.ReadableStream = process.stdin,
        private output: NodeJS.WritableStream = process.stderr
    ) {}

    async select(message: string, options: string[]): Promise<number> {
        this.output.write(`${chalk.bold(message)}\n`);
        options.forEach((option, idx) => {
            this.output.write(`  ${chalk.cyan(String(idx + 1))}. ${option}\n`);
        });

        const rl = readline.createInterface({ input: this.input, output: this.output });
        const answer = await new Promise<string>((resolve, reject) => {
            let answered = false;
            // End of input or Ctrl-C before an answer
            rl.once('close', () => {
                if (!answered) {
                    reject(new Error('prompt cancelled'));
                }
            });
            rl.once('SIGINT', () => rl.close());
            rl.question('Choice: ', (input: string) => {
                answered = true;
                rl.close();
                resolve(input);
            });
        });

        return parseSelection(answer, options.length);
    }
}
