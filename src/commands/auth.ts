import chalk from 'chalk';
import { GitHubAPI } from '../github-api.js';
import { ReadlinePrompter } from '../prompter.js';
import { AuthError } from '../errors.js';

interface AuthOptions {
    status?: boolean;
}

export async function authCommand(
    options: AuthOptions,
    createClient: () => Promise<GitHubAPI> = () => GitHubAPI.fromEnvironment(new ReadlinePrompter())
): Promise<void> {
    let login: string | null = null;
    try {
        const api = await createClient();
        login = (await api.getViewer()).login;
    } catch (error) {
        if (!(error instanceof AuthError) || !options.status) {
            throw error;
        }
    }

    if (options.status) {
        if (login) {
            console.log(chalk.green('✓ Authenticated as'), chalk.bold(login));
        } else {
            console.log(chalk.red('✗ Not authenticated'));
            console.log();
            console.log('To authenticate, either:');
            console.log('  1. Run', chalk.cyan('gh auth login --scopes project'), '(recommended)');
            console.log('  2. Set', chalk.cyan('GITHUB_TOKEN'), 'environment variable');
        }
        return;
    }

    console.log(chalk.green('✓ Already authenticated as'), chalk.bold(login));
}
