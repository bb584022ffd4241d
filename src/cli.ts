import { Command, CommanderError, Option } from 'commander';
import chalk from 'chalk';
import { createRequire } from 'module';
import { templateCommand, type TemplateDeps, type TemplateFormat } from './commands/template.js';
import { authCommand } from './commands/auth.js';
import { configCommand } from './commands/config.js';
import { FlagError, ScopeError } from './errors.js';

const require = createRequire(import.meta.url);
const pkg: { version: string } = require('../package.json');

const TEMPLATE_EXAMPLES = `
Examples:
  # mark the acme org's project "1" as a template
  $ projects template 1 --owner "acme"

  # unmark the acme org's project "1" as a template
  $ projects template 1 --owner "acme" --undo
`;

export function createProgram(templateDeps: TemplateDeps = {}): Command {
    const program = new Command();

    // Usage errors are thrown to handleError instead of exiting; subcommands inherit this
    program
        .name('projects')
        .description('GitHub Projects CLI - manage project templates from your terminal')
        .version(pkg.version)
        .exitOverride();

    // Authentication
    program
        .command('auth')
        .description('Check authentication with GitHub')
        .option('--status', 'Check authentication status')
        .action((options: { status?: boolean }) => authCommand(options));

    // Configuration
    program
        .command('config')
        .description('View or set configuration')
        .argument('[key]', 'Config key to get/set')
        .argument('[value]', 'Value to set')
        .option('-s, --show', 'Show merged config with the source of each value')
        .action((key: string | undefined, value: string | undefined, options: { show?: boolean }) =>
            configCommand(key, value, options)
        );

    // Templates
    program
        .command('template')
        .description('Mark a project as a template')
        .argument('[number]', 'Project number')
        .allowExcessArguments(false)
        .option('--owner <login>', 'Login of the org owner.')
        .option('--undo', 'Unmark the project as a template.')
        .addOption(new Option('--format <format>', 'Output format').choices(['json']))
        .addHelpText('after', TEMPLATE_EXAMPLES)
        .action((number: string | undefined, options: { owner?: string; undo?: boolean; format?: TemplateFormat }) =>
            templateCommand(number, options, templateDeps)
        );

    return program;
}

/**
 * Report a failed command on stderr and set a failing exit code
 */
export function handleError(error: unknown): void {
    if (error instanceof CommanderError) {
        // Commander has already printed its message
        process.exitCode = error.exitCode;
        return;
    }

    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red('Error:'), message);

    if (error instanceof FlagError) {
        console.error(chalk.dim('Run with --help for usage.'));
    } else if (error instanceof ScopeError) {
        console.error('Run this command to add the required scope:');
        console.error(chalk.cyan(`  gh auth refresh ${error.missingScopes.map(s => `-s ${s}`).join(' ')}`));
    }

    process.exitCode = 1;
}
