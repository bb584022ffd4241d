import { GitHubAPI, PROJECT_FIELDS_FRAGMENT, PROJECT_FIELDS_VARIABLES, mapProjectNode } from '../github-api.js';
import { loadConfig, type Config } from '../config.js';
import { FlagError } from '../errors.js';
import { jsonProject } from '../format.js';
import { systemIO, writeOut, type IOStreams } from '../iostreams.js';
import { ReadlinePrompter } from '../prompter.js';
import type { Project, ProjectNode, ProjectsClient } from '../types.js';

export type TemplateFormat = '' | 'json';

export interface TemplateOptions {
    owner: string;
    undo: boolean;
    number: number;
    projectId: string;
    format: TemplateFormat;
}

export interface TemplateConfig {
    client: ProjectsClient;
    opts: TemplateOptions;
    io: IOStreams;
}

export type TemplateAction = 'mark' | 'unmark';

export interface TemplateMutation {
    action: TemplateAction;
    operationName: string;
    document: string;
    variables: Record<string, unknown>;
}

export interface TemplateMutationResponse {
    templateProject: {
        projectV2: ProjectNode;
    };
}

/**
 * The returned project's items and fields connections are requested with
 * zero entries; the command only needs the project itself.
 */
export const PROJECT_PAGINATION_SUPPRESSED = {
    firstItems: 0,
    afterItems: null,
    firstFields: 0,
    afterFields: null,
} as const;

const TEMPLATE_MUTATIONS: Record<TemplateAction, { operationName: string; field: string; inputType: string; verb: string }> = {
    mark: {
        operationName: 'MarkProjectTemplate',
        field: 'markProjectV2AsTemplate',
        inputType: 'MarkProjectV2AsTemplateInput',
        verb: 'Marked',
    },
    unmark: {
        operationName: 'UnmarkProjectTemplate',
        field: 'unmarkProjectV2AsTemplate',
        inputType: 'UnmarkProjectV2AsTemplateInput',
        verb: 'Unmarked',
    },
};

export function templateAction(undo: boolean): TemplateAction {
    return undo ? 'unmark' : 'mark';
}

export function templateMutation(action: TemplateAction, projectId: string): TemplateMutation {
    const { operationName, field, inputType } = TEMPLATE_MUTATIONS[action];
    return {
        action,
        operationName,
        document: `
            mutation ${operationName}($input: ${inputType}!, ${PROJECT_FIELDS_VARIABLES}) {
                templateProject: ${field}(input: $input) {
                    projectV2 {
                        ...projectFields
                    }
                }
            }
            ${PROJECT_FIELDS_FRAGMENT}
        `,
        variables: {
            input: { projectId },
            ...PROJECT_PAGINATION_SUPPRESSED,
        },
    };
}

/**
 * Parse a positional project number as a signed 32-bit integer
 */
export function parseProjectNumber(token: string): number {
    if (!/^[+-]?\d+$/.test(token)) {
        throw new FlagError(`invalid number: ${token}`);
    }
    const value = Number(token);
    if (value < -2147483648 || value > 2147483647) {
        throw new FlagError(`invalid number: ${token}`);
    }
    return value;
}

export async function runTemplate(config: TemplateConfig): Promise<void> {
    const { client, opts, io } = config;
    const canPrompt = io.canPrompt();

    const owner = await client.newOwner(canPrompt, opts.owner);
    const project = await client.newProject(canPrompt, owner, opts.number, false);
    opts.projectId = project.id;

    const mutation = templateMutation(templateAction(opts.undo), opts.projectId);
    const response = await client.mutate<TemplateMutationResponse>(
        mutation.operationName,
        mutation.document,
        mutation.variables
    );

    // JSON output is the project as fetched before the mutation
    if (opts.format === 'json') {
        return printJSON(config, project);
    }

    return printResults(config, mapProjectNode(response.templateProject.projectV2));
}

export async function printResults(config: TemplateConfig, project: Project): Promise<void> {
    if (!config.io.isStdoutTTY()) {
        return;
    }

    const { verb } = TEMPLATE_MUTATIONS[templateAction(config.opts.undo)];
    await writeOut(config.io.out, `${verb} project ${project.number} as a template.\n`);
}

export async function printJSON(config: TemplateConfig, project: Project): Promise<void> {
    await writeOut(config.io.out, jsonProject(project));
}

interface TemplateFlags {
    owner?: string;
    undo?: boolean;
    format?: TemplateFormat;
}

export interface TemplateDeps {
    config?: Config;
    createClient?: () => Promise<ProjectsClient>;
    io?: IOStreams;
    run?: (config: TemplateConfig) => Promise<void>;
}

export async function templateCommand(
    number: string | undefined,
    flags: TemplateFlags,
    deps: TemplateDeps = {}
): Promise<void> {
    const opts: TemplateOptions = {
        owner: flags.owner ?? '',
        undo: flags.undo ?? false,
        number: number === undefined ? 0 : parseProjectNumber(number),
        projectId: '',
        format: flags.format ?? '',
    };

    const config = deps.config ?? loadConfig();
    const createClient = deps.createClient
        ?? (() => GitHubAPI.fromEnvironment(new ReadlinePrompter(), config.defaultOwner));

    const templateConfig: TemplateConfig = {
        client: await createClient(),
        opts,
        io: deps.io ?? systemIO(config),
    };

    const run = deps.run ?? runTemplate;
    return run(templateConfig);
}
