import { graphql } from '@octokit/graphql';
import { exec } from 'child_process';
import { promisify } from 'util';
import { AuthError, ScopeError } from './errors.js';
import type { Prompter } from './prompter.js';
import type { Owner, OwnerType, Project, ProjectNode, ProjectsClient } from './types.js';

const execAsync = promisify(exec);

export type GraphqlRequest = <T>(query: string, parameters?: Record<string, unknown>) => Promise<T>;

// Largest page the API serves for a connection
const LIMIT_MAX = 100;

/**
 * Variables bound by every document that selects `projectFields`
 */
export const PROJECT_FIELDS_VARIABLES = '$firstItems: Int!, $afterItems: String, $firstFields: Int!, $afterFields: String';

export const PROJECT_FIELDS_FRAGMENT = `
    fragment projectFields on ProjectV2 {
        id
        number
        title
        url
        shortDescription
        public
        closed
        template
        readme
        items(first: $firstItems, after: $afterItems) { totalCount }
        fields(first: $firstFields, after: $afterFields) { totalCount }
        owner {
            __typename
            ... on User { login }
            ... on Organization { login }
        }
    }
`;

// Root selection per owner type, aliased to `owner` so responses share a shape
const OWNER_ROOTS: Record<OwnerType, { selection: string; variables: string }> = {
    viewer: { selection: 'owner: viewer', variables: '' },
    user: { selection: 'owner: user(login: $login)', variables: '$login: String!, ' },
    organization: { selection: 'owner: organization(login: $login)', variables: '$login: String!, ' },
};

/**
 * Get token from environment or the gh CLI
 */
export async function getToken(env: NodeJS.ProcessEnv = process.env): Promise<string | null> {
    if (env.GITHUB_TOKEN) {
        return env.GITHUB_TOKEN;
    }
    if (env.GH_TOKEN) {
        return env.GH_TOKEN;
    }

    try {
        const { stdout } = await execAsync('gh auth token');
        return stdout.trim() || null;
    } catch {
        return null;
    }
}

/**
 * Rethrow errors caused by missing OAuth scopes as ScopeError
 */
export function handleScopeError(error: unknown): never {
    if (error && typeof error === 'object' && 'errors' in error && Array.isArray(error.errors)) {
        const scopeError = error.errors.find(
            (e: unknown) => typeof e === 'object' && e !== null && 'type' in e && e.type === 'INSUFFICIENT_SCOPES'
        );
        if (scopeError) {
            throw new ScopeError(
                'Your GitHub token is missing the "project" scope required by GitHub Projects.',
                ['project']
            );
        }
    }
    throw error;
}

export function mapProjectNode(node: ProjectNode): Project {
    return {
        id: node.id,
        number: node.number,
        title: node.title,
        url: node.url,
        shortDescription: node.shortDescription ?? '',
        public: node.public,
        closed: node.closed,
        template: node.template,
        readme: node.readme ?? '',
        itemCount: node.items.totalCount,
        fieldCount: node.fields.totalCount,
        owner: {
            type: node.owner.__typename === 'Organization' ? 'Organization' : 'User',
            login: node.owner.login ?? '',
        },
    };
}

export class GitHubAPI implements ProjectsClient {
    constructor(
        private graphqlWithAuth: GraphqlRequest,
        private prompter: Prompter,
        private defaultOwner: string = ''
    ) {}

    /**
     * Build a client from the token in the environment. No request is made.
     */
    static async fromEnvironment(prompter: Prompter, defaultOwner: string = ''): Promise<GitHubAPI> {
        const token = await getToken();
        if (!token) {
            throw new AuthError('Not authenticated. Run `gh auth login` or set the GITHUB_TOKEN environment variable.');
        }

        const client = graphql.defaults({
            headers: {
                authorization: `token ${token}`,
            },
        });
        return new GitHubAPI(client, prompter, defaultOwner);
    }

    private async request<T>(query: string, variables: Record<string, unknown> = {}): Promise<T> {
        try {
            return await this.graphqlWithAuth<T>(query, variables);
        } catch (error) {
            handleScopeError(error);
        }
    }

    /**
     * Get the authenticated user
     */
    async getViewer(): Promise<{ id: string; login: string }> {
        const response = await this.request<{ viewer: { id: string; login: string } }>(`
            query ViewerLogin {
                viewer {
                    id
                    login
                }
            }
        `);
        return response.viewer;
    }

    /**
     * The viewer followed by the organizations they belong to
     */
    async getOwnerChoices(): Promise<Owner[]> {
        const response = await this.request<{
            viewer: {
                id: string;
                login: string;
                organizations: { nodes: Array<{ id: string; login: string }> };
            };
        }>(`
            query ViewerLoginAndOrgs($first: Int!) {
                viewer {
                    id
                    login
                    organizations(first: $first) {
                        nodes {
                            id
                            login
                        }
                    }
                }
            }
        `, { first: LIMIT_MAX });

        const { viewer } = response;
        return [
            { type: 'viewer', login: viewer.login, id: viewer.id },
            ...viewer.organizations.nodes.map((org): Owner => ({
                type: 'organization',
                login: org.login,
                id: org.id,
            })),
        ];
    }

    /**
     * Look up a login and determine whether it is a user or an organization
     */
    async getOwner(login: string): Promise<Owner> {
        if (login === '@me') {
            const viewer = await this.getViewer();
            return { type: 'viewer', login: viewer.login, id: viewer.id };
        }

        const response = await this.request<{
            repositoryOwner: { __typename: string; id: string; login: string } | null;
        }>(`
            query OwnerType($login: String!) {
                repositoryOwner(login: $login) {
                    __typename
                    id
                    login
                }
            }
        `, { login });

        const found = response.repositoryOwner;
        if (found?.__typename === 'User') {
            return { type: 'user', login: found.login, id: found.id };
        }
        if (found?.__typename === 'Organization') {
            return { type: 'organization', login: found.login, id: found.id };
        }
        throw new Error(`unknown owner type for ${login}`);
    }

    async newOwner(canPrompt: boolean, login: string): Promise<Owner> {
        const ownerLogin = login || this.defaultOwner;
        if (ownerLogin) {
            return this.getOwner(ownerLogin);
        }

        if (!canPrompt) {
            throw new Error('owner is required when not running interactively');
        }

        const choices = await this.getOwnerChoices();
        const idx = await this.prompter.select(
            'Which owner would you like to use?',
            choices.map(o => o.login)
        );
        return choices[idx];
    }

    /**
     * Get a project by owner and number
     */
    async getProject(owner: Owner, number: number, includeFields: boolean): Promise<Project> {
        const root = OWNER_ROOTS[owner.type];
        const response = await this.request<{
            owner: { projectV2: ProjectNode | null } | null;
        }>(`
            query OwnerProject(${root.variables}$number: Int!, ${PROJECT_FIELDS_VARIABLES}) {
                ${root.selection} {
                    projectV2(number: $number) {
                        ...projectFields
                    }
                }
            }
            ${PROJECT_FIELDS_FRAGMENT}
        `, {
            ...(owner.type === 'viewer' ? {} : { login: owner.login }),
            number,
            firstItems: 0,
            afterItems: null,
            firstFields: includeFields ? LIMIT_MAX : 0,
            afterFields: null,
        });

        const node = response.owner?.projectV2;
        if (!node) {
            throw new Error(`project ${number} not found for ${owner.login}`);
        }
        return mapProjectNode(node);
    }

    /**
     * List the first page of an owner's projects
     */
    async getProjects(owner: Owner, includeFields: boolean): Promise<Project[]> {
        const root = OWNER_ROOTS[owner.type];
        const response = await this.request<{
            owner: { projectsV2: { nodes: ProjectNode[] } } | null;
        }>(`
            query OwnerProjects(${root.variables}$first: Int!, ${PROJECT_FIELDS_VARIABLES}) {
                ${root.selection} {
                    projectsV2(first: $first) {
                        nodes {
                            ...projectFields
                        }
                    }
                }
            }
            ${PROJECT_FIELDS_FRAGMENT}
        `, {
            ...(owner.type === 'viewer' ? {} : { login: owner.login }),
            first: LIMIT_MAX,
            firstItems: 0,
            afterItems: null,
            firstFields: includeFields ? LIMIT_MAX : 0,
            afterFields: null,
        });

        return (response.owner?.projectsV2.nodes ?? []).map(mapProjectNode);
    }

    async newProject(canPrompt: boolean, owner: Owner, number: number, includeFields: boolean): Promise<Project> {
        if (number !== 0) {
            return this.getProject(owner, number, includeFields);
        }

        if (!canPrompt) {
            throw new Error('project number is required when not running interactively');
        }

        const projects = await this.getProjects(owner, includeFields);
        if (projects.length === 0) {
            throw new Error(`no projects found for ${owner.login}`);
        }

        const idx = await this.prompter.select(
            'Which project would you like to use?',
            projects.map(p => `${p.title} (#${p.number})`)
        );
        return projects[idx];
    }

    /**
     * Send a mutation document; the parsed response data is returned as-is
     */
    async mutate<T>(operationName: string, document: string, variables: Record<string, unknown>): Promise<T> {
        return this.request<T>(document, { operationName, ...variables });
    }
}
