export type OwnerType = 'viewer' | 'user' | 'organization';

export interface Owner {
    type: OwnerType;
    login: string;
    id: string;
}

export interface Project {
    id: string;
    number: number;
    title: string;
    url: string;
    shortDescription: string;
    public: boolean;
    closed: boolean;
    template: boolean;
    readme: string;
    itemCount: number;
    fieldCount: number;
    owner: {
        type: 'User' | 'Organization';
        login: string;
    };
}

/**
 * ProjectV2 node as returned by the `projectFields` fragment
 */
export interface ProjectNode {
    id: string;
    number: number;
    title: string;
    url: string;
    shortDescription: string | null;
    public: boolean;
    closed: boolean;
    template: boolean;
    readme: string | null;
    items: { totalCount: number };
    fields: { totalCount: number };
    owner: {
        __typename: string;
        login?: string;
    };
}

/**
 * The operations a command needs from the Projects API
 */
export interface ProjectsClient {
    newOwner(canPrompt: boolean, login: string): Promise<Owner>;
    newProject(canPrompt: boolean, owner: Owner, number: number, includeFields: boolean): Promise<Project>;
    mutate<T>(operationName: string, document: string, variables: Record<string, unknown>): Promise<T>;
}
