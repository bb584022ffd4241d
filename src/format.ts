import type { Project } from './types.js';

// Characters written as \uXXXX escapes so the output is safe to embed in HTML
const HTML_UNSAFE = /[<>&\u2028\u2029]/g;

function escapeHTML(json: string): string {
    return json.replace(HTML_UNSAFE, c => `\\u${c.charCodeAt(0).toString(16).padStart(4, '0')}`);
}

/**
 * Serialize a project the way `--format json` prints it
 */
export function jsonProject(project: Project): string {
    return escapeHTML(JSON.stringify({
        number: project.number,
        url: project.url,
        shortDescription: project.shortDescription,
        public: project.public,
        closed: project.closed,
        template: project.template,
        title: project.title,
        id: project.id,
        readme: project.readme,
        items: { totalCount: project.itemCount },
        fields: { totalCount: project.fieldCount },
        owner: {
            type: project.owner.type,
            login: project.owner.login,
        },
    }));
}
