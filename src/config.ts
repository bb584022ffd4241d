import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { execSync } from 'child_process';

// User config (personal overrides)
const USER_CONFIG_DIR = join(homedir(), '.config', 'projects-cli');
const USER_CONFIG_FILE = join(USER_CONFIG_DIR, 'config.json');

// Workspace config filename (in repo root)
const WORKSPACE_CONFIG_DIR = '.projects';
const WORKSPACE_CONFIG_FILE = 'config.json';

export type PromptSetting = 'enabled' | 'disabled';

export interface Config {
    // Owner used when --owner is not given
    defaultOwner: string;
    // Interactive prompts for missing owner/project
    prompt: PromptSetting;
}

export const DEFAULT_CONFIG: Config = {
    defaultOwner: '',
    prompt: 'enabled',
};

export const CONFIG_KEYS = ['defaultOwner', 'prompt'] as const;

export type ConfigKey = typeof CONFIG_KEYS[number];

export type ConfigSource = 'default' | 'workspace' | 'user' | 'env';

export interface ConfigValueWithSource {
    value: string;
    source: ConfigSource;
}

export function isConfigKey(key: string): key is ConfigKey {
    return (CONFIG_KEYS as readonly string[]).includes(key);
}

function isPromptSetting(value: unknown): value is PromptSetting {
    return value === 'enabled' || value === 'disabled';
}

/**
 * Keep only known keys with values of the right type
 */
export function sanitizeConfig(raw: unknown): Partial<Config> {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return {};

    const result: Partial<Config> = {};
    if ('defaultOwner' in raw && typeof raw.defaultOwner === 'string') {
        result.defaultOwner = raw.defaultOwner;
    }
    if ('prompt' in raw && isPromptSetting(raw.prompt)) {
        result.prompt = raw.prompt;
    }
    return result;
}

/**
 * Get the git repository root directory
 */
function getRepoRoot(): string | null {
    try {
        return execSync('git rev-parse --show-toplevel', {
            encoding: 'utf-8',
            stdio: ['ignore', 'pipe', 'ignore'],
        }).trim();
    } catch {
        return null;
    }
}

/**
 * Get the workspace config file path (in repo root)
 */
export function getWorkspaceConfigPath(): string | null {
    const repoRoot = getRepoRoot();
    if (!repoRoot) return null;
    return join(repoRoot, WORKSPACE_CONFIG_DIR, WORKSPACE_CONFIG_FILE);
}

function readConfigFile(path: string | null): Partial<Config> {
    if (!path || !existsSync(path)) return {};

    try {
        return sanitizeConfig(JSON.parse(readFileSync(path, 'utf-8')));
    } catch {
        // Unreadable or malformed files count as empty
        return {};
    }
}

/**
 * Load workspace config from .projects/config.json in repo root
 */
function loadWorkspaceConfig(): Partial<Config> {
    return readConfigFile(getWorkspaceConfigPath());
}

/**
 * Load user config from ~/.config/projects-cli/config.json
 */
function loadUserConfig(): Partial<Config> {
    return readConfigFile(USER_CONFIG_FILE);
}

/**
 * Config values taken from PROJECTS_OWNER and PROJECTS_PROMPT
 */
export function envConfig(env: NodeJS.ProcessEnv = process.env): Partial<Config> {
    return sanitizeConfig({
        defaultOwner: env.PROJECTS_OWNER || undefined,
        prompt: env.PROJECTS_PROMPT,
    });
}

/**
 * Merge config layers left to right; later layers win
 */
export function mergeConfig(...layers: Partial<Config>[]): Config {
    let result: Config = { ...DEFAULT_CONFIG };
    for (const layer of layers) {
        result = {
            defaultOwner: layer.defaultOwner ?? result.defaultOwner,
            prompt: layer.prompt ?? result.prompt,
        };
    }
    return result;
}

/**
 * Load merged config: defaults → workspace → user → environment
 */
export function loadConfig(): Config {
    return mergeConfig(loadWorkspaceConfig(), loadUserConfig(), envConfig());
}

export function getConfig<K extends keyof Config>(key: K): Config[K] {
    return loadConfig()[key];
}

/**
 * Save a key to the user config, validating its value
 */
export function setConfig(key: ConfigKey, value: string): void {
    const update = sanitizeConfig({ [key]: value });
    if (update[key] === undefined) {
        throw new Error(`Invalid value for ${key}: "${value}"`);
    }

    const merged = { ...loadUserConfig(), ...update };
    if (!existsSync(USER_CONFIG_DIR)) {
        mkdirSync(USER_CONFIG_DIR, { recursive: true });
    }
    writeFileSync(USER_CONFIG_FILE, JSON.stringify(merged, null, 2));
}

export function getUserConfigPath(): string {
    return USER_CONFIG_FILE;
}

/**
 * Pick the layer a key's effective value comes from
 */
export function resolveSource(
    key: ConfigKey,
    layers: { workspace: Partial<Config>; user: Partial<Config>; env: Partial<Config> }
): ConfigValueWithSource {
    const envValue = layers.env[key];
    if (envValue !== undefined) {
        return { value: envValue, source: 'env' };
    }
    const userValue = layers.user[key];
    if (userValue !== undefined) {
        return { value: userValue, source: 'user' };
    }
    const workspaceValue = layers.workspace[key];
    if (workspaceValue !== undefined) {
        return { value: workspaceValue, source: 'workspace' };
    }
    return { value: DEFAULT_CONFIG[key], source: 'default' };
}

/**
 * List config values with their source (default, workspace, user or env)
 */
export function listConfigWithSources(): Record<ConfigKey, ConfigValueWithSource> {
    const layers = {
        workspace: loadWorkspaceConfig(),
        user: loadUserConfig(),
        env: envConfig(),
    };
    return {
        defaultOwner: resolveSource('defaultOwner', layers),
        prompt: resolveSource('prompt', layers),
    };
}
