// ====================
// Error Types
// ====================

export class CliError extends Error {
    constructor(
        message: string,
        public code: string
    ) {
        super(message);
        this.name = 'CliError';
    }
}

/**
 * Invalid user input on the command line (flags or positional arguments)
 */
export class FlagError extends CliError {
    constructor(message: string) {
        super(message, 'FLAG_ERROR');
        this.name = 'FlagError';
    }
}

export class AuthError extends CliError {
    constructor(message: string) {
        super(message, 'AUTH_ERROR');
        this.name = 'AuthError';
    }
}

/**
 * The token is valid but lacks the OAuth scopes the Projects API needs
 */
export class ScopeError extends CliError {
    constructor(
        message: string,
        public missingScopes: string[]
    ) {
        super(message, 'SCOPE_ERROR');
        this.name = 'ScopeError';
    }
}
