import type { ReplicationConfig } from './types';

export type ReplicationResourceKind =
    | 'publication'
    | 'subscription';

export class ReplicationSetupError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ReplicationSetupError';
    }
}

export class ConfigurationError extends ReplicationSetupError {
    readonly missing: string[];

    constructor(message: string, missing: string[] = []) {
        super(message);
        this.name = 'ConfigurationError';
        this.missing = missing;
    }
}

export class ConnectivityError extends ReplicationSetupError {
    constructor(
        readonly host: string,
        readonly label: string,
        causeMessage: string,
        cause: unknown,
    ) {
        super(
            `failed to connect to ${label} database at ${host}: ${causeMessage}`,
            { cause },
        );
        this.name = 'ConnectivityError';
    }
}

export class PreflightError extends ReplicationSetupError {
    constructor(
        message: string,
        readonly config: ReplicationConfig | null,
    ) {
        super(message);
        this.name = 'PreflightError';
    }
}

export class ResourceCreationError extends ReplicationSetupError {
    constructor(
        readonly resource: ReplicationResourceKind,
        readonly resourceName: string,
        cause: unknown,
        detail: string = describeError(cause),
    ) {
        super(
            `failed to create ${resource} '${resourceName}': ${detail}`,
            { cause },
        );
        this.name = 'ResourceCreationError';
    }
}

export class ReportingError extends ReplicationSetupError {
    constructor(cause: unknown) {
        super(
            `replication status query failed: ${describeError(cause)}`,
            { cause },
        );
        this.name = 'ReportingError';
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }

    return String(error);
}
