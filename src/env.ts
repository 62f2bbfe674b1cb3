import { ConfigurationError } from './errors';
import type { Endpoint, SslMode } from './types';

export type ReplicationEnv = Readonly<{
    connectTimeoutMs: number;
    ensureSchema: boolean;
    primary: Endpoint;
    publicationName: string;
    recreateSchema: boolean;
    replica: Endpoint;
    statementTimeoutMs: number;
    subscriptionName: string;
}>;

type EndpointRole = 'PRIMARY' | 'REPLICA';

const SSL_MODES: readonly SslMode[] = [
    'disable',
    'allow',
    'prefer',
    'require',
    'verify-ca',
    'verify-full',
];

const DEFAULT_DATABASES: Record<EndpointRole, string> = {
    PRIMARY: 'products',
    REPLICA: 'sales',
};

const DEFAULT_PUBLICATION_NAME = 'products_publication';
const DEFAULT_SUBSCRIPTION_NAME = 'sales_subscription';

export const REQUIRED_ENV_KEYS: readonly string[] = [
    'AZURE_POSTGRES_PRIMARY_HOST',
    'AZURE_POSTGRES_PRIMARY_USER',
    'AZURE_POSTGRES_PRIMARY_PASSWORD',
    'AZURE_POSTGRES_PRIMARY_SERVER_NAME',
    'AZURE_POSTGRES_REPLICA_HOST',
    'AZURE_POSTGRES_REPLICA_USER',
    'AZURE_POSTGRES_REPLICA_PASSWORD',
    'AZURE_POSTGRES_REPLICA_SERVER_NAME',
];

function readOptionalString(
    value: string | undefined,
): string | undefined {
    if (value === undefined) {
        return undefined;
    }

    const trimmed = String(value).trim();

    return trimmed || undefined;
}

function parsePositiveInt(
    value: string | undefined,
    fallback: number,
    key: string,
): number {
    const normalized = readOptionalString(value);

    if (!normalized) {
        return fallback;
    }

    const parsed = Number(normalized);

    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new ConfigurationError(
            `${key} must be a positive integer when provided`,
        );
    }

    return parsed;
}

function parsePort(
    value: string,
    key: string,
): number {
    const parsed = /^\d+$/.test(value) ? Number(value) : Number.NaN;

    if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
        throw new ConfigurationError(
            `${key} must be an integer between 1 and 65535 when provided`,
        );
    }

    return parsed;
}

// Passwords are taken verbatim; only an all-whitespace value counts as unset.
function readSecret(
    value: string | undefined,
): string {
    return value !== undefined && value.trim() ? value : '';
}

function parseBoolean(
    value: string | undefined,
    fallback: boolean,
    key: string,
): boolean {
    const normalized = readOptionalString(value)?.toLowerCase();

    if (!normalized) {
        return fallback;
    }

    if (
        normalized === '1'
        || normalized === 'true'
        || normalized === 'yes'
        || normalized === 'on'
    ) {
        return true;
    }

    if (
        normalized === '0'
        || normalized === 'false'
        || normalized === 'no'
        || normalized === 'off'
    ) {
        return false;
    }

    throw new ConfigurationError(`${key} must be true or false when provided`);
}

function isSslMode(value: string): value is SslMode {
    return SSL_MODES.some((mode) => mode === value);
}

function parseSslMode(
    value: string | undefined,
): SslMode {
    const normalized = readOptionalString(value)?.toLowerCase() || 'require';

    if (isSslMode(normalized)) {
        return normalized;
    }

    throw new ConfigurationError(
        `AZURE_POSTGRES_SSL_MODE must be one of ${SSL_MODES.join('|')}`,
    );
}

export function validateSqlIdentifier(
    value: string,
    field: string,
): string {
    const trimmed = String(value || '').trim();

    if (!trimmed) {
        throw new ConfigurationError(`${field} must not be empty`);
    }

    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(trimmed)) {
        throw new ConfigurationError(
            `${field} must use [A-Za-z_][A-Za-z0-9_]* identifier format`,
        );
    }

    if (trimmed.length > 63) {
        throw new ConfigurationError(
            `${field} must be at most 63 characters`,
        );
    }

    return trimmed;
}

function findMissingKeys(
    env: NodeJS.ProcessEnv,
): string[] {
    return REQUIRED_ENV_KEYS.filter((key) => !readOptionalString(env[key]));
}

function readEndpoint(
    env: NodeJS.ProcessEnv,
    role: EndpointRole,
    sslMode: SslMode,
): Endpoint {
    const prefix = `AZURE_POSTGRES_${role}`;
    const port = readOptionalString(env[`${prefix}_PORT`]);
    const endpoint: Endpoint = {
        database: readOptionalString(env[`${prefix}_DB`])
            || DEFAULT_DATABASES[role],
        host: readOptionalString(env[`${prefix}_HOST`]) || '',
        password: readSecret(env[`${prefix}_PASSWORD`]),
        port: port === undefined
            ? undefined
            : parsePort(port, `${prefix}_PORT`),
        serverName: readOptionalString(env[`${prefix}_SERVER_NAME`]) || '',
        sslMode,
        user: readOptionalString(env[`${prefix}_USER`]) || '',
    };

    return Object.freeze(endpoint);
}

export function parseReplicationEnv(
    env: NodeJS.ProcessEnv,
): ReplicationEnv {
    const missing = findMissingKeys(env);

    if (missing.length > 0) {
        throw new ConfigurationError(
            `missing required environment variables: ${missing.join(', ')}`,
            missing,
        );
    }

    const sslMode = parseSslMode(env.AZURE_POSTGRES_SSL_MODE);
    const ensureSchema = parseBoolean(
        env.REPLICATION_ENSURE_SCHEMA,
        false,
        'REPLICATION_ENSURE_SCHEMA',
    );
    const recreateSchema = parseBoolean(
        env.REPLICATION_RECREATE_SCHEMA,
        false,
        'REPLICATION_RECREATE_SCHEMA',
    );

    if (recreateSchema && !ensureSchema) {
        throw new ConfigurationError(
            'REPLICATION_RECREATE_SCHEMA=true requires '
            + 'REPLICATION_ENSURE_SCHEMA=true',
        );
    }

    return Object.freeze({
        connectTimeoutMs: parsePositiveInt(
            env.REPLICATION_CONNECT_TIMEOUT_MS,
            10000,
            'REPLICATION_CONNECT_TIMEOUT_MS',
        ),
        ensureSchema,
        primary: readEndpoint(env, 'PRIMARY', sslMode),
        publicationName: validateSqlIdentifier(
            readOptionalString(env.REPLICATION_PUBLICATION_NAME)
                || DEFAULT_PUBLICATION_NAME,
            'REPLICATION_PUBLICATION_NAME',
        ),
        recreateSchema,
        replica: readEndpoint(env, 'REPLICA', sslMode),
        statementTimeoutMs: parsePositiveInt(
            env.REPLICATION_STATEMENT_TIMEOUT_MS,
            30000,
            'REPLICATION_STATEMENT_TIMEOUT_MS',
        ),
        subscriptionName: validateSqlIdentifier(
            readOptionalString(env.REPLICATION_SUBSCRIPTION_NAME)
                || DEFAULT_SUBSCRIPTION_NAME,
            'REPLICATION_SUBSCRIPTION_NAME',
        ),
    });
}
