import { Client, type ClientConfig, type QueryResultRow } from 'pg';
import { ConnectivityError, describeError } from './errors';
import type { Endpoint, SslMode } from './types';

export interface SqlSession {
    connect(): Promise<void>;
    end(): Promise<void>;
    query(
        text: string,
        values?: unknown[],
    ): Promise<{ rows: QueryResultRow[] }>;
}

export type SqlRow = Record<string, unknown>;

export interface ReplicationConnection {
    readonly endpoint: Endpoint;
    close(): Promise<void>;

    /**
     * Runs one statement outside any explicit transaction block, so the
     * server commits it on its own.
     */
    query(
        text: string,
        values?: unknown[],
    ): Promise<SqlRow[]>;
    transaction<T>(
        fn: (connection: ReplicationConnection) => Promise<T>,
    ): Promise<T>;
}

export interface ConnectionProvider {
    connect(endpoint: Endpoint): Promise<ReplicationConnection>;
}

export type PgConnectionProviderOptions = {
    connectTimeoutMs?: number;
    createSession?: (config: ClientConfig) => SqlSession;
    statementTimeoutMs?: number;
};

const DEFAULT_CONNECT_TIMEOUT_MS = 10000;
const DEFAULT_STATEMENT_TIMEOUT_MS = 30000;

function toSslOption(
    mode: SslMode,
): ClientConfig['ssl'] {
    switch (mode) {
    case 'disable':
        return false;
    case 'allow':
    case 'prefer':
    case 'require':
        return { rejectUnauthorized: false };
    case 'verify-ca':
        return {
            checkServerIdentity: () => undefined,
            rejectUnauthorized: true,
        };
    case 'verify-full':
        return { rejectUnauthorized: true };
    }
}

// Shorter secrets are only masked where they follow `password=`.
const MIN_BARE_REDACTION_LENGTH = 4;

export function redactSecret(
    message: string,
    secret: string,
): string {
    if (!secret) {
        return message;
    }

    const keyed = message.split(`password=${secret}`).join('password=***');

    if (secret.length < MIN_BARE_REDACTION_LENGTH) {
        return keyed;
    }

    return keyed.split(secret).join('***');
}

function createPgSession(config: ClientConfig): SqlSession {
    const client = new Client(config);
    const password = typeof config.password === 'string'
        ? config.password
        : '';

    client.on('error', (error: Error) => {
        console.error('replication-setup connection error', {
            error: redactSecret(error.message, password),
            host: config.host,
        });
    });

    return {
        connect: () => client.connect(),
        end: () => client.end(),
        query: (
            text: string,
            values?: unknown[],
        ) => client.query(text, values),
    };
}

class SessionReplicationConnection implements ReplicationConnection {
    private closed = false;

    private inTransaction = false;

    constructor(
        readonly endpoint: Endpoint,
        private readonly session: SqlSession,
    ) {}

    async query(
        text: string,
        values?: unknown[],
    ): Promise<SqlRow[]> {
        if (this.closed) {
            throw new Error(
                `connection to ${this.endpoint.host} is already closed`,
            );
        }

        const result = await this.session.query(text, values);

        return result.rows;
    }

    async transaction<T>(
        fn: (connection: ReplicationConnection) => Promise<T>,
    ): Promise<T> {
        if (this.inTransaction) {
            throw new Error('nested transactions are not supported');
        }

        this.inTransaction = true;

        try {
            await this.query('BEGIN');

            try {
                const result = await fn(this);

                await this.query('COMMIT');

                return result;
            } catch (error: unknown) {
                await this.rollbackAfter(error);
                throw error;
            }
        } finally {
            this.inTransaction = false;
        }
    }

    async close(): Promise<void> {
        if (this.closed) {
            return;
        }

        this.closed = true;
        await this.session.end();
    }

    private async rollbackAfter(error: unknown): Promise<void> {
        try {
            await this.query('ROLLBACK');
        } catch (rollbackError: unknown) {
            console.error('replication-setup rollback failed', {
                error: describeError(rollbackError),
                host: this.endpoint.host,
                original_error: describeError(error),
            });
        }
    }
}

export class PgConnectionProvider implements ConnectionProvider {
    private readonly connectTimeoutMs: number;

    private readonly createSession: (config: ClientConfig) => SqlSession;

    private readonly statementTimeoutMs: number;

    constructor(options: PgConnectionProviderOptions = {}) {
        this.connectTimeoutMs = options.connectTimeoutMs
            ?? DEFAULT_CONNECT_TIMEOUT_MS;
        this.createSession = options.createSession ?? createPgSession;
        this.statementTimeoutMs = options.statementTimeoutMs
            ?? DEFAULT_STATEMENT_TIMEOUT_MS;
    }

    async connect(endpoint: Endpoint): Promise<ReplicationConnection> {
        const label = endpoint.serverName || endpoint.database;

        console.log('replication-setup connecting', {
            database: endpoint.database,
            host: endpoint.host,
            server_name: label,
        });

        const session = this.createSession({
            application_name: 'pg-logical-replication-setup',
            connectionTimeoutMillis: this.connectTimeoutMs,
            database: endpoint.database,
            host: endpoint.host,
            password: endpoint.password,
            port: endpoint.port,
            query_timeout: this.statementTimeoutMs,
            ssl: toSslOption(endpoint.sslMode),
            statement_timeout: this.statementTimeoutMs,
            user: endpoint.user,
        });

        try {
            await session.connect();
            await session.query('SELECT 1');
        } catch (error: unknown) {
            await session.end().catch((endError: unknown) => {
                console.warn('replication-setup half-open connection close failed', {
                    error: redactSecret(
                        describeError(endError),
                        endpoint.password,
                    ),
                    host: endpoint.host,
                });
            });

            throw new ConnectivityError(
                endpoint.host,
                label,
                redactSecret(describeError(error), endpoint.password),
                error,
            );
        }

        console.log('replication-setup connected', {
            host: endpoint.host,
            server_name: label,
        });

        return new SessionReplicationConnection(endpoint, session);
    }
}

export async function withConnection<T>(
    provider: ConnectionProvider,
    endpoint: Endpoint,
    fn: (connection: ReplicationConnection) => Promise<T>,
): Promise<T> {
    const connection = await provider.connect(endpoint);

    try {
        return await fn(connection);
    } finally {
        await connection.close().catch((error: unknown) => {
            console.warn('replication-setup connection close failed', {
                error: redactSecret(describeError(error), endpoint.password),
                host: endpoint.host,
            });
        });
    }
}
