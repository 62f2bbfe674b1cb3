import {
    catalogEntryExists,
    quoteIdentifier,
    quoteLiteral,
} from './catalog';
import {
    redactSecret,
    type ReplicationConnection,
} from './connection';
import { describeError, ResourceCreationError } from './errors';
import type { Endpoint, SubscriptionState } from './types';

export const SUBSCRIPTION_EXISTS_SQL =
    'SELECT COUNT(*) AS count FROM pg_subscription WHERE subname = $1';

export type EnsureSubscriptionInput = {
    name: string;
    primary: Endpoint;
    publicationName: string;
};

// libpq conninfo values: bare unless empty or containing whitespace,
// quotes or backslashes.
function formatConnInfoValue(value: string): string {
    if (value !== '' && !/[\s'\\]/.test(value)) {
        return value;
    }

    return `'${value.replace(/\\/g, '\\\\').replace(/'/g, '\\\'')}'`;
}

export function buildConnInfo(endpoint: Endpoint): string {
    const pairs: Array<[string, string]> = [
        ['host', endpoint.host],
    ];

    if (endpoint.port !== undefined) {
        pairs.push(['port', String(endpoint.port)]);
    }

    pairs.push(
        ['dbname', endpoint.database],
        ['user', endpoint.user],
        ['password', endpoint.password],
        ['sslmode', endpoint.sslMode],
    );

    return pairs
        .map(([key, value]) => `${key}=${formatConnInfoValue(value)}`)
        .join(' ');
}

export function redactConnInfo(connInfo: string): string {
    return connInfo.replace(
        /password\s*=\s*('(?:[^'\\]|\\.)*'|\S+)/g,
        'password=***',
    );
}

export function buildCreateSubscriptionSql(
    input: EnsureSubscriptionInput,
): string {
    const subscription = quoteIdentifier(input.name, 'subscription name');
    const publication = quoteIdentifier(
        input.publicationName,
        'publication name',
    );

    return `CREATE SUBSCRIPTION ${subscription} `
        + `CONNECTION ${quoteLiteral(buildConnInfo(input.primary))} `
        + `PUBLICATION ${publication}`;
}

export async function subscriptionExists(
    connection: ReplicationConnection,
    name: string,
): Promise<boolean> {
    return catalogEntryExists(connection, SUBSCRIPTION_EXISTS_SQL, name);
}

export async function ensureSubscription(
    connection: ReplicationConnection,
    input: EnsureSubscriptionInput,
): Promise<SubscriptionState> {
    const statement = buildCreateSubscriptionSql(input);

    if (await subscriptionExists(connection, input.name)) {
        console.log('replication-setup subscription already exists', {
            host: connection.endpoint.host,
            subscription: input.name,
        });

        return {
            created: false,
            exists: true,
            name: input.name,
            publicationName: input.publicationName,
        };
    }

    // CREATE SUBSCRIPTION cannot run inside a transaction block.
    try {
        await connection.query(statement);
    } catch (error: unknown) {
        throw new ResourceCreationError(
            'subscription',
            input.name,
            error,
            redactSecret(describeError(error), input.primary.password),
        );
    }

    console.log('replication-setup subscription created', {
        host: connection.endpoint.host,
        primary_host: input.primary.host,
        publication: input.publicationName,
        subscription: input.name,
    });

    return {
        created: true,
        exists: true,
        name: input.name,
        publicationName: input.publicationName,
    };
}
