import {
    catalogEntryExists,
    quoteIdentifier,
} from './catalog';
import type { ReplicationConnection } from './connection';
import { ResourceCreationError } from './errors';
import type { PublicationState } from './types';

export const PUBLICATION_EXISTS_SQL =
    'SELECT COUNT(*) AS count FROM pg_publication WHERE pubname = $1';

export function buildCreatePublicationSql(name: string): string {
    return `CREATE PUBLICATION ${quoteIdentifier(name, 'publication name')} `
        + 'FOR ALL TABLES';
}

export async function publicationExists(
    connection: ReplicationConnection,
    name: string,
): Promise<boolean> {
    return catalogEntryExists(connection, PUBLICATION_EXISTS_SQL, name);
}

export async function ensurePublication(
    connection: ReplicationConnection,
    name: string,
): Promise<PublicationState> {
    const statement = buildCreatePublicationSql(name);

    if (await publicationExists(connection, name)) {
        console.log('replication-setup publication already exists', {
            host: connection.endpoint.host,
            publication: name,
        });

        return {
            created: false,
            exists: true,
            name,
        };
    }

    try {
        await connection.transaction(async (tx) => {
            await tx.query(statement);
        });
    } catch (error: unknown) {
        throw new ResourceCreationError('publication', name, error);
    }

    console.log('replication-setup publication created', {
        host: connection.endpoint.host,
        publication: name,
    });

    return {
        created: true,
        exists: true,
        name,
    };
}
