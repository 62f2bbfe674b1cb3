import type { ReplicationConnection } from './connection';
import { validateSqlIdentifier } from './env';

export function parseCount(
    value: unknown,
    field: string,
): number {
    const parsed = Number(value);

    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new Error(`invalid ${field} count`);
    }

    return parsed;
}

export function quoteIdentifier(
    value: string,
    field: string,
): string {
    return `"${validateSqlIdentifier(value, field)}"`;
}

export function quoteLiteral(value: string): string {
    return `'${value.split('\'').join('\'\'')}'`;
}

export async function catalogEntryExists(
    connection: ReplicationConnection,
    statement: string,
    name: string,
): Promise<boolean> {
    const rows = await connection.query(statement, [name]);

    return parseCount(rows[0]?.count ?? 0, 'catalog') > 0;
}
