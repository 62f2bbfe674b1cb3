import type { ReplicationConnection } from './connection';

export type SchemaAction =
    | 'created'
    | 'recreated'
    | 'kept';

export type RecreateDecision =
    | boolean
    | ((existingTables: string[]) => boolean | Promise<boolean>);

export type EnsureSchemaOptions = {
    recreate?: RecreateDecision;
};

export type SchemaResult = {
    action: SchemaAction;
    existingTables: string[];
};

export const SCHEMA_TABLES = ['products', 'orders'] as const;

// Creation order; drops run in reverse because orders references products.
const CREATE_TABLE_SQL: readonly string[] = [
    `
CREATE TABLE IF NOT EXISTS products (
    id SERIAL PRIMARY KEY,
    name VARCHAR(100) NOT NULL,
    category VARCHAR(50) NOT NULL,
    price NUMERIC(10, 2) NOT NULL,
    in_stock BOOLEAN NOT NULL DEFAULT TRUE,
    created_at TIMESTAMP DEFAULT now()
)`,
    `
CREATE TABLE IF NOT EXISTS orders (
    id SERIAL PRIMARY KEY,
    product_id INTEGER REFERENCES products (id),
    quantity INTEGER NOT NULL,
    order_date TIMESTAMP DEFAULT now()
)`,
];

const EXISTING_TABLES_SQL = `
SELECT table_name
FROM information_schema.tables
WHERE table_schema = 'public'
AND table_name IN ('products', 'orders')`;

export async function listExistingTables(
    connection: ReplicationConnection,
): Promise<string[]> {
    const rows = await connection.query(EXISTING_TABLES_SQL);
    const present = new Set(rows.map((row) => String(row.table_name)));

    return SCHEMA_TABLES.filter((table) => present.has(table));
}

export async function dropSchema(
    connection: ReplicationConnection,
): Promise<void> {
    for (const table of [...SCHEMA_TABLES].reverse()) {
        await connection.query(`DROP TABLE IF EXISTS ${table}`);
    }

    console.log('replication-setup tables dropped', {
        host: connection.endpoint.host,
        tables: [...SCHEMA_TABLES],
    });
}

async function resolveRecreate(
    decision: RecreateDecision,
    existingTables: string[],
): Promise<boolean> {
    if (typeof decision === 'boolean') {
        return decision;
    }

    return decision(existingTables);
}

export async function ensureSchema(
    connection: ReplicationConnection,
    options: EnsureSchemaOptions = {},
): Promise<SchemaResult> {
    const existingTables = await listExistingTables(connection);
    let action: SchemaAction = 'created';

    if (existingTables.length > 0) {
        const recreate = await resolveRecreate(
            options.recreate ?? false,
            existingTables,
        );

        if (!recreate) {
            console.log('replication-setup using existing tables', {
                host: connection.endpoint.host,
                tables: existingTables,
            });

            return {
                action: 'kept',
                existingTables,
            };
        }

        await dropSchema(connection);
        action = 'recreated';
    }

    for (const statement of CREATE_TABLE_SQL) {
        await connection.query(statement);
    }

    console.log('replication-setup tables created', {
        action,
        host: connection.endpoint.host,
    });

    return {
        action,
        existingTables,
    };
}
