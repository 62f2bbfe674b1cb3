import type {
    ConnectionProvider,
    ReplicationConnection,
    SqlRow,
} from './connection';
import { ConnectivityError } from './errors';
import { PUBLICATION_EXISTS_SQL } from './publication';
import { RELATION_SYNC_STATES_SQL, SUBSCRIPTIONS_SQL } from './status';
import { SUBSCRIPTION_EXISTS_SQL } from './subscription';
import type { Endpoint } from './types';

export type FakeSubscription = {
    connInfo: string;
    enabled: boolean;
    publication: string;
};

export type FakeRelationState = {
    relation: string;
    state: string;
    subscription: string;
    syncLsn: string | null;
};

export type FakeNodeOptions = {
    maxReplicationSlots?: string;
    maxWalSenders?: string;
    publications?: string[];
    relations?: FakeRelationState[];
    subscriptions?: Record<string, FakeSubscription>;
    tables?: string[];
    walLevel?: string;
};

type StatementFailure = {
    message: string;
    pattern: RegExp;
};

export class FakePostgresNode {
    readonly publications: Set<string>;

    readonly relations: FakeRelationState[];

    readonly settings: Record<string, string>;

    readonly statements: string[] = [];

    readonly subscriptions: Map<string, FakeSubscription>;

    readonly tables: Set<string>;

    closedConnections = 0;

    openedConnections = 0;

    unreachable = false;

    private readonly failures: StatementFailure[] = [];

    constructor(
        readonly host: string,
        options: FakeNodeOptions = {},
    ) {
        this.publications = new Set(options.publications ?? []);
        this.relations = [...(options.relations ?? [])];
        this.settings = {
            max_replication_slots: options.maxReplicationSlots ?? '10',
            max_wal_senders: options.maxWalSenders ?? '10',
            wal_level: options.walLevel ?? 'logical',
        };
        this.subscriptions = new Map(
            Object.entries(options.subscriptions ?? {}),
        );
        this.tables = new Set(options.tables ?? []);
    }

    failOn(pattern: RegExp, message: string): void {
        this.failures.push({ message, pattern });
    }

    creationStatements(): string[] {
        return this.statements.filter((statement) => {
            return statement.startsWith('CREATE PUBLICATION')
                || statement.startsWith('CREATE SUBSCRIPTION');
        });
    }

    get openConnections(): number {
        return this.openedConnections - this.closedConnections;
    }

    checkFailure(statement: string): void {
        const failure = this.failures.find((entry) => {
            return entry.pattern.test(statement);
        });

        if (failure) {
            throw new Error(failure.message);
        }
    }
}

function unquoteSqlLiteral(value: string): string {
    return value.split('\'\'').join('\'');
}

class FakeReplicationConnection implements ReplicationConnection {
    private closed = false;

    private pendingPublications: string[] | null = null;

    constructor(
        readonly endpoint: Endpoint,
        private readonly node: FakePostgresNode,
    ) {}

    async close(): Promise<void> {
        if (this.closed) {
            return;
        }

        this.closed = true;
        this.node.closedConnections += 1;
    }

    async transaction<T>(
        fn: (connection: ReplicationConnection) => Promise<T>,
    ): Promise<T> {
        await this.query('BEGIN');

        try {
            const result = await fn(this);

            await this.query('COMMIT');

            return result;
        } catch (error: unknown) {
            await this.query('ROLLBACK');
            throw error;
        }
    }

    async query(
        text: string,
        values: unknown[] = [],
    ): Promise<SqlRow[]> {
        if (this.closed) {
            throw new Error('connection is closed');
        }

        const statement = text.trim();

        this.node.statements.push(statement);
        this.node.checkFailure(statement);

        return this.execute(statement, values);
    }

    private execute(
        statement: string,
        values: unknown[],
    ): SqlRow[] {
        const show = /^SHOW (\w+)$/.exec(statement);

        if (show) {
            const setting = show[1];

            return [{ [setting]: this.node.settings[setting] }];
        }

        if (statement === 'BEGIN') {
            this.pendingPublications = [];
            return [];
        }

        if (statement === 'COMMIT') {
            for (const name of this.pendingPublications ?? []) {
                this.node.publications.add(name);
            }

            this.pendingPublications = null;
            return [];
        }

        if (statement === 'ROLLBACK') {
            this.pendingPublications = null;
            return [];
        }

        if (statement === PUBLICATION_EXISTS_SQL) {
            const count = this.node.publications.has(String(values[0])) ? 1 : 0;

            return [{ count: String(count) }];
        }

        if (statement === SUBSCRIPTION_EXISTS_SQL) {
            const count = this.node.subscriptions.has(String(values[0])) ? 1 : 0;

            return [{ count: String(count) }];
        }

        const createPublication =
            /^CREATE PUBLICATION "(\w+)" FOR ALL TABLES$/.exec(statement);

        if (createPublication) {
            return this.createPublication(createPublication[1]);
        }

        const createSubscription =
            /^CREATE SUBSCRIPTION "(\w+)" CONNECTION '((?:[^']|'')*)' PUBLICATION "(\w+)"$/
                .exec(statement);

        if (createSubscription) {
            return this.createSubscription(
                createSubscription[1],
                unquoteSqlLiteral(createSubscription[2]),
                createSubscription[3],
            );
        }

        const createTable = /^CREATE TABLE IF NOT EXISTS (\w+)/.exec(statement);

        if (createTable) {
            this.node.tables.add(createTable[1]);
            return [];
        }

        const dropTable = /^DROP TABLE IF EXISTS (\w+)$/.exec(statement);

        if (dropTable) {
            this.node.tables.delete(dropTable[1]);
            return [];
        }

        if (statement.startsWith('SELECT table_name')) {
            return [...this.node.tables].map((table) => ({
                table_name: table,
            }));
        }

        if (statement === SUBSCRIPTIONS_SQL) {
            return [...this.node.subscriptions.entries()].map(([name, sub]) => ({
                subconninfo: sub.connInfo,
                subenabled: sub.enabled,
                subname: name,
            }));
        }

        if (statement === RELATION_SYNC_STATES_SQL.trim()) {
            return this.node.relations.slice(0, 10).map((relation) => ({
                relation_name: relation.relation,
                srsubstate: relation.state,
                srsublsn: relation.syncLsn,
                subname: relation.subscription,
            }));
        }

        throw new Error(`unexpected statement: ${statement}`);
    }

    private createPublication(name: string): SqlRow[] {
        if (this.node.publications.has(name)) {
            throw new Error(`publication "${name}" already exists`);
        }

        if (this.pendingPublications) {
            this.pendingPublications.push(name);
        } else {
            this.node.publications.add(name);
        }

        return [];
    }

    private createSubscription(
        name: string,
        connInfo: string,
        publication: string,
    ): SqlRow[] {
        if (this.pendingPublications) {
            throw new Error(
                'CREATE SUBSCRIPTION cannot run inside a transaction block',
            );
        }

        if (this.node.subscriptions.has(name)) {
            throw new Error(`subscription "${name}" already exists`);
        }

        this.node.subscriptions.set(name, {
            connInfo,
            enabled: true,
            publication,
        });

        return [];
    }
}

export class FakeReplicationCluster implements ConnectionProvider {
    readonly connectAttempts: string[] = [];

    private readonly nodes = new Map<string, FakePostgresNode>();

    constructor(nodes: FakePostgresNode[]) {
        for (const node of nodes) {
            this.nodes.set(node.host, node);
        }
    }

    async connect(endpoint: Endpoint): Promise<ReplicationConnection> {
        this.connectAttempts.push(endpoint.host);

        const node = this.nodes.get(endpoint.host);

        if (!node || node.unreachable) {
            throw new ConnectivityError(
                endpoint.host,
                endpoint.serverName,
                'connection refused',
                new Error('connect ECONNREFUSED'),
            );
        }

        node.openedConnections += 1;

        return new FakeReplicationConnection(endpoint, node);
    }
}

export function buildTestEndpoint(
    overrides: Partial<Endpoint> = {},
): Endpoint {
    return {
        database: 'products',
        host: 'primary.test.local',
        password: 'test-secret',
        serverName: 'primary-server',
        sslMode: 'require',
        user: 'replicator',
        ...overrides,
    };
}

export function buildTestEnv(
    overrides: Record<string, string> = {},
): Record<string, string> {
    return {
        AZURE_POSTGRES_PRIMARY_HOST: 'primary.test.local',
        AZURE_POSTGRES_PRIMARY_PASSWORD: 'primary-secret',
        AZURE_POSTGRES_PRIMARY_SERVER_NAME: 'primary-server',
        AZURE_POSTGRES_PRIMARY_USER: 'primary_admin',
        AZURE_POSTGRES_REPLICA_HOST: 'replica.test.local',
        AZURE_POSTGRES_REPLICA_PASSWORD: 'replica-secret',
        AZURE_POSTGRES_REPLICA_SERVER_NAME: 'replica-server',
        AZURE_POSTGRES_REPLICA_USER: 'replica_admin',
        ...overrides,
    };
}
