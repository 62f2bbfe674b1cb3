import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { ConfigurationError, ResourceCreationError } from './errors';
import {
    buildCreatePublicationSql,
    ensurePublication,
    PUBLICATION_EXISTS_SQL,
} from './publication';
import {
    buildTestEndpoint,
    FakePostgresNode,
    FakeReplicationCluster,
} from './test-helpers';

async function connectTo(node: FakePostgresNode) {
    const cluster = new FakeReplicationCluster([node]);

    return cluster.connect(buildTestEndpoint());
}

describe('ensurePublication', () => {
    it('creates a missing publication inside a committed transaction',
    async () => {
        const node = new FakePostgresNode('primary.test.local');
        const connection = await connectTo(node);
        const state = await ensurePublication(
            connection,
            'products_publication',
        );

        assert.deepEqual(state, {
            created: true,
            exists: true,
            name: 'products_publication',
        });
        assert.deepEqual(node.statements, [
            PUBLICATION_EXISTS_SQL,
            'BEGIN',
            'CREATE PUBLICATION "products_publication" FOR ALL TABLES',
            'COMMIT',
        ]);
        assert.equal(node.publications.has('products_publication'), true);
    });

    it('skips creation when the publication already exists', async () => {
        const node = new FakePostgresNode('primary.test.local', {
            publications: ['products_publication'],
        });
        const connection = await connectTo(node);
        const state = await ensurePublication(
            connection,
            'products_publication',
        );

        assert.deepEqual(state, {
            created: false,
            exists: true,
            name: 'products_publication',
        });
        assert.deepEqual(node.statements, [PUBLICATION_EXISTS_SQL]);
    });

    it('is a no-op on the second call', async () => {
        const node = new FakePostgresNode('primary.test.local');
        const connection = await connectTo(node);

        await ensurePublication(connection, 'products_publication');
        const second = await ensurePublication(
            connection,
            'products_publication',
        );

        assert.equal(second.created, false);
        assert.equal(node.creationStatements().length, 1);
        assert.equal(node.publications.size, 1);
    });

    it('wraps a failed create in ResourceCreationError and rolls back',
    async () => {
        const node = new FakePostgresNode('primary.test.local');

        node.failOn(
            /^CREATE PUBLICATION/,
            'must be superuser to create FOR ALL TABLES publication',
        );

        const connection = await connectTo(node);

        await assert.rejects(
            ensurePublication(connection, 'products_publication'),
            (error: unknown) => {
                assert.ok(error instanceof ResourceCreationError);
                assert.equal(error.resource, 'publication');
                assert.equal(error.resourceName, 'products_publication');
                assert.equal(
                    error.message,
                    'failed to create publication \'products_publication\': '
                    + 'must be superuser to create FOR ALL TABLES publication',
                );
                return true;
            },
        );
        assert.equal(node.statements.at(-1), 'ROLLBACK');
        assert.equal(node.publications.size, 0);
    });

    it('rejects an unsafe name before touching the catalog', async () => {
        const node = new FakePostgresNode('primary.test.local');
        const connection = await connectTo(node);

        await assert.rejects(
            ensurePublication(connection, 'bad name'),
            ConfigurationError,
        );
        assert.deepEqual(node.statements, []);
    });
});

describe('buildCreatePublicationSql', () => {
    it('quotes the publication name', () => {
        assert.equal(
            buildCreatePublicationSql('Products_Pub'),
            'CREATE PUBLICATION "Products_Pub" FOR ALL TABLES',
        );
    });
});
