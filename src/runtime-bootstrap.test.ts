import assert from 'node:assert/strict';
import { test } from 'node:test';
import { ConnectivityError } from './errors';
import { createRuntime, runReplicationSetup } from './runtime';
import {
    buildTestEnv,
    FakePostgresNode,
    FakeReplicationCluster,
} from './test-helpers';

function buildCluster(options: {
    replicaTables?: string[];
} = {}) {
    const primary = new FakePostgresNode('primary.test.local');
    const replica = new FakePostgresNode('replica.test.local', {
        tables: options.replicaTables,
    });

    return {
        cluster: new FakeReplicationCluster([primary, replica]),
        primary,
        replica,
    };
}

test('runtime bootstrap exits 1 without connecting when config is missing',
async () => {
    const { cluster } = buildCluster();
    const env = buildTestEnv();

    delete env.AZURE_POSTGRES_REPLICA_PASSWORD;

    const outcome = await runReplicationSetup(env, {
        createConnectionProvider: () => cluster,
    });

    assert.deepEqual(outcome, {
        exitCode: 1,
        result: null,
    });
    assert.deepEqual(cluster.connectAttempts, []);
});

test('runtime bootstrap exits 1 for an invalid publication name', async () => {
    const { cluster } = buildCluster();
    const outcome = await runReplicationSetup(buildTestEnv({
        REPLICATION_PUBLICATION_NAME: 'products-publication',
    }), {
        createConnectionProvider: () => cluster,
    });

    assert.equal(outcome.exitCode, 1);
    assert.deepEqual(cluster.connectAttempts, []);
});

test('runtime bootstrap wires env endpoints into the orchestrator',
async () => {
    const { cluster, primary, replica } = buildCluster();
    const outcome = await runReplicationSetup(buildTestEnv(), {
        createConnectionProvider: () => cluster,
    });

    assert.equal(outcome.exitCode, 0);
    assert.equal(outcome.result?.outcome, 'succeeded');
    assert.deepEqual(cluster.connectAttempts, [
        'primary.test.local',
        'replica.test.local',
    ]);
    assert.equal(primary.publications.has('products_publication'), true);
    assert.equal(
        replica.subscriptions.get('sales_subscription')?.connInfo,
        'host=primary.test.local dbname=products user=primary_admin '
        + 'password=primary-secret sslmode=require',
    );
});

test('runtime bootstrap exits 1 when the primary is unreachable', async () => {
    const { cluster, primary } = buildCluster();

    primary.unreachable = true;

    const outcome = await runReplicationSetup(buildTestEnv(), {
        createConnectionProvider: () => cluster,
    });

    assert.equal(outcome.exitCode, 1);
    assert.equal(outcome.result?.outcome, 'failed');

    if (outcome.result?.outcome === 'failed') {
        assert.ok(outcome.result.error instanceof ConnectivityError);
    }
});

test('runtime bootstrap passes timeouts to the connection provider', () => {
    let seenConnectTimeout = 0;
    let seenStatementTimeout = 0;
    const { cluster } = buildCluster();

    createRuntime(buildTestEnv({
        REPLICATION_CONNECT_TIMEOUT_MS: '2500',
        REPLICATION_STATEMENT_TIMEOUT_MS: '9000',
    }), {
        createConnectionProvider: (config) => {
            seenConnectTimeout = config.connectTimeoutMs;
            seenStatementTimeout = config.statementTimeoutMs;
            return cluster;
        },
    });

    assert.equal(seenConnectTimeout, 2500);
    assert.equal(seenStatementTimeout, 9000);
});

test('runtime bootstrap skips schema preparation unless enabled', async () => {
    const { cluster, primary } = buildCluster();
    const outcome = await runReplicationSetup(buildTestEnv(), {
        createConnectionProvider: () => cluster,
    });

    assert.equal(primary.tables.size, 0);

    if (outcome.result?.outcome === 'succeeded') {
        assert.equal(outcome.result.schema, null);
    }
});

test('runtime bootstrap recreates tables when the env flag asks for it',
async () => {
    const { cluster, replica } = buildCluster({
        replicaTables: ['products'],
    });
    const outcome = await runReplicationSetup(buildTestEnv({
        REPLICATION_ENSURE_SCHEMA: 'true',
        REPLICATION_RECREATE_SCHEMA: 'true',
    }), {
        createConnectionProvider: () => cluster,
    });

    assert.equal(outcome.exitCode, 0);
    assert.ok(replica.statements.includes('DROP TABLE IF EXISTS orders'));
    assert.ok(replica.statements.includes('DROP TABLE IF EXISTS products'));

    if (outcome.result?.outcome === 'succeeded') {
        assert.equal(outcome.result.schema?.primary.action, 'created');
        assert.equal(outcome.result.schema?.replica.action, 'recreated');
    }
});

test('runtime bootstrap lets a caller decision override the recreate flag',
async () => {
    const { cluster, replica } = buildCluster({
        replicaTables: ['products', 'orders'],
    });
    const asked: string[][] = [];
    const outcome = await runReplicationSetup(buildTestEnv({
        REPLICATION_ENSURE_SCHEMA: 'true',
        REPLICATION_RECREATE_SCHEMA: 'true',
    }), {
        createConnectionProvider: () => cluster,
        recreateSchema: (existingTables) => {
            asked.push(existingTables);
            return false;
        },
    });

    assert.equal(outcome.exitCode, 0);
    assert.deepEqual(asked, [['products', 'orders']]);
    assert.equal(
        replica.statements.some((statement) => statement.startsWith('DROP')),
        false,
    );

    if (outcome.result?.outcome === 'succeeded') {
        assert.equal(outcome.result.schema?.replica.action, 'kept');
    }
});
