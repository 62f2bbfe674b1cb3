import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { PreflightError } from './errors';
import {
    buildPreflightRemediation,
    checkReplicationPreflight,
    evaluateReplicationConfig,
} from './preflight';
import {
    buildTestEndpoint,
    FakePostgresNode,
    type FakeNodeOptions,
    FakeReplicationCluster,
} from './test-helpers';

async function runPreflight(options: FakeNodeOptions) {
    const node = new FakePostgresNode('primary.test.local', options);
    const cluster = new FakeReplicationCluster([node]);
    const connection = await cluster.connect(buildTestEndpoint());

    try {
        return {
            node,
            result: await checkReplicationPreflight(connection),
        };
    } finally {
        await connection.close();
    }
}

describe('checkReplicationPreflight', () => {
    it('is ready with no warnings on a well-configured primary', async () => {
        const { node, result } = await runPreflight({
            maxReplicationSlots: '10',
            maxWalSenders: '10',
            walLevel: 'logical',
        });

        assert.equal(result.ready, true);
        assert.deepEqual(result.warnings, []);
        assert.deepEqual(result.config, {
            maxReplicationSlots: 10,
            maxWalSenders: 10,
            walLevel: 'logical',
        });
        assert.deepEqual(node.statements, [
            'SHOW wal_level',
            'SHOW max_replication_slots',
            'SHOW max_wal_senders',
        ]);
    });

    it('is not ready when wal_level is replica', async () => {
        const { result } = await runPreflight({
            walLevel: 'replica',
        });

        assert.equal(result.ready, false);
        assert.equal(result.config.walLevel, 'replica');
    });

    it('is not ready when wal_level is minimal', async () => {
        const { result } = await runPreflight({
            walLevel: 'minimal',
        });

        assert.equal(result.ready, false);
    });

    it('warns but stays ready when replication slots are below 5', async () => {
        const { result } = await runPreflight({
            maxReplicationSlots: '3',
            walLevel: 'logical',
        });

        assert.equal(result.ready, true);
        assert.deepEqual(result.warnings, [
            'max_replication_slots is set to 3; consider raising it to at least 5',
        ]);
    });

    it('warns when wal senders are below 10', async () => {
        const { result } = await runPreflight({
            maxWalSenders: '4',
        });

        assert.equal(result.ready, true);
        assert.deepEqual(result.warnings, [
            'max_wal_senders is set to 4; consider raising it to at least 10',
        ]);
    });

    it('never issues statements that change the server', async () => {
        const { node } = await runPreflight({
            walLevel: 'replica',
        });

        assert.equal(
            node.statements.every((statement) => statement.startsWith('SHOW ')),
            true,
        );
        assert.equal(node.publications.size, 0);
    });

    it('rejects an unrecognised wal_level', async () => {
        await assert.rejects(
            runPreflight({ walLevel: 'archive' }),
            (error: unknown) => {
                assert.ok(error instanceof PreflightError);
                assert.equal(error.message, 'unrecognised wal_level \'archive\'');
                return true;
            },
        );
    });

    it('rejects a non-integer setting', async () => {
        await assert.rejects(
            runPreflight({ maxWalSenders: 'lots' }),
            /max_wal_senders must be a non-negative integer, got 'lots'/,
        );
    });
});

describe('evaluateReplicationConfig', () => {
    it('applies custom thresholds', () => {
        const result = evaluateReplicationConfig({
            maxReplicationSlots: 8,
            maxWalSenders: 8,
            walLevel: 'logical',
        }, {
            minReplicationSlots: 10,
            minWalSenders: 4,
        });

        assert.deepEqual(result.warnings, [
            'max_replication_slots is set to 8; consider raising it to at least 10',
        ]);
    });
});

describe('buildPreflightRemediation', () => {
    it('names the current wal_level and the restart', () => {
        const lines = buildPreflightRemediation({
            maxReplicationSlots: 10,
            maxWalSenders: 10,
            walLevel: 'replica',
        });

        assert.deepEqual(lines, [
            'Logical replication is not properly configured on the primary server.',
            'Update the server parameters of the primary:',
            '1. Set wal_level to \'logical\' (currently \'replica\')',
            '2. Increase max_replication_slots (recommended: 10)',
            '3. Increase max_wal_senders (recommended: 10)',
            'Note: these changes require a server restart.',
        ]);
    });
});
