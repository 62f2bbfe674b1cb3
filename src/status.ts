import type { ReplicationConnection, SqlRow } from './connection';
import { ReportingError } from './errors';
import { redactConnInfo } from './subscription';
import type {
    RelationSyncPhase,
    RelationSyncState,
    StatusReport,
    SubscriptionSummary,
} from './types';

export const RELATION_STATUS_LIMIT = 10;

export const SUBSCRIPTIONS_SQL =
    'SELECT subname, subenabled, subconninfo FROM pg_subscription';

export const RELATION_SYNC_STATES_SQL = `
SELECT
    s.subname,
    r.srsubstate,
    r.srrelid::regclass::text AS relation_name,
    r.srsublsn::text AS srsublsn
FROM pg_subscription_rel r
JOIN pg_subscription s ON s.oid = r.srsubid
LIMIT ${RELATION_STATUS_LIMIT}`;

export function toRelationSyncPhase(code: string): RelationSyncPhase {
    switch (code) {
    case 'i':
        return 'init';
    case 'd':
        return 'data_sync';
    case 'f':
    case 's':
    case 'r':
        return 'synced';
    default:
        return 'error';
    }
}

function readString(
    row: SqlRow,
    column: string,
): string {
    const value = row[column];

    if (typeof value !== 'string') {
        throw new Error(`invalid ${column} column in replication status row`);
    }

    return value;
}

function readOptionalString(
    row: SqlRow,
    column: string,
): string | null {
    const value = row[column];

    return typeof value === 'string' && value.length > 0 ? value : null;
}

function toEnabled(value: unknown): boolean {
    return value === true || value === 't' || value === 'true';
}

function toSubscriptionSummary(row: SqlRow): SubscriptionSummary {
    return {
        connInfo: redactConnInfo(readOptionalString(row, 'subconninfo') || ''),
        enabled: toEnabled(row.subenabled),
        name: readString(row, 'subname'),
    };
}

function toRelationSyncState(row: SqlRow): RelationSyncState {
    const stateCode = readString(row, 'srsubstate');

    return {
        relationName: readString(row, 'relation_name'),
        state: toRelationSyncPhase(stateCode),
        stateCode,
        subscriptionName: readString(row, 'subname'),
        syncLsn: readOptionalString(row, 'srsublsn'),
    };
}

function warnUnavailable(
    host: string,
    error: ReportingError,
): void {
    console.warn('replication-setup status unavailable', {
        error: error.message,
        host,
    });
}

type RelationStatesResult = {
    relations: RelationSyncState[];
    relationsError: string | null;
};

async function readRelationStates(
    connection: ReplicationConnection,
): Promise<RelationStatesResult> {
    try {
        const rows = await connection.query(RELATION_SYNC_STATES_SQL);

        return {
            relations: rows.map(toRelationSyncState),
            relationsError: null,
        };
    } catch (error: unknown) {
        const reportingError = new ReportingError(error);

        warnUnavailable(connection.endpoint.host, reportingError);

        return {
            relations: [],
            relationsError: reportingError.message,
        };
    }
}

/**
 * Diagnostic only: query failures are logged and folded into the report
 * rather than thrown. Subscriptions already read survive a failed relation
 * query.
 */
export async function reportReplicationStatus(
    connection: ReplicationConnection,
): Promise<StatusReport> {
    let subscriptions: SubscriptionSummary[];

    try {
        const rows = await connection.query(SUBSCRIPTIONS_SQL);

        subscriptions = rows.map(toSubscriptionSummary);
    } catch (error: unknown) {
        const reportingError = new ReportingError(error);

        warnUnavailable(connection.endpoint.host, reportingError);

        return {
            kind: 'unavailable',
            reason: reportingError.message,
        };
    }

    let report: StatusReport = {
        kind: 'no_subscriptions',
    };

    if (subscriptions.length > 0) {
        const { relations, relationsError } = await readRelationStates(
            connection,
        );

        report = {
            kind: 'subscriptions',
            relations,
            relationsError,
            subscriptions,
        };
    }

    logStatusReport(connection.endpoint.host, report);

    return report;
}

function logStatusReport(
    host: string,
    report: StatusReport,
): void {
    if (report.kind !== 'subscriptions') {
        console.log('replication-setup no subscriptions found', {
            host,
        });

        return;
    }

    for (const subscription of report.subscriptions) {
        console.log('replication-setup subscription status', {
            connection: subscription.connInfo,
            enabled: subscription.enabled,
            host,
            subscription: subscription.name,
        });
    }

    for (const relation of report.relations) {
        console.log('replication-setup relation sync state', {
            relation: relation.relationName,
            state: relation.state,
            subscription: relation.subscriptionName,
            sync_lsn: relation.syncLsn,
        });
    }
}
