import type { ReplicationConnection } from './connection';
import { PreflightError } from './errors';
import type {
    PreflightResult,
    ReplicationConfig,
    WalLevel,
} from './types';

export type PreflightThresholds = {
    minReplicationSlots: number;
    minWalSenders: number;
};

export const DEFAULT_PREFLIGHT_THRESHOLDS: PreflightThresholds = {
    minReplicationSlots: 5,
    minWalSenders: 10,
};

const RECOMMENDED_REPLICATION_SLOTS = 10;
const RECOMMENDED_WAL_SENDERS = 10;

async function showSetting(
    connection: ReplicationConnection,
    setting: 'wal_level' | 'max_replication_slots' | 'max_wal_senders',
): Promise<string> {
    const rows = await connection.query(`SHOW ${setting}`);
    const value = rows[0]?.[setting];

    if (typeof value !== 'string') {
        throw new PreflightError(
            `server did not report a value for ${setting}`,
            null,
        );
    }

    return value.trim();
}

function parseWalLevel(value: string): WalLevel {
    if (value === 'logical' || value === 'replica' || value === 'minimal') {
        return value;
    }

    throw new PreflightError(`unrecognised wal_level '${value}'`, null);
}

function parseSettingInteger(
    value: string,
    setting: string,
): number {
    const parsed = Number(value);

    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new PreflightError(
            `${setting} must be a non-negative integer, got '${value}'`,
            null,
        );
    }

    return parsed;
}

export async function readReplicationConfig(
    connection: ReplicationConnection,
): Promise<ReplicationConfig> {
    const walLevel = parseWalLevel(
        await showSetting(connection, 'wal_level'),
    );
    const maxReplicationSlots = parseSettingInteger(
        await showSetting(connection, 'max_replication_slots'),
        'max_replication_slots',
    );
    const maxWalSenders = parseSettingInteger(
        await showSetting(connection, 'max_wal_senders'),
        'max_wal_senders',
    );

    return {
        maxReplicationSlots,
        maxWalSenders,
        walLevel,
    };
}

export function evaluateReplicationConfig(
    config: ReplicationConfig,
    thresholds: PreflightThresholds = DEFAULT_PREFLIGHT_THRESHOLDS,
): PreflightResult {
    const warnings: string[] = [];

    if (config.maxReplicationSlots < thresholds.minReplicationSlots) {
        warnings.push(
            `max_replication_slots is set to ${config.maxReplicationSlots}; `
            + `consider raising it to at least ${thresholds.minReplicationSlots}`,
        );
    }

    if (config.maxWalSenders < thresholds.minWalSenders) {
        warnings.push(
            `max_wal_senders is set to ${config.maxWalSenders}; `
            + `consider raising it to at least ${thresholds.minWalSenders}`,
        );
    }

    return {
        config,
        ready: config.walLevel === 'logical',
        warnings,
    };
}

export async function checkReplicationPreflight(
    connection: ReplicationConnection,
    thresholds: PreflightThresholds = DEFAULT_PREFLIGHT_THRESHOLDS,
): Promise<PreflightResult> {
    const config = await readReplicationConfig(connection);

    return evaluateReplicationConfig(config, thresholds);
}

export function buildPreflightRemediation(
    config: ReplicationConfig | null,
): string[] {
    const current = config
        ? ` (currently '${config.walLevel}')`
        : '';

    return [
        'Logical replication is not properly configured on the primary server.',
        'Update the server parameters of the primary:',
        `1. Set wal_level to 'logical'${current}`,
        '2. Increase max_replication_slots '
        + `(recommended: ${RECOMMENDED_REPLICATION_SLOTS})`,
        '3. Increase max_wal_senders '
        + `(recommended: ${RECOMMENDED_WAL_SENDERS})`,
        'Note: these changes require a server restart.',
    ];
}
