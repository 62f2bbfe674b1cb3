export type SslMode =
    | 'disable'
    | 'allow'
    | 'prefer'
    | 'require'
    | 'verify-ca'
    | 'verify-full';

export type WalLevel =
    | 'logical'
    | 'replica'
    | 'minimal';

export type Endpoint = Readonly<{
    database: string;
    host: string;
    password: string;
    port?: number;
    serverName: string;
    sslMode: SslMode;
    user: string;
}>;

export type ReplicationConfig = {
    maxReplicationSlots: number;
    maxWalSenders: number;
    walLevel: WalLevel;
};

export type PreflightResult = {
    config: ReplicationConfig;
    ready: boolean;
    warnings: string[];
};

export type PublicationState = {
    created: boolean;
    exists: boolean;
    name: string;
};

export type SubscriptionState = {
    created: boolean;
    exists: boolean;
    name: string;
    publicationName: string;
};

export type RelationSyncPhase =
    | 'init'
    | 'data_sync'
    | 'synced'
    | 'error';

export type RelationSyncState = {
    relationName: string;
    state: RelationSyncPhase;
    stateCode: string;
    subscriptionName: string;
    syncLsn: string | null;
};

export type SubscriptionSummary = {
    connInfo: string;
    enabled: boolean;
    name: string;
};

export type StatusReport =
    | {
        kind: 'no_subscriptions';
    }
    | {
        kind: 'subscriptions';
        relations: RelationSyncState[];
        relationsError: string | null;
        subscriptions: SubscriptionSummary[];
    }
    | {
        kind: 'unavailable';
        reason: string;
    };
