import {
    type ConnectionProvider,
    type ReplicationConnection,
    withConnection,
} from './connection';
import {
    ConfigurationError,
    ConnectivityError,
    describeError,
    PreflightError,
    ReplicationSetupError,
    ResourceCreationError,
} from './errors';
import {
    buildPreflightRemediation,
    checkReplicationPreflight,
    DEFAULT_PREFLIGHT_THRESHOLDS,
    type PreflightThresholds,
} from './preflight';
import { ensurePublication } from './publication';
import {
    ensureSchema,
    type RecreateDecision,
    type SchemaResult,
} from './schema';
import { reportReplicationStatus } from './status';
import { ensureSubscription } from './subscription';
import type {
    Endpoint,
    PreflightResult,
    PublicationState,
    StatusReport,
    SubscriptionState,
} from './types';

export type ReplicationStage =
    | 'start'
    | 'primary_connected'
    | 'preflight_passed'
    | 'publication_ready'
    | 'replica_connected'
    | 'subscription_ready'
    | 'status_reported'
    | 'done'
    | 'failed';

export type SchemaPreparation = {
    recreate: RecreateDecision;
};

export type ReplicationOrchestratorOptions = {
    preflightThresholds?: PreflightThresholds;
    primary: Endpoint;
    publicationName: string;
    replica: Endpoint;
    schema?: SchemaPreparation;
    subscriptionName: string;
};

export type SchemaPreparationResult = {
    primary: SchemaResult;
    replica: SchemaResult;
};

export type ReplicationRunSuccess = {
    outcome: 'succeeded';
    preflight: PreflightResult;
    publication: PublicationState;
    schema: SchemaPreparationResult | null;
    stages: ReplicationStage[];
    status: StatusReport;
    subscription: SubscriptionState;
};

export type ReplicationRunFailure = {
    error: ReplicationSetupError;
    failedStage: ReplicationStage;
    outcome: 'failed';
    remediation: string[];
    stages: ReplicationStage[];
};

export type ReplicationRunResult =
    | ReplicationRunSuccess
    | ReplicationRunFailure;

const RERUN_HINT =
    'Re-run the setup once the cause is fixed; resources that already '
    + 'exist are detected and kept.';

export function buildRemediation(
    error: ReplicationSetupError,
): string[] {
    if (error instanceof ConfigurationError) {
        return error.missing.length > 0
            ? [`Set the missing environment variables: ${error.missing.join(', ')}`]
            : ['Correct the configuration value named above.'];
    }

    if (error instanceof ConnectivityError) {
        return [
            `Check that ${error.host} is reachable from this machine and that `
            + `the credentials for the ${error.label} database are correct.`,
            'Confirm the server firewall rules allow this client address.',
        ];
    }

    if (error instanceof PreflightError) {
        return buildPreflightRemediation(error.config);
    }

    if (error instanceof ResourceCreationError) {
        const lines = error.resource === 'publication'
            ? [
                'Ensure the primary user may create publications '
                + '(table owner or a role with replication privileges).',
            ]
            : [
                'Ensure the replica user may create subscriptions and that '
                + 'the replica can reach the primary.',
                'Ensure the replicated tables exist on the replica.',
            ];

        return [...lines, RERUN_HINT];
    }

    return [RERUN_HINT];
}

export function exitCodeForRun(result: ReplicationRunResult): number {
    return result.outcome === 'succeeded' ? 0 : 1;
}

export class ReplicationOrchestrator {
    private readonly thresholds: PreflightThresholds;

    constructor(
        private readonly connections: ConnectionProvider,
        private readonly options: ReplicationOrchestratorOptions,
    ) {
        this.thresholds = options.preflightThresholds
            ?? DEFAULT_PREFLIGHT_THRESHOLDS;
    }

    /**
     * Drives one primary/replica pair through every stage. Fatal errors
     * end the run and are returned in the result; resources created by
     * earlier stages are left in place.
     */
    async run(): Promise<ReplicationRunResult> {
        const stages: ReplicationStage[] = ['start'];
        let pending: ReplicationStage = 'primary_connected';
        const reach = (stage: ReplicationStage, next: ReplicationStage) => {
            stages.push(stage);
            pending = next;
        };

        try {
            const primaryStages = await withConnection(
                this.connections,
                this.options.primary,
                async (primary) => {
                    reach('primary_connected', 'preflight_passed');

                    const preflight = await this.runPreflight(primary);

                    reach('preflight_passed', 'publication_ready');

                    const schema = await this.prepareSchema(primary);
                    const publication = await ensurePublication(
                        primary,
                        this.options.publicationName,
                    );

                    reach('publication_ready', 'replica_connected');

                    return { preflight, publication, schema };
                },
            );
            const replicaStages = await withConnection(
                this.connections,
                this.options.replica,
                async (replica) => {
                    reach('replica_connected', 'subscription_ready');

                    const schema = await this.prepareSchema(replica);
                    const subscription = await ensureSubscription(replica, {
                        name: this.options.subscriptionName,
                        primary: this.options.primary,
                        publicationName: primaryStages.publication.name,
                    });

                    reach('subscription_ready', 'status_reported');

                    const status = await reportReplicationStatus(replica);

                    reach('status_reported', 'done');

                    return { schema, status, subscription };
                },
            );

            stages.push('done');
            logCompletion(primaryStages.publication, replicaStages.subscription);

            return {
                outcome: 'succeeded',
                preflight: primaryStages.preflight,
                publication: primaryStages.publication,
                schema: primaryStages.schema && replicaStages.schema
                    ? {
                        primary: primaryStages.schema,
                        replica: replicaStages.schema,
                    }
                    : null,
                stages,
                status: replicaStages.status,
                subscription: replicaStages.subscription,
            };
        } catch (error: unknown) {
            const setupError = this.toSetupError(error, pending);
            const remediation = buildRemediation(setupError);

            stages.push('failed');
            console.error('replication-setup failed', {
                error: setupError.message,
                error_type: setupError.name,
                failed_stage: pending,
            });

            for (const line of remediation) {
                console.error(`replication-setup remediation: ${line}`);
            }

            return {
                error: setupError,
                failedStage: pending,
                outcome: 'failed',
                remediation,
                stages,
            };
        }
    }

    private async runPreflight(
        primary: ReplicationConnection,
    ): Promise<PreflightResult> {
        const preflight = await checkReplicationPreflight(
            primary,
            this.thresholds,
        );

        for (const warning of preflight.warnings) {
            console.warn(`replication-setup preflight warning: ${warning}`, {
                host: primary.endpoint.host,
            });
        }

        if (!preflight.ready) {
            throw new PreflightError(
                `wal_level is '${preflight.config.walLevel}' but logical `
                + 'replication requires \'logical\'',
                preflight.config,
            );
        }

        console.log('replication-setup preflight passed', {
            host: primary.endpoint.host,
            max_replication_slots: preflight.config.maxReplicationSlots,
            max_wal_senders: preflight.config.maxWalSenders,
            wal_level: preflight.config.walLevel,
        });

        return preflight;
    }

    private async prepareSchema(
        connection: ReplicationConnection,
    ): Promise<SchemaResult | null> {
        if (!this.options.schema) {
            return null;
        }

        return ensureSchema(connection, {
            recreate: this.options.schema.recreate,
        });
    }

    private toSetupError(
        error: unknown,
        stage: ReplicationStage,
    ): ReplicationSetupError {
        if (error instanceof ReplicationSetupError) {
            return error;
        }

        if (stage === 'primary_connected' || stage === 'replica_connected') {
            const endpoint = stage === 'primary_connected'
                ? this.options.primary
                : this.options.replica;

            return new ConnectivityError(
                endpoint.host,
                endpoint.serverName,
                describeError(error),
                error,
            );
        }

        return new ReplicationSetupError(
            `stage ${stage} failed: ${describeError(error)}`,
            { cause: error },
        );
    }
}

function logCompletion(
    publication: PublicationState,
    subscription: SubscriptionState,
): void {
    console.log('replication-setup completed', {
        publication: publication.name,
        publication_created: publication.created,
        subscription: subscription.name,
        subscription_created: subscription.created,
    });
    console.log(
        'replication-setup note: the initial data copy runs in the '
        + 'background and may take a while; monitor pg_stat_replication on '
        + 'the primary and pg_stat_subscription on the replica',
    );
}
