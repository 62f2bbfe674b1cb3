import {
    type ConnectionProvider,
    PgConnectionProvider,
} from './connection';
import { parseReplicationEnv, type ReplicationEnv } from './env';
import { ConfigurationError } from './errors';
import {
    buildRemediation,
    exitCodeForRun,
    ReplicationOrchestrator,
    type ReplicationRunResult,
} from './replication.service';
import type { RecreateDecision } from './schema';

export type RuntimeBootstrap = {
    config: ReplicationEnv;
    orchestrator: ReplicationOrchestrator;
};

export type RuntimeDependencyOverrides = {
    createConnectionProvider?: (config: ReplicationEnv) => ConnectionProvider;

    /**
     * Replaces the REPLICATION_RECREATE_SCHEMA flag with a caller-supplied
     * decision, e.g. an interactive confirmation.
     */
    recreateSchema?: RecreateDecision;
};

export type RuntimeOutcome = {
    exitCode: number;
    result: ReplicationRunResult | null;
};

export function createRuntime(
    env: NodeJS.ProcessEnv,
    dependencies: RuntimeDependencyOverrides = {},
): RuntimeBootstrap {
    const config = parseReplicationEnv(env);
    const createConnectionProvider = dependencies.createConnectionProvider
        || ((input: ReplicationEnv) => {
            return new PgConnectionProvider({
                connectTimeoutMs: input.connectTimeoutMs,
                statementTimeoutMs: input.statementTimeoutMs,
            });
        });
    const orchestrator = new ReplicationOrchestrator(
        createConnectionProvider(config),
        {
            primary: config.primary,
            publicationName: config.publicationName,
            replica: config.replica,
            schema: config.ensureSchema
                ? {
                    recreate: dependencies.recreateSchema
                        ?? config.recreateSchema,
                }
                : undefined,
            subscriptionName: config.subscriptionName,
        },
    );

    return {
        config,
        orchestrator,
    };
}

export async function runReplicationSetup(
    env: NodeJS.ProcessEnv,
    dependencies: RuntimeDependencyOverrides = {},
): Promise<RuntimeOutcome> {
    let runtime: RuntimeBootstrap;

    try {
        runtime = createRuntime(env, dependencies);
    } catch (error: unknown) {
        if (!(error instanceof ConfigurationError)) {
            throw error;
        }

        console.error('replication-setup configuration invalid', {
            error: error.message,
        });

        for (const line of buildRemediation(error)) {
            console.error(`replication-setup remediation: ${line}`);
        }

        return {
            exitCode: 1,
            result: null,
        };
    }

    console.log('replication-setup started', {
        primary_database: runtime.config.primary.database,
        primary_host: runtime.config.primary.host,
        primary_server_name: runtime.config.primary.serverName,
        publication: runtime.config.publicationName,
        replica_database: runtime.config.replica.database,
        replica_host: runtime.config.replica.host,
        replica_server_name: runtime.config.replica.serverName,
        ssl_mode: runtime.config.primary.sslMode,
        subscription: runtime.config.subscriptionName,
    });

    const result = await runtime.orchestrator.run();

    return {
        exitCode: exitCodeForRun(result),
        result,
    };
}
