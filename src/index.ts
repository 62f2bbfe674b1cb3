#!/usr/bin/env node
import { runReplicationSetup } from './runtime';

async function main(): Promise<void> {
    const outcome = await runReplicationSetup(process.env);

    process.exitCode = outcome.exitCode;
}

if (require.main === module) {
    main().catch((error: unknown) => {
        console.error('replication-setup failed', error);
        process.exitCode = 1;
    });
}
