import { Connection } from '@solana/web3.js';
import { loadConfig, loadPayer } from './config';
import { ConfigurationError, ConfirmationTimeoutError, VotingClientError, describeError } from './errors';
import { consoleLogger } from './logger';
import { formatTallyReport } from './report';
import { VotingClient } from './voteClient';

export async function main(env: Record<string, string | undefined> = process.env): Promise<void> {
    const config = loadConfig(env);
    const payer = await loadPayer(config.walletPath, config.secretKey);

    consoleLogger.info('Wallet loaded');
    consoleLogger.info('Public Key:', payer.publicKey.toBase58());

    const connection = new Connection(config.rpcUrl, 'confirmed');
    const client = new VotingClient(connection, config.programId, payer, {
        confirmation: config.confirmation,
        logger: consoleLogger,
    });

    const result = await client.run(config.voting);
    for (const line of formatTallyReport(result.report)) {
        console.log(line);
    }
}

function reportFailure(error: unknown): void {
    if (!(error instanceof VotingClientError)) {
        console.error(describeError(error));
        return;
    }
    console.error(`${error.name}: ${error.message}`);
    if (error instanceof ConfigurationError) {
        error.details.forEach(detail => console.error(`  ${detail}`));
    }
    if (error.operation) console.error(`  operation: ${error.operation}`);
    if (error.address) console.error(`  address: ${error.address}`);
    if (error instanceof ConfirmationTimeoutError) {
        console.error(`  re-query signature ${error.signature} to learn the outcome`);
    }
}

if (require.main === module) {
    main().catch((error: unknown) => {
        reportFailure(error);
        process.exitCode = 1;
    });
}
