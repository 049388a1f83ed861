/**
 * Regime-routed market-making bot.
 *
 * One process, one run: register with the exchange, open the market and
 * order streams, answer every snapshot with at most one order and a DONE,
 * and print the final results when either stream closes.
 */

import type { Server } from 'http';
import { assertCredentials, ConfigError, loadEngineConfig } from './config/engineConfig';
import type { EngineConfig } from './config/engineConfig';
import { EngineRunError } from './connectors/errors';
import { ExchangeSession } from './connectors/ExchangeSession';
import { HealthController, startHealthServer } from './health/HealthController';
import { StepJournal } from './journal/StepJournal';
import type { StepSink } from './journal/types';
import { isDroppableEvent, TradingEngine } from './orchestrator/TradingEngine';
import type { EngineEvent } from './orchestrator/TradingEngine';
import { EngineEventQueue } from './utils/EngineEventQueue';
import { log, logError } from './utils/logger';

// =============================================================================
// Run
// =============================================================================

async function run(config: EngineConfig): Promise<void> {
    assertCredentials(config.transport);
    log('ENGINE_START', {
        host: config.transport.host,
        scenario: config.transport.scenario,
        name: config.transport.name,
        secure: config.transport.secure,
        preset: config.regime.crash.compound ? 'compound' : 'simple',
        normalStyle: config.strategies.normalStyle,
        mode: config.engine.mode,
    });

    const session = new ExchangeSession(config.transport);
    const credentials = await session.register();

    let journal: StepSink | null = null;
    if (config.journal.enabled) {
        journal = new StepJournal(config.journal.dir, {
            scenario: config.transport.scenario,
            runId: credentials.runId,
            experiment: config.journal.experiment,
            mode: config.engine.mode,
        }, config.journal.bookLevels);
    }

    const engine = new TradingEngine({
        clientName: config.transport.name,
        gateway: session,
        config,
        journal,
    });
    const queue = new EngineEventQueue<EngineEvent>('engine', (event) => engine.handle(event), {
        maxQueueSize: config.engine.maxQueueSize,
        isDroppable: isDroppableEvent,
        onDrop: (event) => {
            if (event.type === 'snapshot') engine.skipSnapshot(event.snapshot);
        },
    });

    let healthServer: Server | null = null;
    if (config.health.enabled) {
        healthServer = startHealthServer(
            new HealthController(engine, { getQueueDepth: () => queue.getQueueLength() }),
            config.health.port
        );
    }

    let stopping = false;
    const shutdown = async (reason: string): Promise<void> => {
        if (stopping) return;
        stopping = true;
        log('ENGINE_STOPPING', { reason });
        session.close();
        await queue.onIdle();
        if (journal) await journal.close();
        if (healthServer) healthServer.close();
        log('FINAL_RESULTS', {
            ...engine.results(),
            droppedEvents: queue.getDroppedCount(),
            latency: engine.getLatency().stages,
            journal: journal ? journal.getFilePath() : null,
        });
    };

    const onSignal = (signal: NodeJS.Signals) => {
        shutdown(signal).then(
            () => process.exit(0),
            (err: unknown) => {
                logError('SHUTDOWN_FAILED', err);
                process.exit(1);
            }
        );
    };
    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);

    await session.connect(credentials, (event) => queue.enqueue(event));
    log('ENGINE_RUNNING', { runId: credentials.runId });

    await session.closed();
    await shutdown('stream_closed');
}

// =============================================================================
// Entry
// =============================================================================

let config: EngineConfig;
try {
    config = loadEngineConfig();
} catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    logError('CONFIG_INVALID', err);
    process.exit(1);
}

run(config).then(
    () => process.exit(0),
    (err: unknown) => {
        const code = err instanceof EngineRunError || err instanceof ConfigError ? err.name : 'UNEXPECTED';
        logError('ENGINE_FAILED', err, { code });
        process.exit(1);
    }
);
