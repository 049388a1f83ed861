import express, { Request, Response } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import type { LatencySnapshot } from '../metrics/LatencyTracker';
import type { EngineState } from '../orchestrator/TradingEngine';
import { log } from '../utils/logger';

export interface HealthSource {
  getState(): EngineState;
  getLatency(): LatencySnapshot;
}

interface HealthControllerOptions {
  clock?: () => number;
  staleAfterMs?: number;
  getQueueDepth?: () => number;
}

const ALLOWED_ORIGINS = [/^http:\/\/localhost(:\d+)?$/, /^http:\/\/127\.0\.0\.1(:\d+)?$/];

export class HealthController {
  private readonly clock: () => number;
  private readonly staleAfterMs: number;
  private readonly startTime: number;

  constructor(private readonly source: HealthSource, private readonly options: HealthControllerOptions = {}) {
    this.clock = options.clock ?? Date.now;
    this.staleAfterMs = options.staleAfterMs ?? 10_000;
    this.startTime = this.clock();
  }

  liveness = (_req: Request, res: Response) => {
    const now = this.clock();
    res.status(200).json({
      status: 'UP',
      timestamp: now,
      uptimeMs: now - this.startTime,
    });
  };

  readiness = (_req: Request, res: Response) => {
    const now = this.clock();
    const state = this.source.getState();
    const dataAgeMs = state.lastSnapshotAt > 0 ? now - state.lastSnapshotAt : null;
    const dataFresh = dataAgeMs !== null && dataAgeMs < this.staleAfterMs;
    const ready = dataFresh && state.running;

    res.status(ready ? 200 : 503).json({
      status: ready ? 'UP' : 'DOWN',
      timestamp: now,
      details: {
        dataFresh,
        dataAgeMs,
        running: state.running,
        regime: state.regime,
      },
    });
  };

  state = (_req: Request, res: Response) => {
    res.status(200).json({
      ...this.source.getState(),
      queueDepth: this.options.getQueueDepth ? this.options.getQueueDepth() : null,
      latency: this.source.getLatency(),
    });
  };

  metrics = (_req: Request, res: Response) => {
    const now = this.clock();
    const state = this.source.getState();
    const stalenessSeconds = state.lastSnapshotAt > 0 ? (now - state.lastSnapshotAt) / 1000 : -1;

    let output = '';
    output += `# HELP app_uptime_seconds Application uptime in seconds\n`;
    output += `# TYPE app_uptime_seconds gauge\n`;
    output += `app_uptime_seconds ${(now - this.startTime) / 1000}\n`;

    output += `# HELP market_data_staleness_seconds Time since the last market snapshot\n`;
    output += `# TYPE market_data_staleness_seconds gauge\n`;
    output += `market_data_staleness_seconds ${stalenessSeconds}\n`;

    output += `# HELP engine_step Last processed exchange step\n`;
    output += `# TYPE engine_step gauge\n`;
    output += `engine_step ${state.step}\n`;

    output += `# HELP engine_inventory Net inventory in shares\n`;
    output += `# TYPE engine_inventory gauge\n`;
    output += `engine_inventory ${state.inventory}\n`;

    output += `# HELP engine_pnl Mark-to-market pnl\n`;
    output += `# TYPE engine_pnl gauge\n`;
    output += `engine_pnl ${state.pnl}\n`;

    output += `# HELP engine_orders_total Orders and cancels sent\n`;
    output += `# TYPE engine_orders_total counter\n`;
    output += `engine_orders_total{kind="order"} ${state.ordersSent}\n`;
    output += `engine_orders_total{kind="cancel"} ${state.cancelsSent}\n`;

    output += `# HELP engine_open_orders Resting orders tracked locally\n`;
    output += `# TYPE engine_open_orders gauge\n`;
    output += `engine_open_orders ${state.openOrders}\n`;

    output += `# HELP engine_regime Active regime\n`;
    output += `# TYPE engine_regime gauge\n`;
    output += `engine_regime{regime="${state.regime}"} 1\n`;

    const latency = this.source.getLatency();
    output += `# HELP pipeline_latency_ms Pipeline latency per stage\n`;
    output += `# TYPE pipeline_latency_ms gauge\n`;
    for (const [stage, stats] of Object.entries(latency.stages)) {
      if (!stats) continue;
      output += `pipeline_latency_ms{stage="${stage}",quantile="avg"} ${stats.avgMs}\n`;
      output += `pipeline_latency_ms{stage="${stage}",quantile="p95"} ${stats.p95Ms}\n`;
      output += `pipeline_latency_ms{stage="${stage}",quantile="max"} ${stats.maxMs}\n`;
    }

    res.setHeader('Content-Type', 'text/plain');
    res.status(200).send(output);
  };
}

export function createHealthApp(controller: HealthController): express.Express {
  const app = express();
  app.use(cors({ origin: ALLOWED_ORIGINS }));
  app.get('/health/liveness', controller.liveness);
  app.get('/health/readiness', controller.readiness);
  app.get('/health/state', controller.state);
  app.get('/metrics', controller.metrics);
  return app;
}

export function startHealthServer(controller: HealthController, port: number, host = '127.0.0.1'): Server {
  const app = createHealthApp(controller);
  return app.listen(port, host, () => log('HEALTH_SERVER_UP', { host, port }));
}
