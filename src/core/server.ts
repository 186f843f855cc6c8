import express, {
  type ErrorRequestHandler,
  type Express,
  type NextFunction,
  type Request,
  type RequestHandler,
  type Response,
} from 'express';
import cors from 'cors';
import type { Server } from 'http';
import { z } from 'zod';
import type { TrafficsmithConfig } from '../types/index.js';
import { createStorage } from '../storage/factory.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { ValidationError, toTrafficsmithError } from './errors.js';
import { type Logger, createLogger } from './logger.js';
import { Pipeline } from './pipeline.js';
import { DEFAULT_PRESETS_PATH, loadPresets } from './presets.js';
import { RuleEngine } from './rule-engine.js';
import { RuleStore } from './rule-store.js';
import { ModelBuilder } from '../generators/model-builder.js';
import { catalogueSchema, parseOrThrow } from './validation.js';

export interface ServerEvents {
  onStart?: (port: number) => void;
  onStop?: () => void;
  onError?: (error: Error, req: Request) => void;
}

const toggleBodySchema = z.object({ enabled: z.boolean().optional() });

const parseBodySchema = z.union([
  z.object({ path: z.string().min(1) }),
  z.object({ har: z.unknown().refine((value) => value !== undefined, 'har required') }),
]);

const generateBodySchema = z.object({ definitions: catalogueSchema });

/**
 * Control API: rule management, reloads, capture parsing and test generation
 */
export class TrafficsmithServer {
  private config: TrafficsmithConfig;
  private app: Express;
  private server: Server | null = null;
  private store: RuleStore;
  private engine: RuleEngine;
  private pipeline: Pipeline;
  private logger: Logger;
  private events: ServerEvents;
  private isRunning = false;

  constructor(config: Partial<TrafficsmithConfig> = {}, events: ServerEvents = {}, logger?: Logger) {
    this.config = {
      port: config.port ?? DEFAULT_CONFIG.port,
      storage: config.storage ?? DEFAULT_CONFIG.storage,
      rules: config.rules ?? DEFAULT_CONFIG.rules,
      model: config.model ?? DEFAULT_CONFIG.model,
      logging: config.logging ?? DEFAULT_CONFIG.logging,
      output: config.output ?? DEFAULT_CONFIG.output,
    };

    this.events = events;
    this.logger = logger ?? createLogger(this.config.logging.level);
    this.store = new RuleStore({ storage: createStorage(this.config.storage), logger: this.logger });
    this.engine = new RuleEngine(this.store, this.logger);
    this.pipeline = new Pipeline({
      engine: this.engine,
      builder: new ModelBuilder({
        ignoreHeaders: this.config.model.ignoreHeaders,
        varianceThreshold: this.config.model.varianceThreshold,
        logger: this.logger,
      }),
      logger: this.logger,
    });
    this.app = express();

    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Setup Express middleware
   */
  private setupMiddleware(): void {
    this.app.use(express.json({ limit: '50mb' }));
    this.app.use(
      cors({
        origin: true,
        methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
      })
    );
  }

  /**
   * Register control routes. Literal segments (presets, hosts) go before `:id`.
   */
  private setupRoutes(): void {
    const app = this.app;

    app.get('/__health', (_req: Request, res: Response) => {
      res.json({
        status: 'ok',
        uptime: process.uptime(),
        rulesVersion: this.engine.current().version,
      });
    });

    // ------------------------------------------------------------------------
    // Presets
    // ------------------------------------------------------------------------

    app.get('/filters/presets', (_req, res) => {
      res.json(this.store.listPresets());
    });

    app.get('/filters/presets/:id', (req, res) => {
      res.json(this.store.getPreset(req.params.id));
    });

    app.post('/filters/presets/:id/apply', handle(async (req, res) => {
      const applied = await this.store.applyPreset(req.params.id);
      await this.engine.reload();
      res.json({ applied, filterRules: this.store.listFilterRules() });
    }));

    // ------------------------------------------------------------------------
    // Host rules
    // ------------------------------------------------------------------------

    app.get('/filters/hosts', (_req, res) => {
      res.json(this.store.listHostRules());
    });

    app.post('/filters/hosts', handle(async (req, res) => {
      const rule = await this.store.addHostRule(req.body);
      await this.engine.reload();
      res.status(201).json(rule);
    }));

    app.get('/filters/hosts/:id', (req, res) => {
      res.json(this.store.getHostRule(req.params.id));
    });

    app.put('/filters/hosts/:id', handle(async (req, res) => {
      const rule = await this.store.updateHostRule(req.params.id, req.body);
      await this.engine.reload();
      res.json(rule);
    }));

    app.delete('/filters/hosts/:id', handle(async (req, res) => {
      const removed = await this.store.deleteHostRule(req.params.id);
      await this.engine.reload();
      res.json(removed);
    }));

    app.patch('/filters/hosts/:id/toggle', handle(async (req, res) => {
      const { enabled } = parseOrThrow(toggleBodySchema, req.body ?? {}, 'toggle request');
      const current = this.store.getHostRule(req.params.id);
      const rule = await this.store.toggleHostRule(req.params.id, enabled ?? !current.enabled);
      await this.engine.reload();
      res.json(rule);
    }));

    // ------------------------------------------------------------------------
    // Filter rules
    // ------------------------------------------------------------------------

    app.get('/filters', (_req, res) => {
      res.json(this.store.listFilterRules());
    });

    app.post('/filters', handle(async (req, res) => {
      const rule = await this.store.addFilterRule(req.body);
      await this.engine.reload();
      res.status(201).json(rule);
    }));

    app.get('/filters/:id', (req, res) => {
      res.json(this.store.getFilterRule(req.params.id));
    });

    app.put('/filters/:id', handle(async (req, res) => {
      const rule = await this.store.updateFilterRule(req.params.id, req.body);
      await this.engine.reload();
      res.json(rule);
    }));

    app.delete('/filters/:id', handle(async (req, res) => {
      const removed = await this.store.deleteFilterRule(req.params.id);
      await this.engine.reload();
      res.json(removed);
    }));

    app.patch('/filters/:id/toggle', handle(async (req, res) => {
      const { enabled } = parseOrThrow(toggleBodySchema, req.body ?? {}, 'toggle request');
      const current = this.store.getFilterRule(req.params.id);
      const rule = await this.store.toggleFilterRule(req.params.id, enabled ?? !current.enabled);
      await this.engine.reload();
      res.json(rule);
    }));

    // ------------------------------------------------------------------------
    // Reload, parse, generate
    // ------------------------------------------------------------------------

    app.post('/rules/reload', handle(async (_req, res) => {
      await this.store.refresh();
      const snapshot = await this.engine.reload();
      res.json({
        version: snapshot.version,
        loadedAt: snapshot.loadedAt,
        filterRules: snapshot.filters.length,
        hostRules: snapshot.hosts.length,
      });
    }));

    app.post('/captures/parse', handle(async (req, res) => {
      const body = parseOrThrow(parseBodySchema, req.body, 'parse request');
      const result = await this.pipeline.parseCapture('path' in body ? body.path : { har: body.har });
      res.json(result);
    }));

    app.post('/tests/generate', (req, res) => {
      const { definitions } = parseOrThrow(generateBodySchema, req.body, 'generate request');
      res.json(this.pipeline.generateTests(definitions));
    });

    app.use((req, res) => {
      res.status(404).json({
        error: { code: 'NOT_FOUND', message: `No route for ${req.method} ${req.path}` },
      });
    });

    app.use(this.errorHandler());
  }

  private errorHandler(): ErrorRequestHandler {
    return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
      const error = isBodyParseError(err)
        ? new ValidationError('Request body is not valid JSON')
        : toTrafficsmithError(err);

      if (error.status >= 500) {
        this.logger.error({ err, method: req.method, path: req.path }, 'request failed');
      } else {
        this.logger.debug({ code: error.code, method: req.method, path: req.path }, error.message);
      }
      this.events.onError?.(error, req);

      res.status(error.status).json({ error: error.toJSON() });
    };
  }

  /**
   * Start the server
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error('Server is already running');
    }

    this.store.setPresets(await loadPresets(this.config.rules.presetsPath ?? DEFAULT_PRESETS_PATH));
    await this.store.init();
    await this.engine.reload();

    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.config.port, () => {
        this.isRunning = true;
        this.logger.info({ port: this.config.port }, 'control API listening');
        this.events.onStart?.(this.config.port);
        resolve();
      });

      server.on('error', (error) => {
        this.isRunning = false;
        reject(error);
      });

      this.server = server;
    });
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!this.isRunning || !server) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });

    this.isRunning = false;
    this.server = null;
    await this.store.close();
    this.events.onStop?.();
  }

  getConfig(): TrafficsmithConfig {
    return { ...this.config };
  }

  getStore(): RuleStore {
    return this.store;
  }

  getEngine(): RuleEngine {
    return this.engine;
  }

  getPipeline(): Pipeline {
    return this.pipeline;
  }

  /**
   * Check if server is running
   */
  running(): boolean {
    return this.isRunning;
  }

  /**
   * Get the Express app instance (for advanced usage)
   */
  getApp(): Express {
    return this.app;
  }
}

/**
 * Forward async handler rejections to the error middleware
 */
function handle(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && typeof err === 'object' && 'body' in err;
}
