/**
 * Express REST API Server
 * Exposes list, query, create, update and delete over the items table
 */

import express, {
  type Express,
  type Request,
  type Response,
  type NextFunction,
  type ErrorRequestHandler,
} from 'express';
import cors from 'cors';
import { createServer, type Server as HttpServer } from 'http';
import { HttpError, RequestValidationError, StoreError } from '../errors.js';
import { ItemService } from '../items/item-service.js';
import type { ItemStore } from '../storage/item-store.js';
import { requestLogger } from './request-log.js';
import {
  deleteParamsSchema,
  itemBodySchema,
  itemQuerySchema,
  parseRequest,
  updateParamsSchema,
  updateQuerySchema,
} from './validation.js';

// ============================================
// Types
// ============================================

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigins: string[];
  /** Write a [Request] line for every response */
  logRequests: boolean;
}

// ============================================
// Error mapping
// ============================================

function isBodyParseError(err: unknown): boolean {
  return err instanceof Error && 'type' in err && err.type === 'entity.parse.failed';
}

/** Client errors raised by body-parser carry their own 4xx status */
function clientErrorStatus(err: unknown): number | null {
  if (err instanceof Error && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : null;
  }
  return null;
}

const errorHandler: ErrorRequestHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (isBodyParseError(err)) {
    const error = new RequestValidationError([{ loc: ['body'], msg: 'Malformed JSON body' }]);
    res.status(error.statusCode).json({ error: error.message, detail: error.detail });
    return;
  }

  if (err instanceof HttpError) {
    if (err.statusCode >= 500) {
      console.error(`${req.method} ${req.path} failed:`, err.message);
    }
    res.status(err.statusCode).json({ error: err.message, detail: err.detail });
    return;
  }

  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== null && err instanceof Error) {
    res.status(clientStatus).json({ error: err.message });
    return;
  }

  if (err instanceof StoreError) {
    console.error(`${req.method} ${req.path} store failure:`, err.message);
  } else {
    console.error(`${req.method} ${req.path} unhandled error:`, err);
  }
  res.status(500).json({ error: 'Internal Server Error' });
};

// ============================================
// API Server
// ============================================

export class ApiServer {
  private app: Express;
  private server: HttpServer;
  private config: ServerConfig;
  private items: ItemService;

  constructor(store: ItemStore, config: Partial<ServerConfig> = {}) {
    this.config = {
      port: 8000,
      host: '127.0.0.1',
      corsOrigins: [],
      logRequests: true,
      ...config,
    };

    this.items = new ItemService(store);
    this.app = express();
    this.server = createServer(this.app);

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  // ----------------------------------------
  // Middleware
  // ----------------------------------------

  private setupMiddleware(): void {
    if (this.config.logRequests) {
      this.app.use(requestLogger());
    }
    if (this.config.corsOrigins.length > 0) {
      this.app.use(cors({
        origin: this.config.corsOrigins,
      }));
    }
    this.app.use(express.json());
  }

  // ----------------------------------------
  // Routes
  // ----------------------------------------

  private setupRoutes(): void {
    // Health check
    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', timestamp: Date.now() });
    });

    // List every item
    this.app.get('/', async (_req: Request, res: Response) => {
      const data = await this.items.listItems();
      res.json({ data });
    });

    // Equality filters on any combination of fields
    this.app.get('/items/', async (req: Request, res: Response) => {
      const params = parseRequest(itemQuerySchema, req.query, 'query');
      const result = await this.items.queryItems(params);
      res.json(result);
    });

    // Create
    this.app.post('/', async (req: Request, res: Response) => {
      const item = parseRequest(itemBodySchema, req.body, 'body');
      const added = await this.items.addItem(item);
      res.json({ added });
    });

    // Partial update from query parameters
    this.app.put('/update/:item_id', async (req: Request, res: Response) => {
      const { item_id: itemId } = parseRequest(updateParamsSchema, req.params, 'path');
      const changes = parseRequest(updateQuerySchema, req.query, 'query');
      const outcome = await this.items.updateItem(itemId, changes);
      res.status(outcome.status).json(outcome.body);
    });

    // Delete
    this.app.delete('/delete/:item_id', async (req: Request, res: Response) => {
      const { item_id: itemId } = parseRequest(deleteParamsSchema, req.params, 'path');
      const deleted = await this.items.deleteItem(itemId);
      res.json({ deleted });
    });
  }

  private setupErrorHandling(): void {
    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ error: 'Not found' });
    });
    this.app.use(errorHandler);
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off('error', reject);
        console.log(`API server running at http://${this.config.host}:${this.getPort()}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.server.listening) return;

    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  getApp(): Express {
    return this.app;
  }

  /** Bound port once listening; the configured port before that */
  getPort(): number {
    const address = this.server.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }
}
