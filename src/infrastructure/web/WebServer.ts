import express, { Express, NextFunction, Request, Response, Router } from 'express';
import { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import path from 'path';
import fs from 'fs';
import type { MusicGeneratorService } from '../../application/services/MusicGeneratorService.js';
import type { IArtifactWriter } from '../../core/interfaces/IArtifactWriter.js';
import type { TrackJob } from '../../core/entities/Track.js';
import { MAX_DURATION_SECONDS, MIN_DURATION_SECONDS } from '../../core/entities/Track.js';
import { TrackError, TrackNotFoundError } from '../../core/errors.js';
import {
  AUDIO_CONTENT_TYPES,
  SUPPORTED_FORMATS,
  SUPPORTED_GENRES,
  SUPPORTED_MOODS,
} from '../../core/catalog.js';
import {
  DownloadFileNameSchema,
  GenerateMusicSchema,
  TrackStatusFilterSchema,
  formatIssues,
} from './schemas.js';

export interface WebServerOptions {
  name: string;
  version: string;
  host?: string;
  port?: number;
  corsOrigins?: string[];
  webSocket?: boolean;
}

export type TrackUpdateMessage = {
  type: 'track_updated';
  trackId: string;
  status: TrackJob['status'];
  progress: number;
  timestamp: string;
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

interface BodyParserError {
  type: string;
  status?: number;
}

function isBodyParserError(error: unknown): error is BodyParserError {
  if (typeof error !== 'object' || error === null || !('type' in error)) {
    return false;
  }
  const status = 'status' in error ? error.status : undefined;
  return typeof error.type === 'string' && (status === undefined || typeof status === 'number');
}

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();

  constructor(
    private musicService: MusicGeneratorService,
    private artifactWriter: IArtifactWriter,
    private options: WebServerOptions
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();

    if (this.options.webSocket) {
      this.musicService.onTrackUpdated((track) => this.notifyTrackUpdate(track));
    }
  }

  getApp(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    const origins = this.options.corsOrigins ?? ['*'];
    this.app.use(cors({
      origin: origins.includes('*') ? true : origins,
      credentials: true,
    }));
    this.app.use(express.json());
  }

  private setupRoutes(): void {
    this.app.get('/', (req: Request, res: Response) => {
      res.json({
        message: 'Welcome to Music Track Generator Backend',
        status: 'running',
        version: this.options.version,
      });
    });

    this.app.get('/health', (req: Request, res: Response) => {
      res.json({ status: 'healthy', service: this.options.name });
    });

    this.app.use('/music', this.createMusicRouter());

    // Download generated artifacts
    this.app.get('/downloads/:filename', async (req: Request, res: Response) => {
      const parsed = DownloadFileNameSchema.safeParse(req.params.filename);
      const contentType = parsed.success
        ? AUDIO_CONTENT_TYPES[path.extname(parsed.data).toLowerCase()]
        : undefined;
      if (!parsed.success || !contentType) {
        res.status(404).json({ success: false, error: 'File not found' });
        return;
      }

      const fileName = parsed.data;
      const filePath = this.artifactWriter.resolve(fileName);
      try {
        const stats = await fs.promises.stat(filePath);
        if (!stats.isFile()) {
          res.status(404).json({ success: false, error: 'File not found' });
          return;
        }
      } catch {
        res.status(404).json({ success: false, error: 'File not found' });
        return;
      }

      res.type(contentType);
      res.download(filePath, fileName, (error) => {
        if (error) {
          console.error(`[WebServer] Download of ${fileName} failed:`, error);
          if (!res.headersSent) {
            res.status(500).json({ success: false, error: 'Download failed' });
          }
        }
      });
    });

    this.app.use((req: Request, res: Response) => {
      res.status(404).json({ success: false, error: 'Not found' });
    });
  }

  private createMusicRouter(): Router {
    const router = express.Router();

    // Service descriptor
    router.get('/', (req: Request, res: Response) => {
      res.json({
        service: 'Music Track Generator',
        version: this.options.version,
        supported_formats: SUPPORTED_FORMATS,
        max_duration: MAX_DURATION_SECONDS,
        min_duration: MIN_DURATION_SECONDS,
        status: 'active',
      });
    });

    router.get('/genres', (req: Request, res: Response) => {
      res.json({ genres: SUPPORTED_GENRES });
    });

    router.get('/moods', (req: Request, res: Response) => {
      res.json({ moods: SUPPORTED_MOODS });
    });

    // Start a generation
    router.post('/generate', (req: Request, res: Response) => {
      const parsed = GenerateMusicSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(422).json({
          success: false,
          error: 'Validation failed',
          details: formatIssues(parsed.error),
        });
        return;
      }

      try {
        const result = this.musicService.generateMusic(parsed.data.prompt, parsed.data.duration);
        res.json(result);
      } catch (error) {
        if (error instanceof TrackError) {
          res.status(error.statusCode).json({ success: false, error: error.message });
          return;
        }
        console.error('[WebServer] Music generation failed:', error);
        res.status(500).json({
          success: false,
          error: `Internal server error: ${errorMessage(error)}`,
        });
      }
    });

    // Poll a generation
    router.get('/status/:trackId', (req: Request, res: Response) => {
      try {
        res.json(this.musicService.getGenerationStatus(req.params.trackId));
      } catch (error) {
        if (error instanceof TrackNotFoundError) {
          res.status(404).json({ success: false, error: `Track not found: ${error.trackId}` });
          return;
        }
        res.status(500).json({ success: false, error: errorMessage(error) });
      }
    });

    router.get('/tracks', (req: Request, res: Response) => {
      const status = TrackStatusFilterSchema.safeParse(req.query.status);
      if (!status.success) {
        res.status(422).json({
          success: false,
          error: 'Validation failed',
          details: formatIssues(status.error),
        });
        return;
      }
      res.json({ success: true, data: this.musicService.listTracks(status.data) });
    });

    router.get('/stats', (req: Request, res: Response) => {
      res.json({ success: true, data: this.musicService.getStatistics() });
    });

    return router;
  }

  private setupErrorHandling(): void {
    this.app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }
      if (isBodyParserError(error) && error.type === 'entity.parse.failed') {
        res.status(422).json({
          success: false,
          error: 'Validation failed',
          details: [{ field: 'body', message: 'Malformed JSON body' }],
        });
        return;
      }
      if (isBodyParserError(error) && error.status !== undefined && error.status < 500) {
        res.status(error.status).json({ success: false, error: errorMessage(error) });
        return;
      }
      console.error('[WebServer] Unhandled error:', error);
      res.status(500).json({ success: false, error: `Internal server error: ${errorMessage(error)}` });
    });
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer });

    this.wss.on('connection', (ws: WebSocket) => {
      this.clients.add(ws);

      ws.on('close', () => {
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        console.error('[WebServer] WebSocket error:', error);
        this.clients.delete(ws);
      });

      // Send initial connection confirmation
      ws.send(JSON.stringify({ type: 'connected', timestamp: new Date().toISOString() }));
    });
  }

  public broadcast(message: TrackUpdateMessage): void {
    const payload = JSON.stringify(message);
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    });
  }

  public notifyTrackUpdate(track: TrackJob): void {
    this.broadcast({
      type: 'track_updated',
      trackId: track.id,
      status: track.status,
      progress: track.progress,
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Start listening; resolves with the bound port
   */
  public start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const port = this.options.port ?? 8000;
      const host = this.options.host ?? '0.0.0.0';

      const server = this.app.listen(port, host, () => {
        const boundPort = this.getPort();
        console.log(`[WebServer] API available at http://${host}:${boundPort}`);
        if (this.options.webSocket) {
          this.setupWebSocket();
        }
        resolve(boundPort);
      });
      this.httpServer = server;

      server.on('error', (error) => {
        console.error('[WebServer] Server error:', error);
        reject(error);
      });
    });
  }

  public getPort(): number {
    const address = this.httpServer?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.options.port ?? 8000;
  }

  public isRunning(): boolean {
    return this.httpServer !== null && this.httpServer.listening;
  }

  public stop(): Promise<void> {
    return new Promise((resolve) => {
      // Close all WebSocket connections
      this.clients.forEach((client) => {
        client.terminate();
      });
      this.clients.clear();

      if (this.wss) {
        this.wss.close();
        this.wss = null;
      }

      const server = this.httpServer;
      this.httpServer = null;
      if (!server) {
        resolve();
        return;
      }

      server.close(() => {
        console.log('[WebServer] HTTP server closed');
        resolve();
      });
      server.closeAllConnections();
    });
  }
}
