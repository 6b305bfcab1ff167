import { Config } from '../config.js';
import { TrackStore } from '../infrastructure/queue/TrackStore.js';
import { PlaceholderMp3Writer } from '../infrastructure/storage/PlaceholderMp3Writer.js';
import { ProgressSimulator } from '../infrastructure/simulation/ProgressSimulator.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { MusicGeneratorService } from '../application/services/MusicGeneratorService.js';

/**
 * Wires the track store, simulator, service and HTTP server together
 */
export class MusicApp {
  readonly trackStore: TrackStore;
  readonly artifactWriter: PlaceholderMp3Writer;
  readonly simulator: ProgressSimulator;
  readonly musicService: MusicGeneratorService;
  readonly webServer: WebServer;
  private debugLog: (message: string) => void;

  constructor(private config: Config, random: () => number = Math.random) {
    this.debugLog = (message: string) => {
      if (config.server.debug) {
        console.error(`[DEBUG] ${message}`);
      }
    };

    this.trackStore = new TrackStore();
    this.artifactWriter = new PlaceholderMp3Writer(config.generation.downloadsDir);
    this.simulator = new ProgressSimulator(this.trackStore, this.artifactWriter, {
      timeScale: config.generation.timeScale,
      debugLog: this.debugLog,
    });
    this.musicService = new MusicGeneratorService(this.trackStore, this.simulator, random);

    this.webServer = new WebServer(this.musicService, this.artifactWriter, {
      name: config.server.name,
      version: config.server.version,
      host: config.http.host,
      port: config.http.port,
      corsOrigins: config.http.corsOrigins,
      webSocket: config.http.webSocket,
    });
  }

  /**
   * Start serving; resolves with the bound port
   */
  async start(): Promise<number> {
    const port = await this.webServer.start();
    this.debugLog(`Artifacts are written to ${this.artifactWriter.getDirectory()}`);
    return port;
  }

  printStats(): void {
    const stats = this.musicService.getStatistics();
    console.log(`📊 Tracks: ${stats.total} total | ${stats.processing} processing | ${stats.completed} completed`);
  }

  /**
   * Stop background simulations first, then the HTTP server
   */
  async shutdown(): Promise<void> {
    const active = this.simulator.activeCount();
    if (active > 0) {
      console.log(`[MusicApp] Stopping ${active} running simulation(s)...`);
    }
    await this.musicService.shutdown();
    if (this.webServer.isRunning()) {
      await this.webServer.stop();
    }
  }
}
