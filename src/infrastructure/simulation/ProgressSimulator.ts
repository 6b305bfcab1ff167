import { setMaxListeners } from 'events';
import { ITrackStore } from '../../core/interfaces/ITrackStore.js';
import { IArtifactWriter } from '../../core/interfaces/IArtifactWriter.js';
import { sleep } from '../../utils/sleep.js';

export const SIMULATION_STEPS = 10;

export interface ProgressSimulatorOptions {
  /**
   * Multiplier applied to every suspension; 1 means real seconds
   */
  timeScale?: number;
  debugLog?: (message: string) => void;
}

/**
 * Drives simulated generation: one background task per track that raises
 * progress in ten equal steps over the estimated time, then writes the
 * artifact and completes the track.
 *
 * Running tasks are kept by track id so shutdown can stop and await them.
 */
export class ProgressSimulator {
  private tasks: Map<string, Promise<void>> = new Map();
  private controller = new AbortController();
  private timeScale: number;
  private debugLog: (message: string) => void;

  constructor(
    private store: ITrackStore,
    private writer: IArtifactWriter,
    options: ProgressSimulatorOptions = {}
  ) {
    this.timeScale = options.timeScale ?? 1;
    this.debugLog = options.debugLog ?? (() => undefined);
    // Every sleeping task listens on the same signal; there is no task cap
    setMaxListeners(0, this.controller.signal);
  }

  /**
   * Start the simulation for a track without waiting for it
   */
  launch(trackId: string): void {
    if (this.controller.signal.aborted) {
      throw new Error('Progress simulator has been stopped');
    }
    if (this.tasks.has(trackId)) {
      return;
    }

    const task = this.run(trackId)
      .catch((error) => {
        // No failed state: the track stays processing
        console.error(`[ProgressSimulator] ✗ Track ${trackId} could not be finalized:`, error);
      })
      .finally(() => {
        this.tasks.delete(trackId);
      });

    this.tasks.set(trackId, task);
  }

  isRunning(trackId: string): boolean {
    return this.tasks.has(trackId);
  }

  activeCount(): number {
    return this.tasks.size;
  }

  /**
   * Resolves once the track's task has finished (immediately if none runs)
   */
  async waitFor(trackId: string): Promise<void> {
    await this.tasks.get(trackId);
  }

  async drain(): Promise<void> {
    await Promise.all(Array.from(this.tasks.values()));
  }

  /**
   * Abort pending suspensions and wait for every task to return.
   * Used on process shutdown only; tracks stay as they were.
   */
  async stop(): Promise<void> {
    this.controller.abort();
    await this.drain();
  }

  private async run(trackId: string): Promise<void> {
    const track = this.store.find(trackId);
    if (!track) {
      return;
    }

    const stepMs = (track.estimatedProcessingTime * 1000 * this.timeScale) / SIMULATION_STEPS;
    this.debugLog(`[ProgressSimulator] Track ${trackId} started (${track.estimatedProcessingTime}s estimated)`);

    for (let step = 0; step <= SIMULATION_STEPS; step++) {
      const current = this.store.find(trackId);
      if (!current) {
        this.debugLog(`[ProgressSimulator] Track ${trackId} disappeared, stopping`);
        return;
      }

      if (step === SIMULATION_STEPS) {
        const downloadUrl = await this.writer.write(trackId, current.duration, current.prompt);
        this.store.complete(trackId, downloadUrl);
        this.debugLog(`[ProgressSimulator] Track ${trackId} completed: ${downloadUrl}`);
        return;
      }

      this.store.updateProgress(trackId, Math.floor((step * 100) / SIMULATION_STEPS));

      const elapsed = await sleep(stepMs, this.controller.signal);
      if (!elapsed) {
        this.debugLog(`[ProgressSimulator] Track ${trackId} stopped after step ${step}`);
        return;
      }
    }
  }
}
