import { TrackJob, TrackStatistics, TrackStatus } from '../../core/entities/Track.js';
import { ITrackStore } from '../../core/interfaces/ITrackStore.js';
import { EmptyPromptError } from '../../core/errors.js';
import { ProgressSimulator } from '../../infrastructure/simulation/ProgressSimulator.js';
import { estimateProcessingTime } from './DurationEstimator.js';

export interface GenerationResult {
  success: true;
  message: string;
  track_id: string;
  prompt: string;
  duration: number;
  estimated_processing_time: number;
  status: TrackStatus;
  download_url: string | null;
}

export interface TrackStatusView {
  track_id: string;
  status: TrackStatus;
  progress: number;
  prompt: string;
  duration: number;
  created_at: string;
  estimated_completion: string;
  download_url: string | null;
}

export function toStatusView(track: TrackJob): TrackStatusView {
  return {
    track_id: track.id,
    status: track.status,
    progress: track.progress,
    prompt: track.prompt,
    duration: track.duration,
    created_at: track.createdAt.toISOString(),
    estimated_completion: track.estimatedCompletion.toISOString(),
    download_url: track.downloadUrl ?? null,
  };
}

/**
 * Service for starting and tracking simulated music generation
 */
export class MusicGeneratorService {
  constructor(
    private trackStore: ITrackStore,
    private simulator: ProgressSimulator,
    private random: () => number = Math.random
  ) {}

  /**
   * Register a track and start its simulation in the background
   */
  generateMusic(prompt: string, duration: number): GenerationResult {
    const trimmed = prompt.trim();
    if (trimmed === '') {
      throw new EmptyPromptError();
    }

    const estimated = estimateProcessingTime(duration, trimmed, this.random);
    const track = this.trackStore.create(trimmed, duration, estimated);
    this.simulator.launch(track.id);

    return {
      success: true,
      message: `Music generation started for prompt: '${trimmed}'`,
      track_id: track.id,
      prompt: trimmed,
      duration,
      estimated_processing_time: estimated,
      status: track.status,
      download_url: null,
    };
  }

  /**
   * Get track status; throws TrackNotFoundError for unknown ids
   */
  getGenerationStatus(trackId: string): TrackStatusView {
    return toStatusView(this.trackStore.get(trackId));
  }

  listTracks(status?: TrackStatus): TrackStatusView[] {
    const tracks = status ? this.trackStore.getByStatus(status) : this.trackStore.getAll();
    return tracks.map(toStatusView);
  }

  getStatistics(): TrackStatistics & { active_simulations: number } {
    return {
      ...this.trackStore.getStatistics(),
      active_simulations: this.simulator.activeCount(),
    };
  }

  onTrackUpdated(callback: (track: TrackJob) => void): void {
    this.trackStore.onTrackUpdated(callback);
  }

  async shutdown(): Promise<void> {
    await this.simulator.stop();
  }
}
