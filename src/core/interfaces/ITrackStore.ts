import { TrackJob, TrackStatistics, TrackStatus } from '../entities/Track.js';

export type TrackListener = (track: TrackJob) => void;

/**
 * In-process ownership of track job state
 */
export interface ITrackStore {
  create(prompt: string, duration: number, estimatedSeconds: number): TrackJob;

  /**
   * Snapshot of the record; throws TrackNotFoundError when absent
   */
  get(trackId: string): TrackJob;

  find(trackId: string): TrackJob | null;

  has(trackId: string): boolean;

  size(): number;

  getAll(): TrackJob[];

  getByStatus(status: TrackStatus): TrackJob[];

  getStatistics(): TrackStatistics;

  updateProgress(trackId: string, progress: number): TrackJob;

  complete(trackId: string, downloadUrl: string): TrackJob;

  onTrackUpdated(listener: TrackListener): void;
}
