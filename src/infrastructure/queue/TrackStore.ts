import { randomBytes } from 'crypto';
import { TrackJob, TrackStatistics, TrackStatus } from '../../core/entities/Track.js';
import { ITrackStore, TrackListener } from '../../core/interfaces/ITrackStore.js';
import { TrackImmutableError, TrackNotFoundError } from '../../core/errors.js';

export const TRACK_ID_PATTERN = /^track_[0-9a-f]{8}$/;

/**
 * Generate a track id: "track_" followed by 8 hex characters
 */
function generateTrackId(): string {
  return `track_${randomBytes(4).toString('hex')}`;
}

function snapshot(track: TrackJob): TrackJob {
  return {
    ...track,
    createdAt: new Date(track.createdAt),
    estimatedCompletion: new Date(track.estimatedCompletion),
    completedAt: track.completedAt ? new Date(track.completedAt) : undefined,
  };
}

/**
 * In-memory store of track jobs.
 *
 * Every record is written only by the simulator that owns it; readers get
 * copies so they never hold a live reference into the store.
 */
export class TrackStore implements ITrackStore {
  private tracks: Map<string, TrackJob> = new Map();
  private listeners: TrackListener[] = [];

  constructor(private idFactory: () => string = generateTrackId) {}

  create(prompt: string, duration: number, estimatedSeconds: number): TrackJob {
    let id = this.idFactory();
    while (this.tracks.has(id)) {
      id = this.idFactory();
    }

    const now = new Date();
    const track: TrackJob = {
      id,
      prompt,
      duration,
      status: 'processing',
      progress: 0,
      createdAt: now,
      estimatedCompletion: new Date(now.getTime() + estimatedSeconds * 1000),
      estimatedProcessingTime: estimatedSeconds,
    };

    this.tracks.set(id, track);
    this.notify(track);

    return snapshot(track);
  }

  get(trackId: string): TrackJob {
    const track = this.tracks.get(trackId);
    if (!track) {
      throw new TrackNotFoundError(trackId);
    }
    return snapshot(track);
  }

  find(trackId: string): TrackJob | null {
    const track = this.tracks.get(trackId);
    return track ? snapshot(track) : null;
  }

  has(trackId: string): boolean {
    return this.tracks.has(trackId);
  }

  size(): number {
    return this.tracks.size;
  }

  getAll(): TrackJob[] {
    return Array.from(this.tracks.values(), snapshot);
  }

  getByStatus(status: TrackStatus): TrackJob[] {
    return this.getAll().filter((track) => track.status === status);
  }

  getStatistics(): TrackStatistics {
    let completed = 0;
    for (const track of this.tracks.values()) {
      if (track.status === 'completed') completed++;
    }
    return {
      total: this.tracks.size,
      processing: this.tracks.size - completed,
      completed,
    };
  }

  /**
   * Raise progress of a processing track. Lower values are ignored and the
   * value stays below 100 until the track is completed.
   */
  updateProgress(trackId: string, progress: number): TrackJob {
    const track = this.mutable(trackId);
    const next = Math.min(99, Math.max(0, Math.floor(progress)));
    if (next > track.progress) {
      track.progress = next;
      this.notify(track);
    }
    return snapshot(track);
  }

  complete(trackId: string, downloadUrl: string): TrackJob {
    const track = this.mutable(trackId);
    track.status = 'completed';
    track.progress = 100;
    track.downloadUrl = downloadUrl;
    track.completedAt = new Date();
    this.notify(track);
    return snapshot(track);
  }

  onTrackUpdated(listener: TrackListener): void {
    this.listeners.push(listener);
  }

  private mutable(trackId: string): TrackJob {
    const track = this.tracks.get(trackId);
    if (!track) {
      throw new TrackNotFoundError(trackId);
    }
    if (track.status === 'completed') {
      throw new TrackImmutableError(trackId);
    }
    return track;
  }

  private notify(track: TrackJob): void {
    if (this.listeners.length === 0) return;
    const copy = snapshot(track);
    for (const listener of this.listeners) {
      try {
        listener(copy);
      } catch (error) {
        console.error(`[TrackStore] Listener failed for track ${track.id}:`, error);
      }
    }
  }
}
