/**
 * Track generation job domain entity
 */
export type TrackStatus = 'processing' | 'completed';

export interface TrackJob {
  id: string;
  prompt: string;
  duration: number; // requested length in seconds
  status: TrackStatus;
  progress: number; // 0-100
  createdAt: Date;
  estimatedCompletion: Date;
  estimatedProcessingTime: number; // seconds
  downloadUrl?: string;
  completedAt?: Date;
}

export interface TrackStatistics {
  total: number;
  processing: number;
  completed: number;
}

export const MIN_DURATION_SECONDS = 5;
export const MAX_DURATION_SECONDS = 300;
export const DEFAULT_DURATION_SECONDS = 30;
export const MAX_PROMPT_LENGTH = 500;
