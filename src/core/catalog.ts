/**
 * Static capabilities advertised by the music endpoints
 */
export const SUPPORTED_FORMATS = ['mp3', 'wav'] as const;

export const SUPPORTED_GENRES = [
  'pop', 'rock', 'jazz', 'classical', 'electronic', 'hip-hop',
  'country', 'reggae', 'blues', 'folk', 'ambient', 'instrumental',
];

export const SUPPORTED_MOODS = [
  'happy', 'sad', 'energetic', 'relaxing', 'dramatic', 'peaceful',
  'mysterious', 'uplifting', 'melancholic', 'triumphant', 'romantic',
];

export const AUDIO_CONTENT_TYPES: Record<string, string> = {
  '.mp3': 'audio/mpeg',
  '.wav': 'audio/wav',
};
