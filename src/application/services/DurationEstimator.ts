/**
 * Processing time estimation for simulated track generation
 */

export const COMPLEXITY_KEYWORDS = ['complex', 'orchestral', 'symphony', 'jazz', 'experimental'];

export const MIN_PROCESSING_SECONDS = 10;
export const MAX_PROCESSING_SECONDS = 120;

const COMPLEXITY_STEP = 0.2;
const RANDOM_FACTOR_MIN = 0.8;
const RANDOM_FACTOR_MAX = 1.3;

/**
 * Complexity multiplier: 1.0 plus 0.2 for every keyword found in the prompt
 */
export function complexityFactor(prompt: string): number {
  const lower = prompt.toLowerCase();
  return COMPLEXITY_KEYWORDS.reduce(
    (factor, keyword) => (lower.includes(keyword) ? factor + COMPLEXITY_STEP : factor),
    1.0
  );
}

/**
 * Estimate how many seconds generating a track should take.
 * Half a second per requested second, scaled by prompt complexity and a
 * uniform random factor in [0.8, 1.3], clamped to [10, 120].
 *
 * @param random - uniform source in [0, 1); Math.random unless a test pins it
 */
export function estimateProcessingTime(
  durationSeconds: number,
  prompt: string,
  random: () => number = Math.random
): number {
  const base = durationSeconds * 0.5;
  const randomFactor = RANDOM_FACTOR_MIN + random() * (RANDOM_FACTOR_MAX - RANDOM_FACTOR_MIN);
  const estimated = Math.floor(base * complexityFactor(prompt) * randomFactor);

  return Math.max(MIN_PROCESSING_SECONDS, Math.min(estimated, MAX_PROCESSING_SECONDS));
}
