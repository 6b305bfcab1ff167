import {
  complexityFactor,
  estimateProcessingTime,
  MAX_PROCESSING_SECONDS,
  MIN_PROCESSING_SECONDS,
} from "../src/application/services/DurationEstimator.js";

describe("DurationEstimator", () => {
  describe("complexityFactor", () => {
    test("should be 1.0 for a prompt without keywords", () => {
      expect(complexityFactor("relaxing piano melody")).toBe(1.0);
    });

    test("should add 0.2 per matched keyword, case-insensitively", () => {
      expect(complexityFactor("Orchestral JAZZ piece")).toBeCloseTo(1.4);
    });

    test("should count a repeated keyword once", () => {
      expect(complexityFactor("jazz jazz jazz")).toBeCloseTo(1.2);
    });

    test("should match keywords inside longer words", () => {
      expect(complexityFactor("a symphonyesque experimentalist")).toBeCloseTo(1.4);
    });

    test("should accumulate all five keywords", () => {
      expect(complexityFactor("complex orchestral symphony jazz experimental")).toBeCloseTo(2.0);
    });
  });

  describe("estimateProcessingTime", () => {
    test("should scale half the duration by the random factor", () => {
      // 50 * 0.5 * 1.0 * (0.8 + 0.2 * 0.5) = 22.5
      expect(estimateProcessingTime(50, "calm waves", () => 0.2)).toBe(22);
    });

    test("should apply prompt complexity", () => {
      // 25 * 1.4 * 0.9 = 31.5
      expect(estimateProcessingTime(50, "Orchestral JAZZ piece", () => 0.2)).toBe(31);
    });

    test("should clamp short estimates to the minimum", () => {
      expect(estimateProcessingTime(5, "short jingle", () => 0)).toBe(MIN_PROCESSING_SECONDS);
    });

    test("should clamp long estimates to the maximum", () => {
      expect(
        estimateProcessingTime(300, "complex experimental symphony", () => 0.99)
      ).toBe(MAX_PROCESSING_SECONDS);
    });

    test("should always return an integer within bounds", () => {
      const words = ["piano", "jazz", "ambient", "symphony", "rock", "complex", "EXPERIMENTAL", ""];

      for (let i = 0; i < 1000; i++) {
        const duration = 5 + Math.floor(Math.random() * 296);
        const prompt = Array.from({ length: 1 + (i % 5) }, (_, j) => words[(i + j * 3) % words.length]).join(" ");
        const estimate = estimateProcessingTime(duration, prompt);

        expect(Number.isInteger(estimate)).toBe(true);
        expect(estimate).toBeGreaterThanOrEqual(MIN_PROCESSING_SECONDS);
        expect(estimate).toBeLessThanOrEqual(MAX_PROCESSING_SECONDS);
      }
    });

    test("should vary between calls with identical input", () => {
      const estimates = new Set<number>();
      for (let i = 0; i < 200; i++) {
        estimates.add(estimateProcessingTime(120, "ambient pads"));
      }
      // 60 * [0.8, 1.3] spans 48..77
      expect(estimates.size).toBeGreaterThan(1);
      for (const estimate of estimates) {
        expect(estimate).toBeGreaterThanOrEqual(48);
        expect(estimate).toBeLessThanOrEqual(78);
      }
    });
  });
});
