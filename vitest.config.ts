import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["backend/tests/**/*.test.ts"],
    globals: true,
    setupFiles: [],
    env: {
      LOG_LEVEL: "silent",
      SIGNATURE_LENGTH: "16",
      BASELINE_MIN_SAMPLES: "20",
      BASELINE_REFRESH_DAYS: "7",
      PARTITION_SCAN_CEILING: "0.5",
      ACCELERATION_DURATION_MS: "5000",
      ACCELERATION_HIT_RATIO_FLOOR: "0.7",
      JOIN_FANOUT_MULTIPLIER: "10",
      SMALL_FILE_COUNT: "1000",
      SMALL_FILE_AVG_MB: "64",
      REGRESSION_MULTIPLIER: "1.5",
      MEASUREMENT_TOLERANCE_PCT: "20"
    }
  }
});
