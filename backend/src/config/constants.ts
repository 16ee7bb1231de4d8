import { env } from "./env";

export const PROJECT_NAME = "query-insight";

export const SIGNATURE_LENGTH = Math.min(64, Math.max(8, Math.trunc(env.SIGNATURE_LENGTH)));

export const BASELINE_MIN_SAMPLES = env.BASELINE_MIN_SAMPLES;
export const BASELINE_REFRESH_MS = env.BASELINE_REFRESH_DAYS * 24 * 60 * 60 * 1000;
export const BASELINE_SAMPLE_RETRIES = env.BASELINE_SAMPLE_RETRIES;

export const PARTITION_MIN_TOTAL = env.PARTITION_MIN_TOTAL;
export const PARTITION_SCAN_CEILING = env.PARTITION_SCAN_CEILING;

export const ACCELERATION_DURATION_MS = env.ACCELERATION_DURATION_MS;
export const ACCELERATION_HIT_RATIO_FLOOR = env.ACCELERATION_HIT_RATIO_FLOOR;

export const JOIN_FANOUT_MULTIPLIER = env.JOIN_FANOUT_MULTIPLIER;

export const SELECT_STAR_IMPROVEMENT_PCT = env.SELECT_STAR_IMPROVEMENT_PCT;

export const SMALL_FILE_COUNT = env.SMALL_FILE_COUNT;
export const SMALL_FILE_AVG_BYTES = env.SMALL_FILE_AVG_MB * 1024 * 1024;

export const REGRESSION_MULTIPLIER = env.REGRESSION_MULTIPLIER;

export const DETECTION_CONCURRENCY = Math.max(1, Math.trunc(env.DETECTION_CONCURRENCY));
// 0 disables the batch timeout
export const DETECTION_TIMEOUT_MS = env.DETECTION_TIMEOUT_MS;

export const MEASUREMENT_TOLERANCE_PCT = env.MEASUREMENT_TOLERANCE_PCT;
