import { withSpan } from "../config/otel";
import { componentLogger } from "../config/logger";
import { NotFoundError } from "../errors";
import type { BaselineCalculator } from "../services/baseline";
import type { Signature } from "../../../shared/types";

const log = componentLogger("baseline-refresher");

export interface RefreshReport {
  refreshed: number;
  unchanged: number;
  missing: number;
  failed: Signature[];
}

/** One refresh pass over `signatures`; a failing signature never stops the pass. */
export async function refreshBaselines(
  calculator: BaselineCalculator,
  signatures: readonly Signature[]
): Promise<RefreshReport> {
  return await withSpan(
    "job.refreshBaselines",
    async () => {
      const report: RefreshReport = { refreshed: 0, unchanged: 0, missing: 0, failed: [] };

      for (const signature of signatures) {
        try {
          const before = await calculator.peek(signature);
          const after = await calculator.getOrRefresh(signature);
          if (before && after.lastUpdated.getTime() === before.lastUpdated.getTime()) {
            report.unchanged++;
          } else {
            report.refreshed++;
          }
        } catch (err) {
          if (err instanceof NotFoundError) {
            report.missing++;
            continue;
          }
          report.failed.push(signature);
          log.error({ err, signature }, "baseline refresh failed");
        }
      }

      log.info({ ...report, failed: report.failed.length }, "baseline refresh pass complete");
      return report;
    },
    { signatureCount: signatures.length }
  );
}
