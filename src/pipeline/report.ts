// pattern: Functional Core
import type { RunReport } from "./types";

export function buildReport(
  notificationsTotal: number,
  releaseNotifications: number,
  sent: number,
  errors: ReadonlyArray<string>,
): RunReport {
  return {
    notificationsTotal,
    releaseNotifications,
    sent,
    errors: errors.length > 0 ? [...errors] : null,
  };
}
