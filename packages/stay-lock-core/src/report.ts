import { formatLocalDate } from "./time.js";
import type { RunOutcome } from "./types.js";

export type RunReport = {
  subject: string;
  body: string;
};

export function formatReport(args: { outcome: RunOutcome; runDate: Date; timeZone: string; subjectPrefix: string }): RunReport {
  const status = args.outcome.hadError ? "ERROR" : "OK";
  return {
    subject: `${status} - ${args.subjectPrefix} - ${formatLocalDate(args.runDate, args.timeZone)}`,
    body: args.outcome.summaryLines.join("\n\n")
  };
}
