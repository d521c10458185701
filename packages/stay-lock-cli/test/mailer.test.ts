import { describe, expect, it, vi } from "vitest";
import type { Config } from "../src/config.js";
import { SmtpReportSink, createReportSink, deliverReport, type ReportSink } from "../src/mailer.js";

const report = { subject: "OK - Stay Lock Sync Report - 01.06.2025", body: "line" };

function baseConfig(report: Config["report"]): Config {
  return {
    bookings: { source: "directory", directory: "./bookings" },
    units: [{ id: "a1", bookingFileId: "file-1", lockId: 101 }],
    report
  };
}

describe("createReportSink", () => {
  it("skips mail when no recipient is configured", () => {
    expect(createReportSink(baseConfig(undefined))).toBeNull();
    expect(createReportSink(baseConfig({ smtp: { host: "smtp.example.test" } }))).toBeNull();
  });

  it("builds an SMTP sink when host and recipient are set", () => {
    const sink = createReportSink(baseConfig({ mailTo: "owner@example.com", smtp: { host: "smtp.example.test", port: 465 } }), "test-password");
    expect(sink).toBeInstanceOf(SmtpReportSink);
  });
});

describe("deliverReport", () => {
  it("logs the subject after a successful send", async () => {
    const send = vi.fn<ReportSink["send"]>().mockResolvedValue(undefined);
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    await expect(deliverReport({ send }, report, logger)).resolves.toBe(true);
    expect(send).toHaveBeenCalledWith(report);
    expect(logger.info).toHaveBeenCalledWith("Report sent: OK - Stay Lock Sync Report - 01.06.2025");
  });

  it("never throws when delivery fails", async () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    await expect(deliverReport({ send: () => Promise.reject(new Error("connection refused")) }, report, logger)).resolves.toBe(false);
    expect(logger.error).toHaveBeenCalledWith("[ERR] Report delivery failed: connection refused");
  });

  it("does nothing without a sink", async () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    await expect(deliverReport(null, report, logger)).resolves.toBe(false);
    expect(logger.info).not.toHaveBeenCalled();
  });
});
