import { createTransport, type Transporter } from "nodemailer";
import { ReportError, describeError, type Logger, type RunReport } from "@stay-lock/core";
import { DEFAULTS, type Config } from "./config.js";

export interface ReportSink {
  send(report: RunReport): Promise<void>;
}

export type SmtpOptions = {
  host: string;
  port: number;
  user?: string;
  password?: string;
  starttls: boolean;
  from: string;
  to: string;
};

export class SmtpReportSink implements ReportSink {
  private readonly transport: Transporter;

  constructor(private readonly options: SmtpOptions) {
    const implicitTls = options.port === 465;
    this.transport = createTransport({
      host: options.host,
      port: options.port,
      secure: implicitTls,
      requireTLS: !implicitTls && options.starttls,
      ignoreTLS: !implicitTls && !options.starttls,
      auth: options.user ? { user: options.user, pass: options.password ?? "" } : undefined,
      connectionTimeout: 30_000
    });
  }

  async send(report: RunReport): Promise<void> {
    await this.transport.sendMail({
      from: this.options.from,
      to: this.options.to,
      subject: report.subject,
      text: report.body
    });
  }
}

/** Builds the SMTP sink, or returns null when no recipient is configured. */
export function createReportSink(config: Config, smtpPassword?: string): ReportSink | null {
  const report = config.report;
  const host = report?.smtp?.host;
  if (!report?.mailTo || !host) {
    return null;
  }
  const user = report.smtp?.user;
  return new SmtpReportSink({
    host,
    port: report.smtp?.port ?? DEFAULTS.smtpPort,
    user,
    password: smtpPassword,
    starttls: report.smtp?.starttls ?? true,
    from: report.mailFrom ?? user ?? "noreply@example.com",
    to: report.mailTo
  });
}

export async function deliverReport(sink: ReportSink | null, report: RunReport, logger: Logger): Promise<boolean> {
  if (!sink) {
    return false;
  }
  try {
    await sink.send(report);
    logger.info(`Report sent: ${report.subject}`);
    return true;
  } catch (error) {
    const failure = new ReportError(`Report delivery failed: ${describeError(error)}`, { cause: error });
    logger.error(`[ERR] ${failure.message}`);
    return false;
  }
}
