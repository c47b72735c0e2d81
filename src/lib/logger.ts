import { SeverityNumber } from '@opentelemetry/api-logs';
import { ExportResult, ExportResultCode, hrTimeToTimeStamp } from '@opentelemetry/core';
import {
  LoggerProvider,
  SimpleLogRecordProcessor,
  LogRecordExporter,
  ReadableLogRecord,
} from '@opentelemetry/sdk-logs';
import { config, LogLevel } from '../config';

// --- OpenTelemetry Logging Setup ---
// stdout carries the N-Triples output, so log records are exported to stderr.

const SEVERITY_BY_LEVEL: Record<LogLevel, SeverityNumber> = {
  debug: SeverityNumber.DEBUG,
  info: SeverityNumber.INFO,
  warn: SeverityNumber.WARN,
  error: SeverityNumber.ERROR,
};

let minimumSeverity: SeverityNumber = SEVERITY_BY_LEVEL[config.logLevel];

/**
 * Changes the minimum severity written to stderr (e.g. from --verbose / --quiet).
 */
export function setLogLevel(level: LogLevel): void {
  minimumSeverity = SEVERITY_BY_LEVEL[level];
}

export function formatLogRecord(record: ReadableLogRecord): string {
  const time = hrTimeToTimeStamp(record.hrTime);
  const severity = record.severityText ?? SeverityNumber[record.severityNumber ?? SeverityNumber.INFO];
  const body = typeof record.body === 'string' ? record.body : JSON.stringify(record.body);
  const attributes = Object.keys(record.attributes).length > 0 ? ` ${JSON.stringify(record.attributes)}` : '';
  return `${time} ${severity} ${body}${attributes}`;
}

/**
 * Writes each log record as a single line to stderr, dropping records below the minimum severity.
 */
export class StderrLogRecordExporter implements LogRecordExporter {
  export(logs: ReadableLogRecord[], resultCallback: (result: ExportResult) => void): void {
    for (const record of logs) {
      if ((record.severityNumber ?? SeverityNumber.INFO) < minimumSeverity) {
        continue;
      }
      process.stderr.write(`${formatLogRecord(record)}\n`);
    }
    resultCallback({ code: ExportResultCode.SUCCESS });
  }

  shutdown(): Promise<void> {
    return Promise.resolve();
  }
}

const loggerProvider = new LoggerProvider();
loggerProvider.addLogRecordProcessor(new SimpleLogRecordProcessor(new StderrLogRecordExporter()));

// Application name, version
export const logger = loggerProvider.getLogger('addressbook-rdf', '1.0.0');

export { SeverityNumber };

export function shutdownLogging(): Promise<void> {
  return loggerProvider.shutdown();
}
