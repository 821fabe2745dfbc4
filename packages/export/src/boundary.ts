/**
 * Report export boundary: resolves the format tag and dispatches to a sink
 */

import pino from 'pino';
import {
  EXPORT_FORMATS,
  UnknownEnumValueError,
  UnsupportedFormatError,
  decodeExportFormat,
  errorMessage,
  type ExportFormat,
  type ExportSink,
  type ReportTree,
  type ReportType,
} from '@kexp/core';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export const REPORT_FILE_EXTENSIONS: Readonly<Record<ExportFormat, string>> = {
  excel: 'xlsx',
  json: 'json',
  csv: 'csv',
};

export function defaultReportPath(format: ExportFormat): string {
  return `knowledge_expiry_report.${REPORT_FILE_EXTENSIONS[format]}`;
}

export interface ExportRequest {
  /** Case-insensitive format tag */
  format: string;
  outputPath: string;
  reportType: ReportType;
}

export type ExportOutcome =
  | { success: true; format: ExportFormat; outputPath: string }
  | { success: false; error: Error };

/**
 * Resolve a format tag, or fail with the allowed values
 * @throws UnsupportedFormatError
 */
export function resolveExportFormat(tag: string): ExportFormat {
  try {
    return decodeExportFormat(tag);
  } catch (error: unknown) {
    if (error instanceof UnknownEnumValueError) {
      throw new UnsupportedFormatError(tag, EXPORT_FORMATS);
    }
    throw error;
  }
}

function dispatch(sink: ExportSink, tree: ReportTree, format: ExportFormat, request: ExportRequest): Promise<boolean> {
  switch (format) {
    case 'excel':
      return sink.writeExcel(tree, request.outputPath, request.reportType);
    case 'json':
      return sink.writeJson(tree, request.outputPath);
    case 'csv':
      return sink.writeCsv(tree, request.outputPath);
  }
}

/**
 * Never throws; unknown formats and sink failures come back as { success: false }
 */
export async function exportReport(sink: ExportSink, tree: ReportTree, request: ExportRequest): Promise<ExportOutcome> {
  let format: ExportFormat;
  try {
    format = resolveExportFormat(request.format);
  } catch (error: unknown) {
    logger.error({ event: 'export.format.unsupported', format: request.format }, errorMessage(error));
    return { success: false, error: error instanceof Error ? error : new Error(errorMessage(error)) };
  }

  let written: boolean;
  try {
    written = await dispatch(sink, tree, format, request);
  } catch (error: unknown) {
    logger.error({ event: 'export.report.fail', format, error: errorMessage(error) }, 'Error exporting report');
    return { success: false, error: error instanceof Error ? error : new Error(errorMessage(error)) };
  }

  if (!written) {
    return { success: false, error: new Error(`Failed to export report as ${format} to ${request.outputPath}`) };
  }
  return { success: true, format, outputPath: request.outputPath };
}
