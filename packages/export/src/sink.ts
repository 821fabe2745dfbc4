/**
 * Export sink writing report trees to the local filesystem
 */

import ExcelJS from 'exceljs';
import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import pino from 'pino';
import { errorMessage, type ExportSink, type ReportTree, type ReportType } from '@kexp/core';
import { buildWorkbook } from './excel.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export const CSV_COLUMNS = [
  'description',
  'category',
  'urgency',
  'document_filename',
  'confidence_score',
  'context_snippet',
  'last_updated_date',
] as const;

const CSV_SNIPPET_CHARS = 200;

async function ensureParentDirectory(path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
}

export class FileExportSink implements ExportSink {
  async writeExcel(tree: ReportTree, path: string, reportType: ReportType): Promise<boolean> {
    logger.info({ event: 'export.excel.start', path, reportType }, 'Exporting report to Excel');
    try {
      await ensureParentDirectory(path);
      await buildWorkbook(tree, reportType).xlsx.writeFile(path);
      logger.info({ event: 'export.excel.done', path }, 'Excel report exported');
      return true;
    } catch (error: unknown) {
      logger.error({ event: 'export.excel.fail', path, error: errorMessage(error) }, 'Error exporting to Excel');
      return false;
    }
  }

  async writeJson(tree: ReportTree, path: string): Promise<boolean> {
    logger.info({ event: 'export.json.start', path }, 'Exporting report to JSON');
    try {
      await ensureParentDirectory(path);
      await writeFile(path, JSON.stringify(tree, null, 2), 'utf-8');
      logger.info({ event: 'export.json.done', path }, 'JSON report exported');
      return true;
    } catch (error: unknown) {
      logger.error({ event: 'export.json.fail', path, error: errorMessage(error) }, 'Error exporting to JSON');
      return false;
    }
  }

  /**
   * Flattens critical_points.detailed_list only; an empty list writes nothing
   */
  async writeCsv(tree: ReportTree, path: string): Promise<boolean> {
    const points = tree.critical_points.detailed_list;
    if (points.length === 0) {
      logger.warn({ event: 'export.csv.empty', path }, 'No critical points to export to CSV');
      return false;
    }

    logger.info({ event: 'export.csv.start', path, rows: points.length }, 'Exporting report to CSV');
    try {
      const workbook = new ExcelJS.Workbook();
      const sheet = workbook.addWorksheet('Critical Points');
      sheet.addRow([...CSV_COLUMNS]);
      for (const point of points) {
        sheet.addRow([
          point.description,
          point.category,
          point.urgency,
          point.document_filename,
          point.confidence_score ?? '',
          point.context_snippet ? `${point.context_snippet.slice(0, CSV_SNIPPET_CHARS)}...` : '',
          point.last_updated_date ?? '',
        ]);
      }

      await ensureParentDirectory(path);
      await workbook.csv.writeFile(path);
      logger.info({ event: 'export.csv.done', path }, 'CSV report exported');
      return true;
    } catch (error: unknown) {
      logger.error({ event: 'export.csv.fail', path, error: errorMessage(error) }, 'Error exporting to CSV');
      return false;
    }
  }
}
