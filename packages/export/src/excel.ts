/**
 * Spreadsheet layout for knowledge expiry reports
 *
 * Sheet set depends on the report type:
 * - executive: Executive Summary, Critical Findings, Action Items
 * - detailed: All Critical Points, Document Analysis, Timeline Analysis
 * - comprehensive: all of the above plus Expiry Analysis and Statistics
 */

import ExcelJS from 'exceljs';
import type { Workbook, Worksheet } from 'exceljs';
import { TIMELINE_BUCKETS, type ReportTree, type ReportType, type TimelineBucket } from '@kexp/core';
import { fillRow, formatSheet, solidFill, titleCase, writeHeaderRow, writeHeading, type ColorName } from './styles.js';

export const EXECUTIVE_SHEETS = ['Executive Summary', 'Critical Findings', 'Action Items'] as const;
export const DETAILED_SHEETS = ['All Critical Points', 'Document Analysis', 'Timeline Analysis'] as const;
export const EXTRA_SHEETS = ['Expiry Analysis', 'Statistics'] as const;

const CONTEXT_PREVIEW_CHARS = 100;

function priorityColor(priority: string | undefined): ColorName | null {
  const normalized = (priority ?? 'medium').toLowerCase();
  if (normalized === 'critical') return 'critical';
  if (normalized === 'high') return 'high';
  return null;
}

function timelineColor(bucket: TimelineBucket): ColorName {
  switch (bucket) {
    case 'immediate_attention':
      return 'critical';
    case 'next_30_days':
      return 'high';
    case 'next_90_days':
      return 'medium';
    default:
      return 'low';
  }
}

function addExecutiveSummary(sheet: Worksheet, tree: ReportTree): void {
  const title = sheet.getCell('A1');
  title.value = 'Knowledge Expiry Report - Executive Summary';
  title.font = { size: 16, bold: true, color: { argb: 'FFFFFFFF' } };
  title.fill = solidFill('header');
  sheet.mergeCells('A1:D1');

  let row = 3;
  sheet.getCell(`A${row}`).value = 'Report Generated:';
  sheet.getCell(`B${row}`).value = tree.metadata.generated_at;
  row++;
  sheet.getCell(`A${row}`).value = 'Analysis Model:';
  sheet.getCell(`B${row}`).value = tree.metadata.analysis_model;
  row += 2;

  writeHeading(sheet, `A${row}`, 'Key Metrics', 14);
  row++;
  for (const [metric, value] of Object.entries(tree.executive_summary.key_metrics)) {
    sheet.getCell(`A${row}`).value = titleCase(metric);
    sheet.getCell(`B${row}`).value = value;
    row++;
  }
  row++;

  writeHeading(sheet, `A${row}`, 'Executive Summary', 14);
  row++;
  const overview = sheet.getCell(`A${row}`);
  overview.value = tree.executive_summary.overview;
  overview.alignment = { wrapText: true, vertical: 'top' };
  sheet.mergeCells(`A${row}:D${row + 5}`);

  formatSheet(sheet);
}

function addCriticalFindings(sheet: Worksheet, tree: ReportTree): void {
  writeHeaderRow(sheet, ['Finding', 'Impact', 'Recommendation'], 1);
  tree.critical_findings.forEach((finding, index) => {
    sheet.getRow(index + 2).values = [finding.finding, finding.impact ?? '', finding.recommendation ?? ''];
  });
  formatSheet(sheet);
}

function addActionItems(sheet: Worksheet, tree: ReportTree): void {
  writeHeaderRow(sheet, ['Task', 'Priority', 'Owner', 'Timeline', 'Status'], 1);
  tree.recommendations.action_items.forEach((item, index) => {
    const rowNumber = index + 2;
    sheet.getRow(rowNumber).values = [
      item.task,
      item.priority ?? 'Medium',
      item.owner ?? 'TBD',
      item.timeline ?? 'TBD',
      'Pending',
    ];
    const color = priorityColor(item.priority);
    if (color) fillRow(sheet, rowNumber, 5, color);
  });
  formatSheet(sheet);
}

function addCriticalPoints(sheet: Worksheet, tree: ReportTree): void {
  writeHeaderRow(sheet, ['Description', 'Category', 'Urgency', 'Document', 'Confidence', 'Context'], 1);
  tree.critical_points.detailed_list.forEach((point, index) => {
    const rowNumber = index + 2;
    const context = point.context_snippet ? `${point.context_snippet.slice(0, CONTEXT_PREVIEW_CHARS)}...` : '';
    sheet.getRow(rowNumber).values = [
      point.description,
      titleCase(point.category),
      titleCase(point.urgency),
      point.document_filename,
      point.confidence_score ?? 0,
      context,
    ];
    fillRow(sheet, rowNumber, 6, point.urgency);
  });
  formatSheet(sheet);
}

function addDocumentAnalysis(sheet: Worksheet, tree: ReportTree): void {
  const analysis = tree.document_analysis;
  writeHeading(sheet, 'A1', 'Document Analysis', 14);

  let row = 3;
  writeHeading(sheet, `A${row}`, 'File Type Distribution', 12);
  row++;
  writeHeaderRow(sheet, ['File Type', 'Count'], row);
  row++;
  for (const [fileType, count] of Object.entries(analysis.file_type_distribution)) {
    sheet.getRow(row).values = [fileType.toUpperCase(), count];
    row++;
  }

  row += 2;
  writeHeading(sheet, `A${row}`, 'Confidence Score Distribution', 12);
  row++;
  writeHeaderRow(sheet, ['Confidence Level', 'Count'], row);
  row++;
  for (const [level, count] of Object.entries(analysis.confidence_distribution)) {
    sheet.getRow(row).values = [level, count];
    row++;
  }

  formatSheet(sheet);
}

function addTimeline(sheet: Worksheet, tree: ReportTree): void {
  writeHeading(sheet, 'A1', 'Timeline Analysis', 14);
  writeHeaderRow(sheet, ['Timeline Category', 'Items Count'], 3);

  TIMELINE_BUCKETS.forEach((bucket, index) => {
    const rowNumber = index + 4;
    sheet.getRow(rowNumber).values = [titleCase(bucket), tree.timeline_analysis.timeline_categories[bucket]];
    fillRow(sheet, rowNumber, 2, timelineColor(bucket));
  });

  formatSheet(sheet);
}

function addExpiryAnalysis(sheet: Worksheet, tree: ReportTree): void {
  const expiry = tree.expiry_analysis;
  writeHeading(sheet, 'A1', 'Knowledge Expiry Analysis', 14);

  let row = 3;
  sheet.getRow(row).values = ['Total Points with Expiry Indicators:', expiry.total_points_with_indicators];
  row += 2;

  writeHeading(sheet, `A${row}`, 'Most Common Expiry Indicators', 12);
  row++;
  writeHeaderRow(sheet, ['Indicator', 'Frequency'], row);
  row++;
  for (const [indicator, frequency] of expiry.most_common_indicators.slice(0, 10)) {
    sheet.getRow(row).values = [indicator, frequency];
    row++;
  }

  formatSheet(sheet);
}

function addStatistics(sheet: Worksheet, tree: ReportTree): void {
  writeHeading(sheet, 'A1', 'Database Statistics', 14);

  let row = 3;
  writeHeading(sheet, `A${row}`, 'Document Statistics', 12);
  row++;
  for (const [key, value] of Object.entries(tree.appendix.database_statistics)) {
    sheet.getRow(row).values = [titleCase(key), value];
    row++;
  }

  row += 2;
  writeHeading(sheet, `A${row}`, 'Vector Database Statistics', 12);
  row++;
  for (const [key, value] of Object.entries(tree.appendix.vector_db_statistics)) {
    sheet.getRow(row).values = [titleCase(key), value];
    row++;
  }

  formatSheet(sheet);
}

/**
 * Lay the report tree out as a workbook; nothing is written to disk
 */
export function buildWorkbook(tree: ReportTree, reportType: ReportType): Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.creator = 'knowledge-expiry';

  if (reportType === 'executive' || reportType === 'comprehensive') {
    addExecutiveSummary(workbook.addWorksheet('Executive Summary'), tree);
    addCriticalFindings(workbook.addWorksheet('Critical Findings'), tree);
    addActionItems(workbook.addWorksheet('Action Items'), tree);
  }
  if (reportType === 'detailed' || reportType === 'comprehensive') {
    addCriticalPoints(workbook.addWorksheet('All Critical Points'), tree);
    addDocumentAnalysis(workbook.addWorksheet('Document Analysis'), tree);
    addTimeline(workbook.addWorksheet('Timeline Analysis'), tree);
  }
  if (reportType === 'comprehensive') {
    addExpiryAnalysis(workbook.addWorksheet('Expiry Analysis'), tree);
    addStatistics(workbook.addWorksheet('Statistics'), tree);
  }

  return workbook;
}
