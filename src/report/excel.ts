/**
 * XLSX report writer for Creative Work Reports
 *
 * Layout of the CreativeTime sheet: header in rows 1-4, column titles on row 6,
 * then three rows per project starting at row 7, then a Notes block.
 */

import { Workbook, type Worksheet } from 'exceljs';
import type { ReportHeader, ReportRow, RunAnnotations } from '../domain/models';

export const SHEET_NAME = 'CreativeTime';
export const FIRST_PROJECT_ROW = 7;
export const ROWS_PER_PROJECT = 3;

const COLUMN_TITLES = [
  'No.',
  'Project Name',
  'Creative Works Details',
  'Liability Calculation',
  'Value',
  'Final Liability',
  'Approver / Date of Approval',
  'Technical Summary',
];

const COLUMN_WIDTHS = [8, 28, 60, 36, 12, 16, 28, 48];

/** Columns spanning all three rows of a project entry: A, B, C, F, H */
const MERGED_COLUMNS = [1, 2, 3, 6, 8];

export class ReportWriteError extends Error {
  constructor(
    message: string,
    public outputPath: string,
  ) {
    super(message);
    this.name = 'ReportWriteError';
  }
}

export interface ReportWriter {
  write(
    rows: readonly ReportRow[],
    header: ReportHeader,
    annotations: RunAnnotations,
    outputPath: string
  ): Promise<void>;
}

export interface ExcelReportWriterOptions {
  /** Existing workbook with a CreativeTime sheet to fill instead of the built-in layout */
  templatePath?: string;
  /** Default CTD allocation written for every project */
  ctdAllocation?: number;
}

/**
 * Format a date as DD MM YYYY
 */
export function formatReportDate(year: number, month: number, day: number): string {
  return `${String(day).padStart(2, '0')} ${String(month).padStart(2, '0')} ${year}`;
}

function describeSkipped(label: string, names: readonly string[]): string {
  return names.length > 0
    ? `${label}: ${names.length} (${names.join(', ')})`
    : `${label}: 0`;
}

/**
 * Lines written in the Notes block below the projects
 */
export function buildNotes(annotations: RunAnnotations): string[] {
  return [
    `Total commits: ${annotations.totalCommits}`,
    `Unlinked commits (no ticket key): ${annotations.unlinkedCommits}`,
    describeSkipped('Unresolved ticket keys', annotations.unresolvedTicketKeys),
    describeSkipped('Skipped organizations', annotations.skippedOrganizations.map((s) => s.name)),
    describeSkipped('Skipped repositories', annotations.skippedRepositories.map((s) => s.name)),
    `Summaries: ${annotations.summaryStrategy === 'model' ? 'language model' : 'rule-based'}`,
  ];
}

function buildDefaultLayout(workbook: Workbook): Worksheet {
  const sheet = workbook.addWorksheet(SHEET_NAME);

  sheet.getCell('A1').value = 'Creative Work Report';
  sheet.getCell('A1').font = { bold: true, size: 14 };
  sheet.getCell('C4').value = 'Report Period';
  sheet.getCell('C4').font = { bold: true };
  sheet.getCell('E4').value = 'to';

  COLUMN_TITLES.forEach((title, index) => {
    const cell = sheet.getCell(6, index + 1);
    cell.value = title;
    cell.font = { bold: true };
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFD9E1F2' } };
    cell.alignment = { wrapText: true, vertical: 'middle' };
  });

  COLUMN_WIDTHS.forEach((width, index) => {
    sheet.getColumn(index + 1).width = width;
  });

  return sheet;
}

export class ExcelReportWriter implements ReportWriter {
  private templatePath?: string;
  private ctdAllocation: number;

  constructor(options: ExcelReportWriterOptions = {}) {
    this.templatePath = options.templatePath;
    this.ctdAllocation = options.ctdAllocation ?? 0.75;
  }

  /**
   * Load the template sheet, or build the default layout
   */
  private async loadSheet(workbook: Workbook): Promise<Worksheet> {
    if (!this.templatePath) {
      return buildDefaultLayout(workbook);
    }

    await workbook.xlsx.readFile(this.templatePath);
    const sheet = workbook.getWorksheet(SHEET_NAME);
    if (!sheet) {
      throw new Error(`Template ${this.templatePath} has no "${SHEET_NAME}" sheet`);
    }
    return sheet;
  }

  private populateHeader(sheet: Worksheet, header: ReportHeader): void {
    sheet.getCell('A2').value = header.employeeName;
    sheet.getCell('A3').value = header.companyName;
    sheet.getCell('D4').value = formatReportDate(header.year, 1, 1);
    sheet.getCell('F4').value = formatReportDate(header.year, 12, 31);
  }

  private fillProject(sheet: Worksheet, row: number, entry: ReportRow): void {
    // Template rows may already be merged; merged cells other than the
    // top-left one cannot be written
    sheet.unMergeCells(row, 1, row + ROWS_PER_PROJECT - 1, 8);

    sheet.getCell(row, 1).value = entry.projectNumber;
    sheet.getCell(row, 2).value = entry.projectName;
    sheet.getCell(row, 3).value = entry.creativeWorkDescription;
    sheet.getCell(row, 4).value = 'Contracted Time for Project';
    sheet.getCell(row, 5).value = entry.timeAllocation;
    sheet.getCell(row, 6).value = { formula: `(E${row}-E${row + 1})*E${row + 2}`, date1904: false };
    sheet.getCell(row, 7).value = 'Name of Approver';
    sheet.getCell(row, 8).value = entry.technicalSummary;

    sheet.getCell(row + 1, 4).value = 'Non-Creative Time Spent on Project';

    sheet.getCell(row + 2, 4).value = 'CTD allocation per EA Addendum';
    sheet.getCell(row + 2, 5).value = this.ctdAllocation;
    sheet.getCell(row + 2, 7).value = 'Double click for Date';

    for (const column of MERGED_COLUMNS) {
      sheet.mergeCells(row, column, row + ROWS_PER_PROJECT - 1, column);
      sheet.getCell(row, column).alignment = { wrapText: true, vertical: 'top', horizontal: 'left' };
    }
  }

  private writeNotes(sheet: Worksheet, startRow: number, annotations: RunAnnotations): void {
    sheet.getCell(startRow, 1).value = 'Notes';
    sheet.getCell(startRow, 1).font = { bold: true };

    buildNotes(annotations).forEach((line, index) => {
      sheet.getCell(startRow + index + 1, 2).value = line;
    });
  }

  /**
   * Build the workbook in memory
   */
  async buildWorkbook(
    rows: readonly ReportRow[],
    header: ReportHeader,
    annotations: RunAnnotations
  ): Promise<Workbook> {
    const workbook = new Workbook();
    workbook.creator = 'creative-report';
    const sheet = await this.loadSheet(workbook);

    this.populateHeader(sheet, header);

    let row = FIRST_PROJECT_ROW;
    for (const entry of rows) {
      this.fillProject(sheet, row, entry);
      row += ROWS_PER_PROJECT;
    }

    this.writeNotes(sheet, row + 1, annotations);
    return workbook;
  }

  async write(
    rows: readonly ReportRow[],
    header: ReportHeader,
    annotations: RunAnnotations,
    outputPath: string
  ): Promise<void> {
    try {
      const workbook = await this.buildWorkbook(rows, header, annotations);
      await workbook.xlsx.writeFile(outputPath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ReportWriteError(`Could not write report to ${outputPath}: ${message}`, outputPath);
    }
  }
}
