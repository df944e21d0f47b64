import { existsSync } from "fs";
import { extname } from "path";
import ExcelJS from "exceljs";
import {
  LIBRAIRIES_SOURCE,
  SPREADSHEET_COLUMNS,
  SPREADSHEET_EXTENSIONS,
  type SpreadsheetColumn,
} from "../config/sources";
import { describeError, StructuralImportError } from "./errors";
import { emptyToNull } from "./normalize";
import type { RawLibrairie } from "./types";

export type SpreadsheetCells = Record<SpreadsheetColumn, string | null>;

export type SpreadsheetRow = {
  rowNumber: number;
  cells: SpreadsheetCells;
};

export type FieldError = {
  rowNumber: number;
  field: SpreadsheetColumn;
  value: string | null;
  message: string;
};

export type FileValidation =
  | { ok: true; rows: SpreadsheetRow[]; extraColumns: string[] }
  | { ok: false; error: StructuralImportError };

export type ImportStats = {
  rowsRead: number;
  rowsValid: number;
  rowsInvalid: number;
};

export type ImportResult = {
  records: RawLibrairie[];
  invalid: FieldError[];
  stats: ImportStats;
};

const POSTCODE_PATTERN = /^\d{5}$/;
const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
// Ten digits with the leading 0, or nine when the sheet dropped it.
const PHONE_PATTERNS = [/^0[1-9]\d{8}$/, /^[1-9]\d{8}$/];

const REQUIRED_TEXT: Array<[SpreadsheetColumn, string]> = [
  ["nom_librairie", "library name is missing"],
  ["adresse", "address is missing"],
  ["ville", "city is missing"],
];

const emptyCells = (): SpreadsheetCells => ({
  nom_librairie: null,
  adresse: null,
  code_postal: null,
  ville: null,
  contact_nom: null,
  contact_email: null,
  contact_telephone: null,
  ca_annuel: null,
  date_partenariat: null,
  specialite: null,
});

const formatDate = (value: Date) => value.toISOString().slice(0, 10);

export const cellToText = (value: ExcelJS.CellValue): string | null => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string") {
    return emptyToNull(value);
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (value instanceof Date) {
    return formatDate(value);
  }
  if ("richText" in value) {
    return emptyToNull(value.richText.map((part) => part.text).join(""));
  }
  if ("hyperlink" in value) {
    return emptyToNull(value.text);
  }
  if ("formula" in value || "sharedFormula" in value) {
    return value.result === undefined ? null : cellToText(value.result);
  }
  return null;
};

export const parseRevenue = (value: string | null) => {
  if (!value) {
    return null;
  }
  const parsed = Number(value.replace(/[\s€]/g, "").replace(",", "."));
  return Number.isFinite(parsed) ? parsed : null;
};

export const cleanPhone = (value: string) => value.replace(/[\s.-]/g, "");

export const validateRow = (row: SpreadsheetRow): FieldError[] => {
  const errors: FieldError[] = [];
  const { cells, rowNumber } = row;
  const fail = (field: SpreadsheetColumn, message: string) =>
    errors.push({ rowNumber, field, value: cells[field], message: `row ${rowNumber}: ${message}` });

  for (const [field, message] of REQUIRED_TEXT) {
    if (!cells[field]) {
      fail(field, message);
    }
  }

  const postcode = cells.code_postal;
  if (!postcode || !POSTCODE_PATTERN.test(postcode)) {
    fail("code_postal", `invalid postcode (${postcode ?? "empty"})`);
  }

  const email = cells.contact_email;
  if (email && !EMAIL_PATTERN.test(email)) {
    fail("contact_email", `invalid email (${email})`);
  }

  const phone = cells.contact_telephone;
  if (phone && !PHONE_PATTERNS.some((pattern) => pattern.test(cleanPhone(phone)))) {
    fail("contact_telephone", `invalid phone (${phone})`);
  }

  return errors;
};

const readWorkbook = async (filePath: string) => {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filePath);
  return workbook;
};

/**
 * File-level checks. Any failure here rejects the whole file before a single
 * row is looked at.
 */
export const validateFile = async (filePath: string): Promise<FileValidation> => {
  if (!existsSync(filePath)) {
    return { ok: false, error: new StructuralImportError(filePath, ["file not found"]) };
  }
  const extension = extname(filePath).toLowerCase();
  if (!SPREADSHEET_EXTENSIONS.includes(extension)) {
    return {
      ok: false,
      error: new StructuralImportError(filePath, [
        `unsupported extension "${extension}", expected ${SPREADSHEET_EXTENSIONS.join(", ")}`,
      ]),
    };
  }

  let workbook: ExcelJS.Workbook;
  try {
    workbook = await readWorkbook(filePath);
  } catch (error) {
    return {
      ok: false,
      error: new StructuralImportError(filePath, [`unreadable file (${describeError(error)})`]),
    };
  }

  const [sheet] = workbook.worksheets;
  if (!sheet) {
    return { ok: false, error: new StructuralImportError(filePath, ["no worksheet"]) };
  }

  const columnIndex = new Map<string, number>();
  sheet.getRow(1).eachCell((cell, columnNumber) => {
    const header = cellToText(cell.value)?.toLowerCase();
    if (header) {
      columnIndex.set(header, columnNumber);
    }
  });

  const problems: string[] = [];
  const missing = SPREADSHEET_COLUMNS.filter((column) => !columnIndex.has(column));
  if (missing.length) {
    problems.push(`missing columns: ${missing.join(", ")}`);
  }
  const known = new Set<string>(SPREADSHEET_COLUMNS);
  const extraColumns = [...columnIndex.keys()].filter((header) => !known.has(header));

  const rows: SpreadsheetRow[] = [];
  if (!missing.length) {
    for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber += 1) {
      const sheetRow = sheet.getRow(rowNumber);
      const cells = emptyCells();
      let hasValue = false;
      for (const column of SPREADSHEET_COLUMNS) {
        const index = columnIndex.get(column);
        const text = index ? cellToText(sheetRow.getCell(index).value) : null;
        cells[column] = text;
        hasValue ||= text !== null;
      }
      if (hasValue) {
        rows.push({ rowNumber, cells });
      }
    }
    if (!rows.length) {
      problems.push("file has no data rows");
    }
  }

  if (problems.length) {
    return { ok: false, error: new StructuralImportError(filePath, problems) };
  }
  if (extraColumns.length) {
    console.warn(`[librairies] ignoring extra columns: ${extraColumns.join(", ")}`);
  }
  return { ok: true, rows, extraColumns };
};

export type ImportOptions = {
  batchId: string;
  now?: () => Date;
  signal?: AbortSignal;
};

/**
 * Reads the partner sheet into bronze records. Invalid rows are collected and
 * skipped; a structural problem throws before any row is processed.
 */
export const importFile = async (filePath: string, options: ImportOptions): Promise<ImportResult> => {
  const validation = await validateFile(filePath);
  if (!validation.ok) {
    throw validation.error;
  }

  const now = options.now ?? (() => new Date());
  const stats: ImportStats = { rowsRead: validation.rows.length, rowsValid: 0, rowsInvalid: 0 };
  const invalid: FieldError[] = [];
  const records: RawLibrairie[] = [];

  console.log(`[librairies] rows read: ${stats.rowsRead}`);
  for (const row of validation.rows) {
    options.signal?.throwIfAborted();
    const errors = validateRow(row);
    if (errors.length) {
      stats.rowsInvalid += 1;
      invalid.push(...errors);
      console.warn(`[librairies] row ${row.rowNumber} skipped:`, errors.map((error) => error.message).join("; "));
      continue;
    }

    const { cells } = row;
    records.push({
      name: cells.nom_librairie ?? "",
      address: cells.adresse ?? "",
      postcode: cells.code_postal ?? "",
      city: cells.ville ?? "",
      contactName: cells.contact_nom,
      contactEmail: cells.contact_email,
      contactPhone: cells.contact_telephone,
      annualRevenue: parseRevenue(cells.ca_annuel),
      partnershipDate: cells.date_partenariat,
      specialty: cells.specialite,
      metadata: {
        source: LIBRAIRIES_SOURCE,
        fetchedAt: now(),
        batchId: options.batchId,
        rowNumber: row.rowNumber,
        containsPersonalData: true,
      },
    });
    stats.rowsValid += 1;
  }

  console.log(
    `[librairies] import done: ${stats.rowsValid} valid, ${stats.rowsInvalid} invalid of ${stats.rowsRead}`,
  );
  return { records, invalid, stats };
};
