import * as XLSX from "xlsx";

/** One badge record of the time-clock report, with the date as YYYY-MM-DD. */
export type TimeClockRecord = {
  data: string;
  ingresso: string;
  uscita: string;
  nome: string;
  cognome: string;
  presenza_ts: string;
  sito_timbratura: string;
};

export type TimeClockParseResult = {
  records: TimeClockRecord[];
  totalRows: number;
  duplicates: number;
  missingColumns: string[];
};

export const TIME_CLOCK_COLUMNS: Record<string, keyof TimeClockRecord> = {
  "Data Timbratura": "data",
  "Ora Ingresso": "ingresso",
  "Ora Uscita": "uscita",
  "Nome Risorsa": "nome",
  "Cognome Risorsa": "cognome",
  "Presente Nei Timesheet": "presenza_ts",
  "Sito Timbratura": "sito_timbratura",
};

const EXCEL_EPOCH_MS = Date.UTC(1899, 11, 30);
const DAY_MS = 86_400_000;

const pad = (value: number) => String(value).padStart(2, "0");

export function normalizeReportDate(value: unknown): string {
  if (value instanceof Date) {
    return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
  }
  if (typeof value === "number") {
    // Excel serial day count from 1899-12-30
    const date = new Date(EXCEL_EPOCH_MS + Math.floor(value) * DAY_MS);
    return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
  }
  const text = String(value ?? "").trim();
  const italian = /^(\d{1,2})[./-](\d{1,2})[./-](\d{4})/.exec(text);
  if (italian) {
    return `${italian[3]}-${pad(Number(italian[2]))}-${pad(Number(italian[1]))}`;
  }
  const iso = /^(\d{4})-(\d{2})-(\d{2})/.exec(text);
  return iso ? `${iso[1]}-${iso[2]}-${iso[3]}` : text;
}

/** Time cells come as day fractions; text cells are kept as written. */
export function normalizeReportTime(value: unknown): string {
  if (value instanceof Date) {
    const minutes = value.getHours() * 60 + value.getMinutes() + Math.round(value.getSeconds() / 60);
    return `${pad(Math.floor(minutes / 60) % 24)}:${pad(minutes % 60)}`;
  }
  if (typeof value === "number") {
    const minutes = Math.round((value - Math.floor(value)) * 1440) % 1440;
    return `${pad(Math.floor(minutes / 60))}:${pad(minutes % 60)}`;
  }
  return cellText(value);
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value).trim();
}

/**
 * Reads the first sheet of the exported report. Headers are matched after
 * trimming; rows repeating (data, ingresso, uscita, nome, cognome) are dropped.
 */
export function parseTimeClockReport(buffer: Buffer): TimeClockParseResult {
  const workbook = XLSX.read(buffer, { type: "buffer" });
  const sheetName = workbook.SheetNames[0];
  const requiredColumns = Object.keys(TIME_CLOCK_COLUMNS);
  if (!sheetName) {
    return { records: [], totalRows: 0, duplicates: 0, missingColumns: requiredColumns };
  }

  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(
    workbook.Sheets[sheetName],
    { defval: "" },
  );
  const headerRow = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName], {
    header: 1,
  })[0];
  const headers = new Map<string, string>();
  for (const raw of headerRow ?? []) {
    const header = cellText(raw);
    if (header) headers.set(header, String(raw));
  }

  const missingColumns = requiredColumns.filter((column) => !headers.has(column));
  if (missingColumns.length > 0) {
    return { records: [], totalRows: rows.length, duplicates: 0, missingColumns };
  }

  const records: TimeClockRecord[] = [];
  const seen = new Set<string>();
  let duplicates = 0;

  for (const row of rows) {
    const value = (column: string) => {
      const raw = headers.get(column);
      return raw !== undefined && raw in row ? row[raw] : row[column];
    };
    const record: TimeClockRecord = {
      data: normalizeReportDate(value("Data Timbratura")),
      ingresso: normalizeReportTime(value("Ora Ingresso")),
      uscita: normalizeReportTime(value("Ora Uscita")),
      nome: cellText(value("Nome Risorsa")),
      cognome: cellText(value("Cognome Risorsa")),
      presenza_ts: cellText(value("Presente Nei Timesheet")),
      sito_timbratura: cellText(value("Sito Timbratura")),
    };

    const key = [record.data, record.ingresso, record.uscita, record.nome, record.cognome].join("|");
    if (seen.has(key)) {
      duplicates++;
      continue;
    }
    seen.add(key);
    records.push(record);
  }

  return { records, totalRows: rows.length, duplicates, missingColumns: [] };
}
