import * as XLSX from 'xlsx';
import { describe, expect, test } from 'vitest';
import { normalizeReportDate, normalizeReportTime, parseTimeClockReport } from './time-clock-report';

function buildExcelBuffer(rows: Record<string, unknown>[]): Buffer {
  const wb = XLSX.utils.book_new();
  const ws = XLSX.utils.json_to_sheet(rows);
  XLSX.utils.book_append_sheet(wb, ws, 'Timbrature');
  return Buffer.from(XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' }));
}

const row = (overrides: Record<string, unknown> = {}) => ({
  'Data Timbratura': '03/02/2025',
  'Ora Ingresso': '07:58',
  'Ora Uscita': '17:02',
  'Nome Risorsa': 'Mario',
  'Cognome Risorsa': 'Rossi',
  'Presente Nei Timesheet': 'SI',
  'Sito Timbratura': 'Cantiere Nord',
  Badge: '0042',
  ...overrides,
});

describe('parseTimeClockReport', () => {
  test('maps the report columns to records', () => {
    const result = parseTimeClockReport(buildExcelBuffer([row()]));

    expect(result).toEqual({
      records: [
        {
          data: '2025-02-03',
          ingresso: '07:58',
          uscita: '17:02',
          nome: 'Mario',
          cognome: 'Rossi',
          presenza_ts: 'SI',
          sito_timbratura: 'Cantiere Nord',
        },
      ],
      totalRows: 1,
      duplicates: 0,
      missingColumns: [],
    });
  });

  test('drops repeated badge records', () => {
    const result = parseTimeClockReport(
      buildExcelBuffer([row(), row({ 'Sito Timbratura': 'Cantiere Sud' }), row({ 'Ora Ingresso': '13:00' })]),
    );

    expect(result.totalRows).toBe(3);
    expect(result.duplicates).toBe(1);
    expect(result.records.map((r) => r.ingresso)).toEqual(['07:58', '13:00']);
  });

  test('matches headers with surrounding spaces', () => {
    const { 'Nome Risorsa': nome, ...rest } = row();
    const result = parseTimeClockReport(buildExcelBuffer([{ ...rest, ' Nome Risorsa ': nome }]));

    expect(result.missingColumns).toEqual([]);
    expect(result.records[0].nome).toBe('Mario');
  });

  test('reads date and time cells stored as numbers', () => {
    const ws = XLSX.utils.json_to_sheet([row()]);
    ws['A2'] = { t: 'n', v: 45691, z: 'dd/mm/yyyy' };
    ws['B2'] = { t: 'n', v: 0.3319, z: 'hh:mm' };
    ws['C2'] = { t: 'n', v: 1022 / 1440, z: 'hh:mm' };
    const wb = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(wb, ws, 'Timbrature');

    const result = parseTimeClockReport(Buffer.from(XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' })));

    expect(result.records[0]).toMatchObject({
      data: '2025-02-03',
      ingresso: '07:58',
      uscita: '17:02',
    });
  });

  test('reports missing columns and returns no records', () => {
    const { 'Sito Timbratura': _site, 'Ora Uscita': _exit, ...rest } = row();
    const result = parseTimeClockReport(buildExcelBuffer([rest]));

    expect(result.records).toEqual([]);
    expect(result.missingColumns).toEqual(['Ora Uscita', 'Sito Timbratura']);
  });
});

describe('normalizeReportDate', () => {
  test.each([
    ['03/02/2025', '2025-02-03'],
    ['3.2.2025', '2025-02-03'],
    ['2025-02-03T00:00:00', '2025-02-03'],
    [45658, '2025-01-01'],
    ['n.d.', 'n.d.'],
  ])('%s -> %s', (input, expected) => {
    expect(normalizeReportDate(input)).toBe(expected);
  });
});

describe('normalizeReportTime', () => {
  test.each([
    [0.3319, '07:58'],
    [45691.5, '12:00'],
    [0.99999, '00:00'],
    [' 07:58 ', '07:58'],
    ['', ''],
  ])('%s -> %s', (input, expected) => {
    expect(normalizeReportTime(input)).toBe(expected);
  });
});
