import { z } from "zod";
import { config } from "./config";

const ORDER_NUMBER_PATTERN = /^[A-Z0-9]{1,20}$/;
const TAX_CODE_PATTERN = /^[A-Z]{6}[0-9]{2}[A-Z][0-9]{2}[A-Z][0-9]{3}[A-Z]$/;
const DATE_IT_PATTERN = /^(0[1-9]|[12][0-9]|3[01])\.(0[1-9]|1[012])\.(19|20)\d\d$/;
const TIME_PATTERN = /^([01]?[0-9]|2[0-3]):[0-5][0-9]$/;

// Valori per le posizioni dispari (1-indexed) del codice fiscale
const TAX_CODE_ODD_VALUES: Record<string, number> = {
  "0": 1, "1": 0, "2": 5, "3": 7, "4": 9, "5": 13, "6": 15, "7": 17, "8": 19, "9": 21,
  A: 1, B: 0, C: 5, D: 7, E: 9, F: 13, G: 15, H: 17, I: 19, J: 21,
  K: 2, L: 4, M: 18, N: 20, O: 11, P: 3, Q: 6, R: 8, S: 12, T: 14,
  U: 16, V: 10, W: 22, X: 25, Y: 24, Z: 23,
};

function taxCodeEvenValue(char: string): number {
  if (char >= "0" && char <= "9") return char.charCodeAt(0) - 48;
  return char.charCodeAt(0) - 65;
}

export function hasValidTaxCodeChecksum(taxCode: string): boolean {
  let total = 0;
  for (let i = 0; i < 15; i++) {
    const char = taxCode[i] ?? "";
    total += i % 2 === 0 ? (TAX_CODE_ODD_VALUES[char] ?? 0) : taxCodeEvenValue(char);
  }
  return taxCode[15] === String.fromCharCode(65 + (total % 26));
}

export function isExistingItalianDate(value: string): boolean {
  const [day, month, year] = value.split(".").map((part) => parseInt(part, 10));
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export const orderNumberSchema = z
  .string()
  .trim()
  .toUpperCase()
  .max(20, "Numero OdA troppo lungo (max 20 caratteri)")
  .regex(ORDER_NUMBER_PATTERN, "Numero OdA contiene caratteri non validi");

export const taxCodeSchema = z
  .string()
  .trim()
  .toUpperCase()
  .length(16, "Codice Fiscale deve essere di 16 caratteri")
  .regex(TAX_CODE_PATTERN, "Formato Codice Fiscale non valido")
  .refine(hasValidTaxCodeChecksum, "Checksum Codice Fiscale non valido");

export const italianDateSchema = z
  .string()
  .trim()
  .transform((value) => value.replace(/\//g, "."))
  .pipe(
    z
      .string()
      .regex(DATE_IT_PATTERN, "Formato data non valido (usa GG.MM.AAAA)")
      .refine(isExistingItalianDate, "Data non esistente"),
  );

export const timeSchema = z
  .string()
  .trim()
  .regex(TIME_PATTERN, "Formato ora non valido (usa HH:MM)");

export const timesheetDownloadFieldsSchema = z.object({
  orderNumber: orderNumberSchema,
  position: z.string().trim().max(10).default(""),
});

export const timesheetUploadFieldsSchema = z.object({
  orderNumber: orderNumberSchema,
  position: z.string().trim().max(10).default(""),
  taxCode: taxCodeSchema,
  workDate: italianDateSchema,
  entryTime: timeSchema.optional(),
  exitTime: timeSchema.optional(),
  serviceType: z.string().trim().optional(),
  hours: z.string().trim().optional(),
  attachmentPath: z.string().trim().min(1).optional(),
});

export const orderDetailsFieldsSchema = z.object({
  orderNumber: z.union([z.literal(""), orderNumberSchema]).default(""),
  contractNumber: z.string().trim().default(""),
});

export const timeClockFieldsSchema = z.object({
  dateFrom: italianDateSchema,
  dateTo: italianDateSchema,
  supplier: z.string().trim().optional(),
});

export const botConfigSchema = z.object({
  portalUrl: z.string().url().default(config.portal.url),
  headless: z.boolean().default(config.browser.headless),
  operationTimeoutSeconds: z
    .number()
    .int()
    .positive()
    .default(config.run.operationTimeoutSeconds),
  downloadDirectory: z.string().min(1).default(config.run.downloadDirectory),
  profileDirectory: z.string().min(1).default(config.browser.profileDirectory),
  cacheDirectory: z.string().default(config.browser.cacheDirectory),
  collisionMode: z
    .enum(["suffix", "interactive"])
    .default(config.run.collisionMode),
  logoutOnFinish: z.boolean().default(config.run.logoutOnFinish),
  loginRetryDelayMs: z
    .number()
    .int()
    .nonnegative()
    .default(config.run.loginRetryDelayMs),
  supplier: z.string().default(config.portal.supplier),
  dateFrom: z.string().default(""),
  dateTo: z.string().default(""),
  contractNumber: z.string().default(""),
  discardTimeClockReport: z.boolean().default(true),
});

export type BotConfigInput = z.input<typeof botConfigSchema>;
export type BotConfig = z.output<typeof botConfigSchema>;

export function parseBotConfig(input: BotConfigInput = {}): BotConfig {
  return botConfigSchema.parse(input);
}

export type TimesheetDownloadInput = z.input<typeof timesheetDownloadFieldsSchema>;
export type TimesheetUploadInput = z.input<typeof timesheetUploadFieldsSchema>;
export type OrderDetailsInput = z.input<typeof orderDetailsFieldsSchema>;
export type TimeClockInput = z.input<typeof timeClockFieldsSchema>;

export type TimesheetDownloadFields = z.output<typeof timesheetDownloadFieldsSchema>;
export type TimesheetUploadFields = z.output<typeof timesheetUploadFieldsSchema>;
export type OrderDetailsFields = z.output<typeof orderDetailsFieldsSchema>;
export type TimeClockFields = z.output<typeof timeClockFieldsSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}
