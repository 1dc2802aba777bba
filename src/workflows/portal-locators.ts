import { byAttribute, byIdPattern, byName, byRole, byText, chain } from "../bot/locators";
import type { FieldHint } from "../bot/field-resolver";

// Section menus, filters and actions of the supplier portal. ExtJS generates
// ids like generic_menu_button-1043-btnEl, so ids are matched by pattern.

const MENU_BUTTON_ID = "^generic_menu_button-.*-btnEl$";

export const REPORT_MENU = chain(
  "Report",
  byText("Report", { tags: ["span"] }),
  byText("Report"),
  byRole("menuitem", "Report"),
);

export const TIMESHEET_MENU = chain(
  "Timesheet",
  byIdPattern(MENU_BUTTON_ID, "Timesheet"),
  byText("Timesheet", { tags: ["span"] }),
  byRole("menuitem", "Timesheet"),
);

export const TIMESHEET_MANAGEMENT_MENU = chain(
  "Gestione Timesheet",
  byIdPattern(MENU_BUTTON_ID, "Gestione Timesheet"),
  byText("Gestione Timesheet", { tags: ["span"] }),
  byText("Gestione Timesheet", { exact: false }),
);

export const ORDER_MENU = chain(
  "Oda",
  byAttribute("class", "x-btn-inner", { match: "contains", text: "Oda" }),
  byText("Oda", { tags: ["span"] }),
  byRole("menuitem", "Oda"),
);

export const TIME_CLOCK_MENU = chain(
  "Timbrature",
  byIdPattern(MENU_BUTTON_ID, "Timbrature"),
  byText("Timbrature", { tags: ["span"] }),
  byRole("tab", "Timbrature"),
  byText("Timbrature", { exact: false }),
);

export const SUPPLIER_TRIGGER = chain(
  "supplier combo",
  byIdPattern("^generic_refresh_combo_box-.*-trigger-picker$"),
  byAttribute("class", "x-form-arrow-trigger", { match: "contains" }),
);

export const SEARCH_BUTTON = chain(
  "Cerca",
  byText("Cerca", { tags: ["span"] }),
  byRole("button", "Cerca"),
);

const EXPORT_ICON = byAttribute("class", "x-tool", { match: "contains" });
const EXPORT_TEXT = byText("Esporta in Excel", { exact: false });
const EXPORT_TITLE = byAttribute("title", "Excel", { match: "contains" });
const EXPORT_ARIA = byAttribute("aria-label", "Excel", { match: "contains" });
const EXPORT_QTIP = byAttribute("data-qtip", "Excel", { match: "contains" });

export const TIMESHEET_EXPORT = chain("export Excel", EXPORT_ICON, EXPORT_TEXT, EXPORT_TITLE);
export const ORDER_EXPORT = chain("Esporta in Excel", EXPORT_TEXT, EXPORT_ICON, EXPORT_TITLE);
export const TIME_CLOCK_EXPORT = chain(
  "export Excel",
  EXPORT_TEXT,
  EXPORT_ICON,
  EXPORT_TITLE,
  EXPORT_ARIA,
  EXPORT_QTIP,
);

export const POPUP_CLOSE = chain("chiudi", byText("Chiudi", { tags: ["span"] }), byText("OK", { tags: ["span"] }));

// Timesheet download
export const TS_DATE_FROM = chain("data timesheet da", byName("DataTimesheetDa"));
export const TS_ORDER_NUMBER = chain("numero OdA", byName("NumeroOda"));
export const TS_ORDER_POSITION = chain("posizione OdA", byName("PosizioneOda"));

// Order details
export const OD_ORDER_NUMBER = chain("numero OdA", byName("NumeroOdA"));
export const OD_CONTRACT = chain("numero contratto", byName("NumeroContratto"));
export const OD_DATE_TO = chain("data creazione a", byName("DataCreazioneA"));
export const OD_SERVICE_DETAIL_FLAG = chain(
  "includi dettaglio prestazioni",
  byName("GetItemServiceInfo"),
  byRole("checkbox", "Includi Dettaglio Prestazioni ODA"),
);

// Time clock
export const TC_DATE_FROM = chain("data da", byName("DataDa"));
export const TC_DATE_TO = chain("data a", byName("DataA"));
export const TC_PRESENCE_FLAG = chain(
  "verifica presenza timesheet",
  byName("VerificaPresenzaTimesheet"),
  byRole("checkbox", "Verifica Presenza Timesheet"),
);

// Timesheet upload
export const UPLOAD_ORDER_FIELD: FieldHint = {
  target: "Numero OdA",
  name: "NumeroOdA",
  label: "Numero OdA",
  valuePattern: /^[A-Z0-9]{1,20}$/,
};
export const EXTRACT_ORDER_BUTTON = chain(
  "Estrai OdA",
  byText("Estrai OdA", { tags: ["span"] }),
  byText("Estrai OdA", { exact: false }),
);
/** Rendered once the extracted order's timesheet form is ready. */
export const UPLOAD_FORM_READY = chain(
  "form timesheet",
  byName("CodiceFiscale"),
  byText("Dettaglio OdA", { exact: false }),
);
export const ORDER_NOT_FOUND_MESSAGE = chain(
  "OdA non trovata",
  byText("non trovat", { exact: false }),
  byText("Nessun OdA", { exact: false }),
);
export const UPLOAD_ATTACHMENT = chain(
  "allegato",
  byAttribute("type", "file"),
  byText("Allega", { tags: ["span"] }),
);
export const UPLOAD_POSITION: FieldHint = {
  target: "Posizione OdA",
  name: "PosizioneOda",
  label: "Posizione",
};
export const UPLOAD_WORK_DATE: FieldHint = {
  target: "Data prestazione",
  name: "DataPrestazione",
  label: "Data",
  valuePattern: /^\d{2}[./]\d{2}[./]\d{4}$/,
};
export const UPLOAD_ENTRY_TIME: FieldHint = {
  target: "Ora ingresso",
  name: "OraIngresso",
  label: "Ingresso",
  valuePattern: /^\d{1,2}:\d{2}$/,
  container: "Orario",
};
export const UPLOAD_EXIT_TIME: FieldHint = {
  target: "Ora uscita",
  name: "OraUscita",
  label: "Uscita",
  valuePattern: /^\d{1,2}:\d{2}$/,
  container: "Orario",
};
export const UPLOAD_SERVICE_TYPE: FieldHint = {
  target: "Tipo prestazione",
  name: "TipoPrestazione",
  label: "Tipo Prestazione",
};
export const UPLOAD_HOURS: FieldHint = {
  target: "Ore",
  name: "Ore",
  label: "Ore",
  valuePattern: /^\d+([.,]\d+)?$/,
};
export const UPLOAD_TAX_CODE = chain(
  "codice fiscale",
  byName("CodiceFiscale"),
  byAttribute("placeholder", "Codice Fiscale", { match: "contains" }),
);
export const SEARCH_WORKER_BUTTON = chain(
  "Cerca risorsa",
  byText("Cerca Risorsa", { tags: ["span"] }),
  byText("Cerca", { tags: ["span"] }),
);
export const CONFIRM_BUTTON = chain(
  "Conferma",
  byText("Conferma", { tags: ["span"] }),
  byRole("button", "Conferma"),
  byText("Salva", { tags: ["span"] }),
);
export const CONFIRMATION_MESSAGE = chain(
  "conferma salvataggio",
  byText("Salvataggio effettuato", { exact: false }),
  byText("Operazione completata", { exact: false }),
  byText("inserito correttamente", { exact: false }),
);

export const isGridRow = (element: { tag: string; classes: string[] }): boolean =>
  element.classes.includes("x-grid-row") ||
  (element.tag === "tr" && element.classes.includes("x-grid-item"));
