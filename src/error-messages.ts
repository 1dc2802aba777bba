import type { OutcomeCode } from "./types";
import type { FatalReason } from "./errors";

/**
 * Messaggi in italiano per gli esiti mostrati all'utente
 */
export const OUTCOME_MESSAGES: Record<OutcomeCode, string> = {
  success: "Operazione completata",
  confirmed: "Inserimento confermato",
  "missing-identifier": "Identificativo mancante, riga saltata",
  "invalid-input": "Dati della riga non validi",
  "identifier-not-found": "Identificativo non trovato sul portale",
  "field-not-found": "Campo non trovato nella pagina",
  "field-not-fillable": "Campo non compilabile",
  "no-match": "Nessun risultato corrispondente",
  "ambiguous-match": "Più risultati corrispondenti, selezione ambigua",
  "confirmation-failed": "Conferma non riuscita",
  "download-timeout": "Timeout durante il download del file",
  "download-skipped": "Download scartato su richiesta dell'utente",
  "overlay-timeout": "Il portale non ha terminato il caricamento",
  "navigation-failed": "Navigazione non riuscita",
  "unexpected-error": "Errore imprevisto",
};

export const FATAL_MESSAGES: Record<FatalReason, string> = {
  "auth-exhausted": "Login fallito dopo tutti i tentativi",
  "session-create-failed": "Impossibile avviare il browser",
  "profile-locked": "Profilo browser già in uso da un'altra sessione",
  "session-lost": "Sessione persa e non recuperabile",
  "setup-failed": "Impossibile preparare la sezione del portale",
};

export function formatOutcome(code: OutcomeCode, detail: string): string {
  const base = OUTCOME_MESSAGES[code];
  return detail ? `${base}: ${detail}` : base;
}
