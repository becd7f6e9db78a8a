/**
 * Nombre anterior de la empresa y la sede registrada con ese nombre.
 */
export interface CompanyHistoryEntry {
  name: string;
  location: string;
}

/**
 * Una fila de resultados del Handelsregister.
 * Entidad de dominio, no depende de frameworks.
 */
export class Company {
  /** Tribunal de registro + número tal como lo muestra el portal */
  court: string;

  /** Número de registro normalizado (p. ej. "HRB 12345 B"), o null si no se detecta */
  registerNumber: string | null;

  name: string;

  /** Bundesland tal como lo muestra el portal (texto libre) */
  state: string;

  /** Estado registral original ("aktuell", "in Liquidation", ...) */
  status: string;

  /** Estado en mayúsculas con espacios → "_" ("IN_LIQUIDATION") */
  statusNormalized: string;

  /** Texto de la columna de documentos (sin descargar nada) */
  documentsInfo: string;

  /** Nombres y sedes anteriores, en el orden del portal */
  history: CompanyHistoryEntry[];

  constructor(params: {
    court: string;
    registerNumber: string | null;
    name: string;
    state: string;
    status: string;
    documentsInfo: string;
    history: CompanyHistoryEntry[];
  }) {
    this.court = params.court;
    this.registerNumber = params.registerNumber;
    this.name = params.name;
    this.state = params.state;
    this.status = params.status.trim();
    this.statusNormalized = normalizeStatus(params.status);
    this.documentsInfo = params.documentsInfo;
    this.history = params.history;
  }
}

export function normalizeStatus(status: string): string {
  return status.trim().toUpperCase().replace(/ /g, '_');
}
