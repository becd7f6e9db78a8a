/**
 * Modos de coincidencia de palabras clave del buscador avanzado.
 * Los valores son los que acepta la API (`mode=all|min|exact`).
 */
export enum MatchMode {
  /** Todas las palabras clave deben aparecer */
  ALL = 'all',

  /** Al menos una palabra clave */
  ANY = 'min',

  /** Nombre exacto de la empresa */
  EXACT = 'exact',
}

export const MATCH_MODE_VALUES: MatchMode[] = [MatchMode.ALL, MatchMode.ANY, MatchMode.EXACT];

/** Código numérico del radio `schlagwortOptionen` en el formulario del portal */
export const PORTAL_MATCH_MODE_CODES: Record<MatchMode, number> = {
  [MatchMode.ALL]: 1,
  [MatchMode.ANY]: 2,
  [MatchMode.EXACT]: 3,
};
