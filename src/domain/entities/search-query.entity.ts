import { MatchMode } from '../enums/match-mode.enum';
import { StateCode } from '../enums/state-code.enum';

/**
 * Parámetros de una búsqueda ya validados.
 * `keywords` es también la clave de caché: se usa tal cual, sin normalizar.
 */
export interface SearchQuery {
  keywords: string;
  matchMode: MatchMode;
  stateFilter: StateCode[];
  /** Ignorar la caché y volver a consultar el portal (sobrescribe la entrada) */
  bypassCache: boolean;
  /** Log detallado del intercambio con el portal */
  debug: boolean;
}
