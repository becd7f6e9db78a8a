/**
 * Token de inyección para la caché de resultados.
 */
export const RESULT_CACHE_PORT = 'RESULT_CACHE_PORT';

/**
 * Caché de documentos HTML crudos por palabra clave.
 * La clave es el string de búsqueda literal (sensible a mayúsculas) y no
 * incluye modo ni filtro de estados: dos búsquedas con las mismas palabras
 * comparten entrada. Sin expiración ni límite de tamaño.
 */
export interface ResultCachePort {
  /** HTML guardado, o null si no hay entrada */
  get(key: string): Promise<string | null>;

  /** Guarda (o sobrescribe) el HTML de una clave */
  put(key: string, html: string): Promise<void>;
}
