import { StateCode } from '../enums/state-code.enum';
import stateAliases from './state-aliases.json';

/** Nombre oficial en alemán de cada Bundesland */
const STATE_NAMES_DE: Record<StateCode, string> = {
  [StateCode.BW]: 'Baden-Württemberg',
  [StateCode.BY]: 'Bayern',
  [StateCode.BE]: 'Berlin',
  [StateCode.BR]: 'Brandenburg',
  [StateCode.HB]: 'Bremen',
  [StateCode.HH]: 'Hamburg',
  [StateCode.HE]: 'Hessen',
  [StateCode.MV]: 'Mecklenburg-Vorpommern',
  [StateCode.NI]: 'Niedersachsen',
  [StateCode.NW]: 'Nordrhein-Westfalen',
  [StateCode.RP]: 'Rheinland-Pfalz',
  [StateCode.SL]: 'Saarland',
  [StateCode.SN]: 'Sachsen',
  [StateCode.ST]: 'Sachsen-Anhalt',
  [StateCode.SH]: 'Schleswig-Holstein',
  [StateCode.TH]: 'Thüringen',
};

export const STATE_CODES: readonly StateCode[] = Object.values(StateCode);

export interface StateEntry {
  code: StateCode;
  nameDe: string;
}

export function isStateCode(value: string): value is StateCode {
  return (STATE_CODES as readonly string[]).includes(value);
}

/** Alias (alemán / inglés, en minúsculas) → código; cargado desde state-aliases.json */
const ALIASES: ReadonlyMap<string, StateCode> = new Map(
  Object.entries(stateAliases).flatMap(([alias, code]): Array<[string, StateCode]> =>
    isStateCode(code) ? [[alias, code]] : [],
  ),
);

/**
 * Resuelve un nombre (alemán o inglés) o un código a su StateCode.
 * Primero compara contra los códigos, luego contra la tabla de alias.
 * Devuelve null si no hay coincidencia exacta.
 */
export function resolveStateCode(nameOrCode: string): StateCode | null {
  const normalized = nameOrCode.trim().toLowerCase();
  if (!normalized) return null;

  const upper = normalized.toUpperCase();
  if (isStateCode(upper)) return upper;

  return ALIASES.get(normalized) ?? null;
}

export function stateNameDe(code: StateCode): string {
  return STATE_NAMES_DE[code];
}

export function listStates(): StateEntry[] {
  return STATE_CODES.map((code) => ({ code, nameDe: STATE_NAMES_DE[code] }));
}

/** Nombre del checkbox del formulario de búsqueda (sin el prefijo `form:`) */
export function stateFormField(code: StateCode): string {
  return `bundesland${code}`;
}
