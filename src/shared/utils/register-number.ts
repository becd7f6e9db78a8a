/**
 * Detección y normalización del número de registro (HRA, HRB, GnR, VR, PR).
 *
 * El portal muestra el tribunal y el número en la misma celda
 * ("Berlin (Charlottenburg) HRB 12345"). Algunos estados usan un sufijo
 * implícito que no siempre aparece en el texto.
 */

const REGISTER_NUMBER_PATTERN = /(HRA|HRB|GnR|VR|PR)\s*\d+(\s+[A-Z])?(?!\w)/;

/** Sufijos por estado (tal como lo escribe el portal) y tipo de registro */
const STATE_SUFFIXES: Record<string, Record<string, string>> = {
  Berlin: { HRB: ' B' },
  Bremen: { HRA: ' HB', HRB: ' HB', GnR: ' HB', VR: ' HB', PR: ' HB' },
};

export interface RegisterNumberMatch {
  /** Texto detectado, p. ej. "HRB 12345" */
  value: string;
  /** Tipo de registro: HRA, HRB, GnR, VR o PR */
  type: string;
}

export function findRegisterNumber(courtText: string): RegisterNumberMatch | null {
  const match = REGISTER_NUMBER_PATTERN.exec(courtText);
  if (!match) return null;
  return { value: match[0], type: match[1] };
}

/** Añade el sufijo del estado si corresponde y no está ya al final */
export function applyStateSuffix(registerNumber: RegisterNumberMatch, state: string): string {
  const suffix = STATE_SUFFIXES[state]?.[registerNumber.type];
  if (suffix && !registerNumber.value.endsWith(suffix)) {
    return registerNumber.value + suffix;
  }
  return registerNumber.value;
}

export function normalizeRegisterNumber(courtText: string, state: string): string | null {
  const found = findRegisterNumber(courtText);
  return found ? applyStateSuffix(found, state) : null;
}
