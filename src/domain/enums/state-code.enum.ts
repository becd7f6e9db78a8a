/**
 * Los 16 Bundesländer con el código de dos letras que usa el portal.
 * El orden de declaración es el orden de `listStates()`.
 */
export enum StateCode {
  BW = 'BW',
  BY = 'BY',
  BE = 'BE',
  BR = 'BR',
  HB = 'HB',
  HH = 'HH',
  HE = 'HE',
  MV = 'MV',
  NI = 'NI',
  NW = 'NW',
  RP = 'RP',
  SL = 'SL',
  SN = 'SN',
  ST = 'ST',
  SH = 'SH',
  TH = 'TH',
}
