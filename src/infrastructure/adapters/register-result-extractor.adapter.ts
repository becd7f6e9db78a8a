import { Injectable, Logger } from '@nestjs/common';
import * as cheerio from 'cheerio';
import { Company, CompanyHistoryEntry } from '../../domain/entities/company.entity';
import { normalizeRegisterNumber } from '../../shared/utils/register-number';

/** Una fila con menos celdas que esto se considera mal formada */
const MIN_RESULT_CELLS = 6;

/** Primera celda del bloque de historial y paso entre entradas */
const HISTORY_START = 8;
const HISTORY_STRIDE = 3;

/** Marca el inicio de la sección de sucursales (fin del historial) */
const BRANCH_MARKERS = ['Branches', 'Niederlassungen'];

type HistoryState = 'ReadingCourtBlock' | 'ReadingHistoryPair' | 'Done';

/**
 * Recorre las celdas de una fila como máquina de estados:
 * ReadingCourtBlock → ReadingHistoryPair → Done.
 * Termina al encontrar una marca de sucursales o al quedar menos de dos celdas.
 */
export function readHistory(cells: string[]): CompanyHistoryEntry[] {
  const history: CompanyHistoryEntry[] = [];
  let state: HistoryState = 'ReadingCourtBlock';
  let index = 0;

  while (state !== 'Done') {
    switch (state) {
      case 'ReadingCourtBlock':
        index = HISTORY_START;
        state = 'ReadingHistoryPair';
        break;

      case 'ReadingHistoryPair': {
        if (index + 1 >= cells.length) {
          state = 'Done';
          break;
        }
        const name = cells[index];
        if (BRANCH_MARKERS.some((marker) => name.includes(marker))) {
          state = 'Done';
          break;
        }
        history.push({ name, location: cells[index + 1] });
        index += HISTORY_STRIDE;
        break;
      }
    }
  }

  return history;
}

/**
 * Extrae las empresas de la página de resultados del portal.
 *
 * La tabla de resultados es la que tiene role="grid"; cada empresa es una
 * fila con el atributo numérico data-ri. Columnas por posición:
 *   1 tribunal + número · 2 nombre · 3 estado · 4 situación · 5 documentos
 *   8.. historial (nombre, sede) cada 3 celdas
 */
@Injectable()
export class RegisterResultExtractor {
  private readonly logger = new Logger(RegisterResultExtractor.name);

  extract(html: string): Company[] {
    const $ = cheerio.load(html);
    const grid = $('table[role="grid"]').first();
    if (!grid.length) return [];

    const companies: Company[] = [];

    for (const row of grid.find('tr').toArray()) {
      const rowIndex = $(row).attr('data-ri');
      if (rowIndex === undefined || !/^\d+$/.test(rowIndex.trim())) continue;

      const cells = $(row)
        .find('td')
        .toArray()
        .map((td) => $(td).text().trim());

      if (cells.length < MIN_RESULT_CELLS) {
        this.logger.debug(
          `Fila ${rowIndex} descartada: ${cells.length} celdas (mín. ${MIN_RESULT_CELLS})`,
        );
        continue;
      }

      companies.push(this.toCompany(cells));
    }

    return companies;
  }

  private toCompany(cells: string[]): Company {
    const court = cells[1];
    const state = cells[3];

    return new Company({
      court,
      registerNumber: normalizeRegisterNumber(court, state),
      name: cells[2],
      state,
      status: cells[4],
      documentsInfo: cells[5],
      history: readHistory(cells),
    });
  }
}
