import { readHistory, RegisterResultExtractor } from './register-result-extractor.adapter';

function row(index: number | string, cells: string[]): string {
  return `<tr data-ri="${index}">${cells.map((c) => `<td>${c}</td>`).join('')}</tr>`;
}

function grid(rows: string[]): string {
  return `<html><body><table role="grid"><tbody>${rows.join('')}</tbody></table></body></html>`;
}

const BERLIN_ROW = [
  '',
  'Berlin (Charlottenburg) HRB 12345',
  'Muster Energie GmbH',
  'Berlin',
  'aktuell',
  'AD CD HD',
  '',
  '',
];

describe('RegisterResultExtractor', () => {
  const extractor = new RegisterResultExtractor();

  it('maps a row to a company with the Berlin suffix', () => {
    const [company] = extractor.extract(grid([row(0, BERLIN_ROW)]));

    expect(company).toEqual({
      court: 'Berlin (Charlottenburg) HRB 12345',
      registerNumber: 'HRB 12345 B',
      name: 'Muster Energie GmbH',
      state: 'Berlin',
      status: 'aktuell',
      statusNormalized: 'AKTUELL',
      documentsInfo: 'AD CD HD',
      history: [],
    });
  });

  it('adds " HB" to Bremen numbers of any type', () => {
    const companies = extractor.extract(
      grid([row(0, ['', 'Bremen HRA 999', 'Hanse Handel OHG', 'Bremen', 'aktuell', ''])]),
    );
    expect(companies[0].registerNumber).toBe('HRA 999 HB');
  });

  it('does not add a suffix twice', () => {
    const cells = [...BERLIN_ROW];
    cells[1] = 'Berlin (Charlottenburg) HRB 12345 B';
    expect(extractor.extract(grid([row(0, cells)]))[0].registerNumber).toBe('HRB 12345 B');
  });

  it('sets registerNumber to null when the court cell has none', () => {
    const cells = [...BERLIN_ROW];
    cells[1] = 'Amtsgericht Charlottenburg';
    expect(extractor.extract(grid([row(0, cells)]))[0].registerNumber).toBeNull();
  });

  it('normalizes the status', () => {
    const cells = [...BERLIN_ROW];
    cells[4] = 'in Liquidation ';
    const [company] = extractor.extract(grid([row(0, cells)]));
    expect(company.status).toBe('in Liquidation');
    expect(company.statusNormalized).toBe('IN_LIQUIDATION');
  });

  it('reads the history and stops at the branches marker', () => {
    const cells = [
      ...BERLIN_ROW,
      '1.) Alte Muster GmbH', 'Potsdam', '',
      '2.) Muster Werke AG', 'Berlin', '',
      'Niederlassungen', 'Hamburg', '',
    ];
    const [company] = extractor.extract(grid([row(0, cells)]));
    expect(company.history).toEqual([
      { name: '1.) Alte Muster GmbH', location: 'Potsdam' },
      { name: '2.) Muster Werke AG', location: 'Berlin' },
    ]);
  });

  it('returns [] without a results grid', () => {
    expect(extractor.extract('<html><body><p>Keine Treffer</p></body></html>')).toEqual([]);
  });

  it('returns [] for a grid without rows', () => {
    expect(extractor.extract(grid([]))).toEqual([]);
  });

  it('ignores rows without a numeric data-ri', () => {
    const html = grid([
      '<tr><td>Kopf</td><td>Kopf</td><td>Kopf</td><td>Kopf</td><td>Kopf</td><td>Kopf</td></tr>',
      row('x', BERLIN_ROW),
      row(3, BERLIN_ROW),
    ]);
    expect(extractor.extract(html)).toHaveLength(1);
  });

  it('skips rows with fewer than six cells and keeps the rest', () => {
    const html = grid([
      row(0, ['', 'Berlin HRB 1', 'Kurz GmbH']),
      row(1, BERLIN_ROW),
    ]);
    const companies = extractor.extract(html);
    expect(companies).toHaveLength(1);
    expect(companies[0].name).toBe('Muster Energie GmbH');
  });

  it('only reads the first grid', () => {
    const html =
      grid([row(0, BERLIN_ROW)]) +
      '<table role="grid"><tbody>' + row(0, BERLIN_ROW) + row(1, BERLIN_ROW) + '</tbody></table>';
    expect(extractor.extract(html)).toHaveLength(1);
  });
});

describe('readHistory', () => {
  it('emits nothing when fewer than two cells remain', () => {
    expect(readHistory(['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'solo'])).toEqual([]);
  });

  it('steps by three cells', () => {
    const cells = ['0', '1', '2', '3', '4', '5', '6', '7', 'A', 'a', 'x', 'B', 'b'];
    expect(readHistory(cells)).toEqual([
      { name: 'A', location: 'a' },
      { name: 'B', location: 'b' },
    ]);
  });

  it('stops at an English branches marker', () => {
    const cells = ['0', '1', '2', '3', '4', '5', '6', '7', 'Branches', 'Köln', ''];
    expect(readHistory(cells)).toEqual([]);
  });
});
