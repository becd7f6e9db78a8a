import { HtmlForm, pageTitle } from './html-form';

const PAGE_URL = 'https://portal.test/rp_web/page.xhtml';

function page(body: string) {
  return { url: PAGE_URL, status: 200, html: `<html><head><title> Seite </title></head><body>${body}</body></html>` };
}

const FORM = `
  <form name="f" method="post" action="submit.xhtml">
    <input type="hidden" name="state" value="s1" />
    <input type="text" name="q" value="alt" />
    <input type="text" name="off" value="x" disabled />
    <input type="radio" name="mode" value="1" checked />
    <input type="radio" name="mode" value="2" />
    <input type="checkbox" name="flag" />
    <select name="size"><option value="10">10</option><option value="50">50</option></select>
    <input type="submit" name="go" value="Los" />
  </form>`;

describe('HtmlForm', () => {
  it('returns null when the form is missing', () => {
    expect(HtmlForm.fromPage(page(FORM), 'other')).toBeNull();
  });

  it('finds a form by id', () => {
    expect(HtmlForm.fromPage(page('<form id="byId"><input name="a" /></form>'), 'byId')?.hasControl('a')).toBe(true);
  });

  it('serializes successful controls in document order', () => {
    const form = HtmlForm.fromPage(page(FORM), 'f');
    expect(form?.toSubmission()).toEqual({
      action: 'https://portal.test/rp_web/submit.xhtml',
      method: 'POST',
      fields: [
        ['state', 's1'],
        ['q', 'alt'],
        ['mode', '1'],
        ['size', '10'],
      ],
    });
  });

  it('sets text, radio, checkbox and select values', () => {
    const form = HtmlForm.fromPage(page(FORM), 'f');
    if (!form) throw new Error('form not found');

    expect(form.setValue('q', 'Gasag')).toEqual({ ok: true, field: 'q' });
    expect(form.setValue('mode', '2')).toEqual({ ok: true, field: 'mode' });
    expect(form.setValue('flag', 'on')).toEqual({ ok: true, field: 'flag' });
    expect(form.setValue('size', '50')).toEqual({ ok: true, field: 'size' });
    form.addHidden('extra', 'e');

    expect(form.toSubmission().fields).toEqual([
      ['state', 's1'],
      ['q', 'Gasag'],
      ['mode', '2'],
      ['flag', 'on'],
      ['size', '50'],
      ['extra', 'e'],
    ]);
  });

  it('reports missing controls and options without throwing', () => {
    const form = HtmlForm.fromPage(page(FORM), 'f');
    expect(form?.setValue('nope', 'x')).toEqual({ ok: false, field: 'nope', reason: 'missing-control' });
    expect(form?.setValue('mode', '9')).toEqual({ ok: false, field: 'mode', reason: 'missing-option' });
    expect(form?.setValue('size', '25')).toEqual({ ok: false, field: 'size', reason: 'missing-option' });
  });

  it('ignores disabled controls', () => {
    expect(HtmlForm.fromPage(page(FORM), 'f')?.hasControl('off')).toBe(false);
  });

  it('defaults to GET on the page URL', () => {
    const submission = HtmlForm.fromPage(page('<form name="g"><input name="a" value="1" /></form>'), 'g')?.toSubmission();
    expect(submission?.method).toBe('GET');
    expect(submission?.action).toBe(PAGE_URL);
  });
});

describe('pageTitle', () => {
  it('returns the trimmed title', () => {
    expect(pageTitle(page(''))).toBe('Seite');
  });
});
