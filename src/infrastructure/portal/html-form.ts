import * as cheerio from 'cheerio';
import { PortalFormSubmission, PortalPage } from '../../domain/ports/portal-transport.port';

/** Resultado de asignar un control: nunca lanza, se agrega como aviso */
export type FieldOutcome =
  | { ok: true; field: string }
  | { ok: false; field: string; reason: 'missing-control' | 'missing-option' };

interface ValueControl {
  kind: 'value';
  name: string;
  value: string;
}

interface CheckableControl {
  kind: 'checkbox' | 'radio';
  name: string;
  value: string;
  checked: boolean;
}

interface SelectControl {
  kind: 'select';
  name: string;
  multiple: boolean;
  options: Array<{ value: string; selected: boolean }>;
}

type FormControl = ValueControl | CheckableControl | SelectControl;

const SKIPPED_INPUT_TYPES = new Set(['submit', 'button', 'image', 'reset', 'file']);

/**
 * Formulario HTML extraído de una página, listo para rellenar y enviar
 * como lo haría un navegador (solo controles "exitosos").
 */
export class HtmlForm {
  private constructor(
    readonly name: string,
    private readonly action: string,
    private readonly method: 'GET' | 'POST',
    private readonly controls: FormControl[],
  ) {}

  /**
   * Busca el formulario por atributo `name` (o `id`) en la página.
   * Devuelve null si no existe.
   */
  static fromPage(page: PortalPage, formName: string): HtmlForm | null {
    const $ = cheerio.load(page.html);
    const form = $('form')
      .filter((_, el) => $(el).attr('name') === formName || $(el).attr('id') === formName)
      .first();
    if (!form.length) return null;

    const action = new URL(form.attr('action') || page.url, page.url).toString();
    const method = (form.attr('method') || 'GET').toUpperCase() === 'POST' ? 'POST' : 'GET';
    const controls: FormControl[] = [];

    for (const el of form.find('input, select, textarea').toArray()) {
      const $el = $(el);
      const name = $el.attr('name');
      if (!name || $el.attr('disabled') !== undefined) continue;

      if (el.tagName === 'select') {
        controls.push({
          kind: 'select',
          name,
          multiple: $el.attr('multiple') !== undefined,
          options: $el
            .find('option')
            .toArray()
            .map((opt) => ({
              value: $(opt).attr('value') ?? $(opt).text().trim(),
              selected: $(opt).attr('selected') !== undefined,
            })),
        });
        continue;
      }

      if (el.tagName === 'textarea') {
        controls.push({ kind: 'value', name, value: $el.text() });
        continue;
      }

      const type = ($el.attr('type') || 'text').toLowerCase();
      if (SKIPPED_INPUT_TYPES.has(type)) continue;

      if (type === 'checkbox' || type === 'radio') {
        controls.push({
          kind: type,
          name,
          value: $el.attr('value') ?? 'on',
          checked: $el.attr('checked') !== undefined,
        });
      } else {
        controls.push({ kind: 'value', name, value: $el.attr('value') ?? '' });
      }
    }

    return new HtmlForm(formName, action, method, controls);
  }

  hasControl(name: string): boolean {
    return this.controls.some((c) => c.name === name);
  }

  /** Inyecta un campo oculto (simula el click de un enlace JSF) */
  addHidden(name: string, value: string): void {
    this.controls.push({ kind: 'value', name, value });
  }

  /**
   * Asigna un valor:
   * - texto/oculto: reemplaza el valor
   * - radio/select: selecciona la opción con ese valor
   * - checkbox: marca la casilla con ese valor ("on" por defecto)
   */
  setValue(name: string, value: string): FieldOutcome {
    const matching = this.controls.filter((c) => c.name === name);
    if (matching.length === 0) {
      return { ok: false, field: name, reason: 'missing-control' };
    }

    const first = matching[0];

    if (first.kind === 'value') {
      first.value = value;
      return { ok: true, field: name };
    }

    if (first.kind === 'select') {
      const option = first.options.find((o) => o.value === value);
      if (!option) return { ok: false, field: name, reason: 'missing-option' };
      if (!first.multiple) first.options.forEach((o) => (o.selected = false));
      option.selected = true;
      return { ok: true, field: name };
    }

    const checkables = matching.filter(
      (c): c is CheckableControl => c.kind === 'checkbox' || c.kind === 'radio',
    );
    const target = checkables.find((c) => c.value === value);
    if (!target) return { ok: false, field: name, reason: 'missing-option' };
    if (target.kind === 'radio') checkables.forEach((c) => (c.checked = false));
    target.checked = true;
    return { ok: true, field: name };
  }

  /** Serializa los controles exitosos en orden de documento */
  toSubmission(): PortalFormSubmission {
    const fields: Array<[string, string]> = [];

    for (const control of this.controls) {
      switch (control.kind) {
        case 'value':
          fields.push([control.name, control.value]);
          break;
        case 'checkbox':
        case 'radio':
          if (control.checked) fields.push([control.name, control.value]);
          break;
        case 'select': {
          const selected = control.options.filter((o) => o.selected);
          // Un select simple sin selección envía su primera opción
          if (selected.length === 0 && !control.multiple && control.options.length > 0) {
            fields.push([control.name, control.options[0].value]);
          }
          for (const option of selected) fields.push([control.name, option.value]);
          break;
        }
      }
    }

    return { action: this.action, method: this.method, fields };
  }
}

/** Título de la página (para logs en modo debug) */
export function pageTitle(page: PortalPage): string {
  return cheerio.load(page.html)('title').first().text().trim();
}
