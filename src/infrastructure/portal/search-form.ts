import { MatchMode, PORTAL_MATCH_MODE_CODES } from '../../domain/enums/match-mode.enum';
import { StateCode } from '../../domain/enums/state-code.enum';
import { stateFormField } from '../../domain/states/state-registry';
import { FieldOutcome, HtmlForm } from './html-form';

/** Nombre (`name`) del formulario de búsqueda avanzada */
export const SEARCH_FORM_NAME = 'form';

const KEYWORDS_FIELD = `${SEARCH_FORM_NAME}:schlagwoerter`;
const MATCH_MODE_FIELD = `${SEARCH_FORM_NAME}:schlagwortOptionen`;

/**
 * Adaptador tipado sobre el formulario de búsqueda avanzada del portal.
 * Cada setter devuelve un FieldOutcome en lugar de lanzar.
 */
export class SearchForm {
  constructor(private readonly form: HtmlForm) {}

  setKeywords(keywords: string): FieldOutcome {
    return this.form.setValue(KEYWORDS_FIELD, keywords);
  }

  setMatchMode(mode: MatchMode): FieldOutcome {
    return this.form.setValue(MATCH_MODE_FIELD, String(PORTAL_MATCH_MODE_CODES[mode]));
  }

  setStateFilter(code: StateCode): FieldOutcome {
    return this.form.setValue(`${SEARCH_FORM_NAME}:${stateFormField(code)}`, 'on');
  }

  toSubmission() {
    return this.form.toSubmission();
  }
}
