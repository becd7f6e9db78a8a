import { Logger } from '@nestjs/common';
import {
  PortalPage,
  PortalTransportPort,
} from '../../domain/ports/portal-transport.port';
import { SearchQuery } from '../../domain/entities/search-query.entity';
import {
  PortalConnectionError,
  PortalTransportError,
  UpstreamStructuralError,
} from '../../domain/errors/registry.errors';
import { FieldOutcome, HtmlForm, pageTitle } from './html-form';
import { SEARCH_FORM_NAME, SearchForm } from './search-form';

/** Formulario de navegación (menú superior) del portal */
const NAVI_FORM_NAME = 'naviForm';
const ADVANCED_SEARCH_LINK = `${NAVI_FORM_NAME}:erweiterteSucheLink`;

export interface PortalSearchResult {
  /** HTML crudo de la página de resultados */
  html: string;
  /** Filtros de estado que no se pudieron aplicar */
  warnings: FieldOutcome[];
}

/**
 * Sesión de navegación contra el portal del Handelsregister.
 *
 * Una instancia por búsqueda (cookies propias):
 * 1. open() → página de inicio
 * 2. naviForm + enlace "búsqueda avanzada" (campos ocultos)
 * 3. rellena el formulario de búsqueda (palabras, modo, estados)
 * 4. envía y devuelve el HTML de resultados
 *
 * No escribe en la caché: eso lo hace el orquestador.
 */
export class RegistryPortalSession {
  private readonly logger = new Logger(RegistryPortalSession.name);
  private currentPage: PortalPage | null = null;

  constructor(
    private readonly transport: PortalTransportPort,
    private readonly baseUrl: string,
    private readonly debug: boolean,
  ) {}

  async open(signal?: AbortSignal): Promise<void> {
    try {
      this.currentPage = await this.transport.get(this.baseUrl, signal);
    } catch (err) {
      throw new PortalConnectionError(
        `No se pudo abrir ${this.baseUrl}: ${(err as Error).message}`,
      );
    }
    this.logTitle(this.currentPage);
  }

  async submitSearch(query: SearchQuery, signal?: AbortSignal): Promise<PortalSearchResult> {
    if (!this.currentPage) {
      throw new Error('La sesión no está abierta: llamar a open() antes de submitSearch()');
    }

    // ── Paso 1: "click" en el enlace de búsqueda avanzada ──
    const naviForm = this.requireForm(this.currentPage, NAVI_FORM_NAME);
    naviForm.addHidden(ADVANCED_SEARCH_LINK, ADVANCED_SEARCH_LINK);
    naviForm.addHidden('target', 'erweiterteSucheLink');
    const advancedPage = await this.send(() => this.transport.submit(naviForm.toSubmission(), signal));
    this.logTitle(advancedPage);

    // ── Paso 2: rellenar el formulario de búsqueda ──
    const searchForm = new SearchForm(this.requireForm(advancedPage, SEARCH_FORM_NAME));

    this.requireOutcome(searchForm.setKeywords(query.keywords));
    this.requireOutcome(searchForm.setMatchMode(query.matchMode));

    const warnings = query.stateFilter
      .map((code) => searchForm.setStateFilter(code))
      .filter((outcome) => !outcome.ok);

    if (this.debug) {
      for (const warning of warnings) {
        this.logger.warn(`⚠️  No se pudo aplicar el filtro ${warning.field}`);
      }
    }

    // ── Paso 3: enviar ──
    const resultPage = await this.send(() => this.transport.submit(searchForm.toSubmission(), signal));
    this.logTitle(resultPage);
    this.currentPage = resultPage;

    return { html: resultPage.html, warnings };
  }

  // ──────────────────────────────────────────────────────────
  // Helpers
  // ──────────────────────────────────────────────────────────

  private requireForm(page: PortalPage, formName: string): HtmlForm {
    const form = HtmlForm.fromPage(page, formName);
    if (!form) {
      throw new UpstreamStructuralError(
        `Formulario "${formName}" no encontrado en ${page.url}`,
      );
    }
    return form;
  }

  private requireOutcome(outcome: FieldOutcome): void {
    if (!outcome.ok) {
      throw new UpstreamStructuralError(
        `Control "${outcome.field}" no disponible (${outcome.reason}) en el formulario de búsqueda`,
      );
    }
  }

  private async send(exchange: () => Promise<PortalPage>): Promise<PortalPage> {
    try {
      return await exchange();
    } catch (err) {
      if (err instanceof PortalTransportError) throw err;
      throw new PortalTransportError((err as Error).message);
    }
  }

  private logTitle(page: PortalPage): void {
    if (this.debug) this.logger.debug(`📄 ${pageTitle(page)} (${page.url})`);
  }
}
