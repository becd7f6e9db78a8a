/**
 * Token de inyección para la fábrica de transportes HTTP hacia el portal.
 */
export const PORTAL_TRANSPORT_FACTORY = 'PORTAL_TRANSPORT_FACTORY';

/** Página devuelta por el portal tras seguir redirecciones */
export interface PortalPage {
  /** URL final (después de redirecciones) */
  url: string;
  status: number;
  html: string;
}

/** Envío de formulario ya serializado */
export interface PortalFormSubmission {
  action: string;
  method: 'GET' | 'POST';
  /** Pares nombre/valor en orden de documento (los nombres pueden repetirse) */
  fields: Array<[string, string]>;
}

/**
 * Capacidad de transporte: navegar y enviar formularios manteniendo cookies.
 * Una instancia = una sesión de navegador.
 */
export interface PortalTransportPort {
  get(url: string, signal?: AbortSignal): Promise<PortalPage>;
  submit(submission: PortalFormSubmission, signal?: AbortSignal): Promise<PortalPage>;
}

export interface PortalTransportFactory {
  create(options: { debug: boolean }): PortalTransportPort;
}
