/**
 * Errores operacionales del servicio.
 * Cada uno lleva su código HTTP; el filtro global los serializa
 * como `{ statusCode, error, message, ... }`.
 */
export abstract class RegistryError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RequestValidationError extends RegistryError {
  readonly statusCode = 400;
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    readonly validValues?: string[],
  ) {
    super(message);
  }
}

export class StateNotFoundError extends RegistryError {
  readonly statusCode = 404;
  readonly code = 'NOT_FOUND';
  readonly hint =
    'Try German names (e.g., "Berlin", "Bayern") or English names (e.g., "Bavaria", "North Rhine-Westphalia")';

  constructor(readonly input: string) {
    super(`Unknown district name: ${input}`);
  }
}

export class PipelineTimeoutError extends RegistryError {
  readonly statusCode = 504;
  readonly code = 'TIMEOUT';

  constructor(readonly timeoutSeconds: number) {
    super(`Request exceeded timeout of ${timeoutSeconds} seconds`);
  }
}

/** El portal cambió su formulario: falta un control imprescindible */
export class UpstreamStructuralError extends RegistryError {
  readonly statusCode = 500;
  readonly code = 'UPSTREAM_STRUCTURE_CHANGED';
}

/** No se pudo cargar la página de inicio del portal */
export class PortalConnectionError extends RegistryError {
  readonly statusCode = 502;
  readonly code = 'PORTAL_UNREACHABLE';
}

/** Fallo de red / HTTP durante un envío de formulario */
export class PortalTransportError extends RegistryError {
  readonly statusCode = 502;
  readonly code = 'PORTAL_TRANSPORT_ERROR';

  constructor(
    message: string,
    readonly httpStatus?: number,
  ) {
    super(message);
  }
}
