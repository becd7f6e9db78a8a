import { SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_ROUTE = 'isPublicRoute';

/**
 * Endpoint sin token de servicio (salud, documentación, emisión de tokens,
 * consulta de estados). Uso: @Public() encima del handler.
 */
export const Public = () => SetMetadata(IS_PUBLIC_ROUTE, true);
