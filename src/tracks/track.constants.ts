/**
 * Tope de bytes que el servidor acepta por archivo.
 * Ningún requisito del catálogo puede superarlo.
 */
export const MAX_UPLOAD_BYTES = 250 * 1024 * 1024;
