export type { HttpTransport } from './http-transport.js';
export { UndiciHttpTransport } from './http-transport.js';
export { JSON_MIME_TYPE, mediaType, isMimeType } from './mime.js';
