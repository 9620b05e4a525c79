export { createHttpApp, SERVICE_NAME, type HttpAppDependencies } from './app.js';
export { toHttpError, type HttpErrorResponse } from './error-response.js';
export { parseQrForm, qrFormSchema, type FormFile } from './qr-form.js';
