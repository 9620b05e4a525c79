export { createSymbol, QrCompositorService, type QrCompositorOptions } from './qr-compositor.service.js';
export { MODULE_PIXELS, QUIET_ZONE_MODULES, renderSymbol, type ModuleMatrix } from './symbol-renderer.js';
