export { ComposeQrCommand } from './commands/compose-qr.command.js';
export {
  createComposeQrSchema,
  uploadedMediaSchema,
  type ComposeQrPayload,
  type ValidatedComposeQr,
} from './dto/compose-qr.dto.js';
export { ComposeQrHandler, type ComposeQrHandlerDependencies } from './handlers/compose-qr.handler.js';
export { FormatNormalizer, NORMALIZED_FILE, type StaticSource } from './services/format-normalizer.js';
export {
  FrameReducer,
  OPTIMIZED_FILE,
  type AnimatedSource,
  type ReducedAnimation,
} from './services/frame-reducer.js';
export { deriveOutputName } from './services/output-namer.js';
