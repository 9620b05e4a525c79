import {
  ComposeQrHandler,
  FormatNormalizer,
  FrameReducer,
} from '@/application/qr-composition/index.js';
import { QrCompositorService } from '@/infrastructure/qr-composition/index.js';
import { TempWorkspaceProvider } from '@/infrastructure/workspace/index.js';
import type { AppConfig } from '@/shared/config/env.js';

export interface Services {
  readonly handler: ComposeQrHandler;
}

export function createServices(config: AppConfig): Services {
  const { media } = config;

  const handler = new ComposeQrHandler({
    workspaces: new TempWorkspaceProvider(config.workspaceRoot),
    composer: new QrCompositorService({ defaultFrameDelayMs: media.defaultFrameDelayMs }),
    normalizer: new FormatNormalizer(media),
    reducer: new FrameReducer(media),
    limits: media,
    versions: config.versions,
  });

  return { handler };
}
