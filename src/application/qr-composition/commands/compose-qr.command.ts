import type { ComposeQrPayload } from '../dto/compose-qr.dto.js';

export class ComposeQrCommand {
  public readonly payload: ComposeQrPayload;

  public constructor(payload: ComposeQrPayload) {
    this.payload = payload;
  }
}
