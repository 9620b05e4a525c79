import { randomUUID } from 'node:crypto';

import type {
  ComposeQrOutcome,
  CompositionStep,
  CompositionStepResult,
  OutcomeWarning,
  PreparedPicture,
  UploadedMedia,
  WorkspaceHandle,
  WorkspaceProvider,
} from '@domain/qr-composition/index.js';
import { ComposeJob, preparedKind, withWorkspace } from '@domain/qr-composition/index.js';

import type { MediaLimits, VersionRange } from '@/shared/config/env.js';
import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';
import { extensionOf } from '@/shared/media/rasterToolkit.js';

import type { ComposeQrCommand } from '../commands/compose-qr.command.js';
import {
  createComposeQrSchema,
  type ComposeQrPayload,
  type ComposeQrSchema,
  type ValidatedComposeQr,
} from '../dto/compose-qr.dto.js';
import type { FormatNormalizer } from '../services/format-normalizer.js';
import type { FrameReducer } from '../services/frame-reducer.js';
import { deriveOutputName } from '../services/output-namer.js';

export interface ComposeQrHandlerDependencies {
  readonly workspaces: WorkspaceProvider;
  readonly composer: CompositionStep;
  readonly normalizer: FormatNormalizer;
  readonly reducer: FrameReducer;
  readonly limits: Pick<MediaLimits, 'maxUploadBytes'>;
  readonly versions: VersionRange;
}

export class ComposeQrHandler {
  private readonly logger = createChildLogger({ module: 'ComposeQrHandler' });

  private readonly schema: ComposeQrSchema;

  public constructor(private readonly deps: ComposeQrHandlerDependencies) {
    this.schema = createComposeQrSchema(deps.versions);
  }

  public async execute(command: ComposeQrCommand, signal?: AbortSignal): Promise<ComposeQrOutcome> {
    const job = ComposeJob.create({ id: randomUUID(), createdAt: new Date() });

    try {
      const payload = this.validate(command.payload);
      job.advance('validated');
      this.throwIfAborted(job, signal);

      const outcome = await withWorkspace(this.deps.workspaces, (workspace) =>
        this.process(job, payload, workspace, signal),
      );

      job.advance('cleaned');
      job.advance('done');

      this.logger.info(
        {
          jobId: job.id,
          fileName: outcome.fileName,
          mediaKind: outcome.mediaKind,
          sizeBytes: outcome.bytes.byteLength,
          warnings: outcome.warnings,
        },
        'QR code generated successfully',
      );

      return outcome;
    } catch (error) {
      const failedAt = job.stage;
      job.fail();
      if (job.stage !== 'cleaned') {
        job.advance('cleaned');
      }

      const appError = AppError.fromUnknown(error, 'qr.unexpected');
      const bindings = { jobId: job.id, stage: failedAt, code: appError.code };

      if (appError.isClientError) {
        this.logger.warn(bindings, appError.message);
      } else {
        this.logger.error({ ...bindings, error }, 'Error generating QR code');
      }

      throw appError;
    }
  }

  private validate(payload: ComposeQrPayload): ValidatedComposeQr {
    const parsed = this.schema.safeParse(payload);

    if (!parsed.success) {
      const [first] = parsed.error.issues;
      throw AppError.validation(
        'qr.invalid-parameter',
        { issues: parsed.error.issues },
        first?.message,
      );
    }

    const { upload } = parsed.data;
    if (upload && upload.bytes.byteLength > this.deps.limits.maxUploadBytes) {
      throw AppError.payloadTooLarge(this.deps.limits.maxUploadBytes, upload.bytes.byteLength);
    }

    return parsed.data;
  }

  private async process(
    job: ComposeJob,
    payload: ValidatedComposeQr,
    workspace: WorkspaceHandle,
    signal?: AbortSignal,
  ): Promise<ComposeQrOutcome> {
    const warnings: OutcomeWarning[] = [];
    let picture: PreparedPicture | undefined;

    if (payload.upload) {
      picture = await this.preparePicture(job, payload.upload, workspace, signal);
      if (picture.outcome === 'passthrough') {
        warnings.push('animation-passthrough');
      } else if (picture.truncatedFrom !== undefined) {
        warnings.push('frames-truncated');
      }
    } else {
      job.advance('no-media');
    }

    this.throwIfAborted(job, signal);

    const saveName = deriveOutputName(payload.text, picture ? preparedKind(picture) : 'static');
    this.logger.info({ jobId: job.id, saveName }, 'Generating QR code');

    const result = await this.compose(payload, picture, saveName, workspace);
    job.advance('composed');
    this.throwIfAborted(job, signal);

    const bytes = await workspace.read(result.outputName);
    job.advance('loaded');

    const animated = result.outputName.toLowerCase().endsWith('.gif');

    return {
      bytes,
      mediaKind: animated ? 'animated' : 'static',
      mimeType: animated ? 'image/gif' : 'image/png',
      fileName: result.outputName,
      versionUsed: result.versionUsed,
      levelUsed: result.levelUsed,
      warnings,
    };
  }

  private async preparePicture(
    job: ComposeJob,
    upload: UploadedMedia,
    workspace: WorkspaceHandle,
    signal?: AbortSignal,
  ): Promise<PreparedPicture> {
    const originalPath = await workspace.write(upload.filename, upload.bytes);
    job.advance('media-materialized');

    this.logger.info(
      { jobId: job.id, filename: upload.filename, sizeBytes: upload.bytes.byteLength },
      'Uploaded file materialized',
    );
    this.throwIfAborted(job, signal);

    const extension = extensionOf(upload.filename);
    const picture =
      extension === 'gif'
        ? await this.deps.reducer.reduce({ bytes: upload.bytes, originalPath }, workspace)
        : await this.deps.normalizer.normalize({ bytes: upload.bytes, extension }, workspace);

    job.advance('normalized');
    return picture;
  }

  private async compose(
    payload: ValidatedComposeQr,
    picture: PreparedPicture | undefined,
    saveName: string,
    workspace: WorkspaceHandle,
  ): Promise<CompositionStepResult> {
    let result: CompositionStepResult;

    try {
      result = await this.deps.composer.compose({
        text: payload.text,
        version: payload.version,
        level: payload.level,
        picturePath: picture?.path,
        colorized: payload.colorized,
        contrast: payload.contrast,
        brightness: payload.brightness,
        saveName,
        saveDir: workspace.directory,
      });
    } catch (error) {
      throw AppError.compositionFailure('qr.composition-failed', error, { saveName });
    }

    if (!(await workspace.exists(result.outputName))) {
      throw AppError.compositionFailure(
        'qr.composition-missing-output',
        new Error('QR code generation failed'),
        { saveName, outputName: result.outputName },
      );
    }

    return result;
  }

  private throwIfAborted(job: ComposeJob, signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw AppError.cancelled(job.stage, signal.reason);
    }
  }
}
