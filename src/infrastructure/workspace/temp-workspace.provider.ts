import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import type { WorkspaceHandle, WorkspaceProvider } from '@domain/qr-composition/index.js';

import { createChildLogger } from '@/shared/logger/pino.js';

const DIRECTORY_PREFIX = 'qr-';

export class TempWorkspaceProvider implements WorkspaceProvider {
  private readonly logger = createChildLogger({ module: 'TempWorkspaceProvider' });

  public constructor(private readonly root: string) {}

  public async acquire(): Promise<WorkspaceHandle> {
    await fs.mkdir(this.root, { recursive: true });
    const directory = await fs.mkdtemp(path.join(this.root, DIRECTORY_PREFIX));
    const handle = new DirectoryWorkspace(randomUUID(), directory);

    this.logger.debug({ workspaceId: handle.id, directory }, 'Workspace acquired');
    return handle;
  }

  public async release(handle: WorkspaceHandle): Promise<void> {
    try {
      await fs.rm(handle.directory, { recursive: true, force: true });
      this.logger.info({ workspaceId: handle.id, directory: handle.directory }, 'Cleaned up temp directory');
    } catch (error) {
      this.logger.error(
        { workspaceId: handle.id, directory: handle.directory, code: 'workspace.cleanup-failed', error },
        'Error cleaning up temp files',
      );
    }
  }
}

class DirectoryWorkspace implements WorkspaceHandle {
  public constructor(
    public readonly id: string,
    public readonly directory: string,
  ) {}

  public resolve(name: string): string {
    return path.join(this.directory, safeEntryName(name));
  }

  public async write(name: string, bytes: Uint8Array): Promise<string> {
    const target = this.resolve(name);
    await fs.writeFile(target, bytes);
    return target;
  }

  public async read(name: string): Promise<Buffer> {
    return fs.readFile(this.resolve(name));
  }

  public async exists(name: string): Promise<boolean> {
    try {
      await fs.access(this.resolve(name));
      return true;
    } catch {
      return false;
    }
  }
}

/**
 * Keeps only the last path segment so a declared upload name such as
 * `../../etc/passwd` stays inside the workspace.
 */
export function safeEntryName(name: string): string {
  const base = name.split(/[\\/]/).pop() ?? '';
  const trimmed = base.replace(/[\u0000-\u001f]/g, '').trim();

  if (trimmed === '' || trimmed === '.' || trimmed === '..') {
    throw new Error(`Invalid workspace entry name: ${JSON.stringify(name)}`);
  }

  return trimmed;
}
