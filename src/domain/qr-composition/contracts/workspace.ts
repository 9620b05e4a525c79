export interface WorkspaceHandle {
  readonly id: string;
  readonly directory: string;
  /** Absolute path for `name` inside the workspace. Directory parts are dropped. */
  resolve(name: string): string;
  write(name: string, bytes: Uint8Array): Promise<string>;
  read(name: string): Promise<Buffer>;
  exists(name: string): Promise<boolean>;
}

export interface WorkspaceProvider {
  acquire(): Promise<WorkspaceHandle>;
  /** Best effort; must not throw. */
  release(handle: WorkspaceHandle): Promise<void>;
}

/**
 * Runs `work` inside a freshly acquired workspace and releases it on every exit path,
 * including a thrown error or an abort raised from inside `work`.
 */
export async function withWorkspace<TResult>(
  provider: WorkspaceProvider,
  work: (workspace: WorkspaceHandle) => Promise<TResult>,
): Promise<TResult> {
  const workspace = await provider.acquire();

  try {
    return await work(workspace);
  } finally {
    await provider.release(workspace);
  }
}
