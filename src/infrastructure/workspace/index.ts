export { safeEntryName, TempWorkspaceProvider } from './temp-workspace.provider.js';
