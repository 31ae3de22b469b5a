export { ChildProcessHandle, toExitValue } from './ChildProcessHandle.js';
export { ExecaProcessLauncher } from './ExecaProcessLauncher.js';
export { FileSystemAdapter } from './FileSystemAdapter.js';
