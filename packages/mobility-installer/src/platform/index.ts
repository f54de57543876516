export { ProcessRunner, type CommandRunner, type CommandResult, type RunCommandOptions } from './process-runner.js';
export { WindowsWorkstation, quotePowerShell, type WindowsWorkstationOptions } from './windows-workstation.js';
export { HttpPackageSource, packageFileName, type HttpPackageSourceOptions } from './http-package-source.js';
