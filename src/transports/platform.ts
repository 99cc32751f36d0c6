import { accessSync, constants, statSync } from 'fs';
import path from 'path';
import { HuefyError } from '../errors.js';

/** (platform-arch) → kernel executable shipped in the package's bin/ */
const KERNEL_BINARIES: Readonly<Record<string, string>> = {
  'darwin-arm64': 'kernel-cli-darwin-arm64',
  'darwin-x64': 'kernel-cli-darwin-amd64',
  'linux-arm64': 'kernel-cli-linux-arm64',
  'linux-x64': 'kernel-cli-linux-amd64',
  'win32-x64': 'kernel-cli-windows-amd64.exe',
};

export function resolveKernelBinaryName(
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch,
): string {
  const name = KERNEL_BINARIES[`${platform}-${arch}`];
  if (!name) {
    throw new HuefyError(`Unsupported platform: ${platform} (${arch})`, {
      code: 'UNSUPPORTED_PLATFORM',
      details: { platform, arch },
    });
  }
  return name;
}

export function resolveKernelBinaryPath(
  packageRoot: string,
  platform: NodeJS.Platform = process.platform,
  arch: string = process.arch,
): string {
  return path.join(packageRoot, 'bin', resolveKernelBinaryName(platform, arch));
}

/**
 * A missing or non-executable kernel is an installation problem, not a
 * transient one, so it fails the client's construction.
 */
export function assertExecutable(binaryPath: string): void {
  let isFile: boolean;
  try {
    isFile = statSync(binaryPath).isFile();
  } catch (err) {
    throw new HuefyError(`Kernel binary not found at: ${binaryPath}`, {
      code: 'KERNEL_NOT_FOUND',
      cause: err,
    });
  }
  if (!isFile) {
    throw new HuefyError(`Kernel binary not found at: ${binaryPath}`, { code: 'KERNEL_NOT_FOUND' });
  }

  try {
    accessSync(binaryPath, constants.X_OK);
  } catch (err) {
    throw new HuefyError(`Kernel binary is not executable: ${binaryPath}`, {
      code: 'KERNEL_NOT_EXECUTABLE',
      cause: err,
    });
  }
}
